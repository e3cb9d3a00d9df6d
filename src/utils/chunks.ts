export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

function lastWhitespaceIndex(text: string): number {
  for (let i = text.length - 1; i > 0; i--) {
    if (/\s/.test(text.charAt(i))) {
      return i;
    }
  }
  return -1;
}

/**
 * Split text into chunks no longer than maxLength, breaking at whitespace where possible.
 * A single word longer than maxLength is cut by characters.
 */
export function splitIntoChunks(text: string, maxLength = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  if (!text) {
    return [];
  }
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > maxLength) {
    // One extra character so a break right at the limit is found
    let cut = lastWhitespaceIndex(rest.slice(0, maxLength + 1));
    if (cut <= 0) {
      cut = maxLength;
    }
    const chunk = rest.slice(0, cut).trimEnd();
    if (chunk) {
      chunks.push(chunk);
    }
    rest = rest.slice(cut).trimStart();
  }
  if (rest) {
    chunks.push(rest);
  }
  return chunks;
}
