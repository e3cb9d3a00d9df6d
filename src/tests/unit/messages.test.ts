import { describe, it, expect } from 'vitest';
import {
  MSG_ERROR_API,
  MSG_ERROR_NETWORK,
  MSG_ERROR_UNKNOWN,
  MSG_HISTORY_EMPTY,
  apologyFor,
  formatHistory,
  previewOf,
} from '../../core/relay/messages.js';

describe('messages', () => {
  it('should map error kinds to apologies', () => {
    expect(apologyFor('timeout')).toBe(MSG_ERROR_NETWORK);
    expect(apologyFor('unavailable')).toBe(MSG_ERROR_NETWORK);
    expect(apologyFor('rejected')).toBe(MSG_ERROR_API);
    expect(apologyFor('empty')).toBe(MSG_ERROR_UNKNOWN);
  });

  it('should shorten long previews', () => {
    const preview = previewOf('x'.repeat(250));

    expect(preview).toBe(`${'x'.repeat(200)}…`);
    expect(previewOf('short')).toBe('short');
  });

  it('should list history newest first', () => {
    const text = formatHistory([
      { category: 'image', preview: 'a cat' },
      { category: 'code', preview: 'a parser' },
    ]);

    expect(text).toBe('📜 Last 2 prompts:\n\n1. 💻 code: a parser\n2. 🖼 image: a cat');
  });

  it('should report an empty history', () => {
    expect(formatHistory([])).toBe(MSG_HISTORY_EMPTY);
  });
});
