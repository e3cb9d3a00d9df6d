import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CATEGORIES, type Category } from '../ports/PromptPort.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// Same depth from src/utils and dist/utils
export const DEFAULT_PROMPTS_DIR = join(__dirname, '../../prompts');

export interface PromptCatalog {
  system: Record<Category, string>;
  refine: string;
}

export async function loadPrompt(name: string, promptsDir = DEFAULT_PROMPTS_DIR): Promise<string> {
  const filePath = join(promptsDir, name);
  return readFile(filePath, 'utf8');
}

export async function loadPromptCatalog(promptsDir = DEFAULT_PROMPTS_DIR): Promise<PromptCatalog> {
  const entries = await Promise.all(
    CATEGORIES.map(async (category) => [category, (await loadPrompt(`${category}.md`, promptsDir)).trim()] as const)
  );
  const system: Record<Category, string> = { image: '', code: '', video: '', text: '' };
  for (const [category, text] of entries) {
    system[category] = text;
  }
  const refine = (await loadPrompt('refine.md', promptsDir)).trim();
  return { system, refine };
}
