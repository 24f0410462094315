import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName = 'extract_requirements' | 'intent_classifier';

const PROMPT_FILES: Record<PromptName, string> = {
  extract_requirements: 'extract_requirements.md',
  intent_classifier: 'intent_classifier.md',
};

const memo = new Map<PromptName, string>();
let baseDir: string | undefined;

function resolveBaseDir(): string {
  if (baseDir) return baseDir;
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  baseDir = candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
  return baseDir;
}

export async function getPrompt(name: PromptName): Promise<string> {
  const cached = memo.get(name);
  if (cached !== undefined) return cached;
  const text = await readFile(path.join(resolveBaseDir(), PROMPT_FILES[name]), 'utf-8');
  memo.set(name, text);
  return text;
}

/** Replaces `{key}` placeholders; unknown placeholders are left in place. */
export function fillPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, key: string) => vars[key] ?? match);
}
