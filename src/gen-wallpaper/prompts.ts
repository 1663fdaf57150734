import { randomPick } from '../fetch-images/core';
import defaultPrompts from './prompts.json';

export const DEFAULT_PROMPTS: readonly string[] = defaultPrompts;

/**
 * Prompt given on the command line, or a random default one
 */
export function resolvePrompt(
  words: string[] = [],
  prompts: readonly string[] = DEFAULT_PROMPTS,
  random: () => number = Math.random
): string {
  const prompt = words.join(' ').trim();
  return prompt || randomPick([...prompts], random);
}
