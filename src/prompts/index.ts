/**
 * Prompt template loading and model-output cleanup shared by the qualifier
 * and the drafter.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';

/**
 * Get the prompts directory path
 *
 * Resolves to <repo>/prompts from both src/prompts and dist/prompts.
 */
export function getPromptsDir(): string {
  return join(__dirname, '..', '..', 'prompts');
}

/**
 * Load a prompt template from the prompts directory, or from an explicit path
 */
export async function loadPromptTemplate(name: string, templatePath?: string): Promise<string> {
  return readFile(templatePath ?? join(getPromptsDir(), name), 'utf-8');
}

/**
 * Replace every {{key}} in the template; unknown keys are left in place
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? (values[key] ?? '') : placeholder
  );
}

/**
 * Pull the JSON object out of a model response
 *
 * Removes markdown code fences and any prose around the outermost braces.
 */
export function extractJsonText(response: string): string {
  let cleaned = response.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  }
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  cleaned = cleaned.trim();

  if (!cleaned.startsWith('{')) {
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start !== -1 && end > start) {
      cleaned = cleaned.slice(start, end + 1);
    }
  }
  return cleaned;
}

/**
 * Shorten a response for error details and logs
 */
export function previewText(text: string, max = 200): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}
