/**
 * Install-script templates.
 *
 * Supports `{{ name }}` placeholders and `{% if name %}...{% endif %}`
 * blocks (kept when the variable is a non-empty string). Blocks do not nest.
 */

import { readFile } from 'node:fs/promises';

import { TemplateError } from './errors';

export type TemplateVariables = Record<string, string | undefined>;

const IF_BLOCK = /\{%\s*if\s+(\w+)\s*%\}([\s\S]*?)\{%\s*endif\s*%\}/g;
const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;

export function renderTemplate(template: string, variables: TemplateVariables): string {
  const withBlocks = template.replace(IF_BLOCK, (_match, name: string, body: string) =>
    variables[name] ? body : ''
  );

  return withBlocks.replace(PLACEHOLDER, (_match, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new TemplateError(`Template variable "${name}" is not defined`);
    }
    return value;
  });
}

export async function renderTemplateFile(
  path: string,
  variables: TemplateVariables
): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new TemplateError(
      `Could not read install template at ${path}: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }
  return renderTemplate(raw, variables);
}
