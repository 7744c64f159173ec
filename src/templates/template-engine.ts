import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { TemplateName, TemplateSource, TemplateVariables } from './types.js';

/** `templates/remote/` at the package root, from both src/ and dist/ */
export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../templates/remote/', import.meta.url));

const PLACEHOLDER = /\{\{\s*([a-zA-Z][a-zA-Z0-9]*)\s*\}\}/g;

export class FileTemplateSource implements TemplateSource {
  constructor(private readonly directory: string = DEFAULT_TEMPLATE_DIR) {}

  read(name: TemplateName): string {
    return readFileSync(`${this.directory}${name}.tpl`, 'utf-8');
  }
}

/**
 * Renders the files placed on the instance: `{{name}}` placeholders, all required.
 */
export class TemplateEngine {
  private overrides: Map<TemplateName, string> = new Map();

  constructor(private readonly source: TemplateSource = new FileTemplateSource()) {}

  render(name: TemplateName, variables: TemplateVariables): string {
    const template = this.overrides.get(name) ?? this.source.read(name);
    const missing = new Set<string>();

    const rendered = template.replace(PLACEHOLDER, (match, key: string) => {
      const value = variables[key];
      if (value === undefined) {
        missing.add(key);
        return match;
      }
      return String(value);
    });

    if (missing.size > 0) {
      throw new Error(`Template ${name} has no value for: ${[...missing].join(', ')}`);
    }
    return rendered;
  }

  registerTemplate(name: TemplateName, template: string): void {
    this.overrides.set(name, template);
  }
}
