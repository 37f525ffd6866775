import { readFile } from "node:fs/promises";
import { resolve, sep } from "node:path";

import { hasErrorCode } from "./errors";

export type TemplateContext = Record<string, unknown>;

export interface TemplateRenderer {
  render(templateId: string, context?: TemplateContext): Promise<string>;
}

export interface TemplateSource {
  load(templateId: string): Promise<string | undefined>;
}

export function fileTemplateSource(dir: string): TemplateSource {
  const root = resolve(dir);
  return {
    async load(templateId) {
      const file = resolve(root, templateId);
      if (!file.startsWith(root + sep)) return undefined;
      try {
        return await readFile(file, "utf-8");
      } catch (error: unknown) {
        if (hasErrorCode(error, "ENOENT", "ENOTDIR", "EISDIR")) {
          return undefined;
        }
        throw error;
      }
    },
  };
}

export function memoryTemplateSource(
  templates: Record<string, string>
): TemplateSource {
  return {
    async load(templateId) {
      return Object.hasOwn(templates, templateId)
        ? templates[templateId]
        : undefined;
    },
  };
}

const VARIABLE = /\{\{\s*([^}]+)\s*\}\}/g;
const FOR_LOOP =
  /\{%\s*for\s+(\w+)\s+in\s+(\w+)\s*%\}([\s\S]*?)\{%\s*endfor\s*%\}/g;

/**
 * `{{ name }}` substitution and one level of `{% for x in xs %}` loops.
 *
 * Unknown variables stay in the output as `{{ name }}`, which is also how a
 * loop body finds its own variable after the first pass.
 */
export function renderString(
  template: string,
  context: TemplateContext = {}
): string {
  const substituted = template.replace(VARIABLE, (_match, raw: string) => {
    const name = raw.trim();
    return Object.hasOwn(context, name)
      ? String(context[name])
      : `{{ ${name} }}`;
  });

  return substituted.replace(
    FOR_LOOP,
    (_match, loopVar: string, listVar: string, body: string) => {
      if (!Object.hasOwn(context, listVar)) {
        return `<!-- List '${listVar}' not found in context -->`;
      }
      const items = context[listVar];
      if (!Array.isArray(items)) {
        return `<!-- '${listVar}' is not a list -->`;
      }
      const placeholder = `{{ ${loopVar} }}`;
      return items
        .map((item) => body.split(placeholder).join(String(item)))
        .join("");
    }
  );
}

export class TemplateEngine implements TemplateRenderer {
  constructor(private readonly source: TemplateSource) {}

  async render(
    templateId: string,
    context: TemplateContext = {}
  ): Promise<string> {
    const template = await this.source.load(templateId);
    if (template === undefined) {
      return `<h1>Template Error</h1><p>Template '${templateId}' not found</p>`;
    }
    return renderString(template, context);
  }
}
