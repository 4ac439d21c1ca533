import { readFile } from "node:fs/promises";

/**
 * Replace `{{name}}` placeholders with values from `vars`. Expanded values
 * are not scanned again, and unknown names are left as they are.
 */
export function expandTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  const replacements: string[] = [];

  const withSentinels = template.replace(/\{\{([\w.]+)\}\}/g, (match, key: string) => {
    const value = vars[key];
    if (value === undefined) return match;
    replacements.push(value);
    return `\x00EXPANDED_${replacements.length - 1}\x00`;
  });

  return withSentinels.replace(
    /\x00EXPANDED_(\d+)\x00/g,
    (_match, idx: string) => replacements[parseInt(idx, 10)] ?? "",
  );
}

/** Placeholder names still present after expansion. */
export function unresolvedPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(/\{\{([\w.]+)\}\}/g), (m) => m[1] ?? "");
}

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

const TEMPLATE_DIR = new URL("../../templates/", import.meta.url);
const cache = new Map<string, string>();

/** Load a bundled template from the package's `templates/` directory. */
export async function loadTemplate(name: string): Promise<string> {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const text = await readFile(new URL(name, TEMPLATE_DIR), "utf-8");
  cache.set(name, text);
  return text;
}

/** Load and expand a template, failing on any placeholder left unresolved. */
export async function renderTemplate(
  name: string,
  vars: Readonly<Record<string, string>>,
): Promise<string> {
  const text = expandTemplate(await loadTemplate(name), vars);
  const missing = unresolvedPlaceholders(text);
  if (missing.length > 0) {
    throw new TemplateError(`Template ${name} has unresolved placeholders: ${missing.join(", ")}`);
  }
  return text;
}
