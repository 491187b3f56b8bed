import { RenderFailed } from "../errors";

const PLACEHOLDER = /\{\{\s*([\w-]+)\s*\}\}/g;

export type TemplateValues = Record<string, string | null | undefined>;

/**
 * Replaces `{{key}}` placeholders in one pass, so substituted values are never
 * scanned for placeholders themselves. Every supplied key must occur in the
 * template and every placeholder must be supplied; missing values render as
 * "Undefined".
 */
export function populateTemplate(template: string, values: TemplateValues, label = "template"): string {
  const used = new Set<string>();
  const unmatched: string[] = [];

  const output = template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      unmatched.push(placeholder);
      return placeholder;
    }
    used.add(key);
    return values[key] ?? "Undefined";
  });

  const unknown = Object.keys(values).filter((key) => !used.has(key));
  if (unknown.length > 0) {
    throw new RenderFailed(`Key ${unknown.map((key) => `{{${key}}}`).join(", ")} not found in ${label}`);
  }
  if (unmatched.length > 0) {
    throw new RenderFailed(`Unmatched variables found in ${label}: ${unmatched.join(", ")}`);
  }
  return output;
}
