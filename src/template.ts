import { ConfigurationError } from "./errors.js";

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

/**
 * Replaces each `{{path.to.value}}` in a configured string. A placeholder must
 * resolve to a string or number; anything else is a ConfigurationError naming
 * the placeholder and `field`, the setting it appeared in.
 */
export function renderTemplate(template: string, params: Readonly<Record<string, unknown>>, field: string): string {
  return template.replace(PLACEHOLDER, (_match: string, key: string) => {
    const value = lookup(params, key.split("."));
    if (value === undefined) {
      throw new ConfigurationError(`Unknown placeholder {{${key}}} in ${field}`);
    }
    return String(value);
  });
}

function lookup(params: Readonly<Record<string, unknown>>, path: readonly string[]): string | number | undefined {
  let current: unknown = params;
  for (const segment of path) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return typeof current === "string" || typeof current === "number" ? current : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
