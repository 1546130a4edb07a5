import { FieldSpecError } from "./errors.js";

export interface FieldSpec {
  name: string;
  pattern: string;
}

/**
 * Parses `name:regex`. Only the first `:` separates, so the pattern itself
 * may contain colons.
 */
export function parseFieldSpec(spec: string): FieldSpec {
  const separator = spec.indexOf(":");
  if (separator === -1) {
    throw new FieldSpecError(spec, 'expected "name:regex", is the field name missing?');
  }

  const name = spec.slice(0, separator).trim();
  if (name.length === 0) {
    throw new FieldSpecError(spec, "field name is empty");
  }

  return { name, pattern: spec.slice(separator + 1) };
}

export function parseFieldSpecs(specs: readonly string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const spec of specs) {
    const { name, pattern } = parseFieldSpec(spec);
    fields[name] = pattern;
  }
  return fields;
}
