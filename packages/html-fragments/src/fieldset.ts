import { UnknownFieldError } from "./errors.js";
import { FieldMatcher, type FieldMatcherOptions } from "./field.js";
import type { FieldRecord } from "./types.js";

const PLACEHOLDER_PATTERN = /\{#(.*?)#\}/g;

export interface FieldDefinition extends FieldMatcherOptions {
  pattern: string | RegExp;
}

export type FieldInput = string | RegExp | FieldMatcher | FieldDefinition;

function toMatcher(input: FieldInput, options?: FieldMatcherOptions): FieldMatcher {
  if (input instanceof FieldMatcher) {
    // options override the matcher's own settings on a copy
    return options
      ? new FieldMatcher(input.pattern, {
          cleanup: input.cleanup,
          stripHtml: input.stripHtml,
          ...options
        })
      : input;
  }
  if (typeof input === "string" || input instanceof RegExp) {
    return new FieldMatcher(input, options);
  }
  const { pattern, ...definitionOptions } = input;
  return new FieldMatcher(pattern, { ...definitionOptions, ...options });
}

/**
 * Named field matchers bound to one fragment at a time.
 *
 * Each field is looked up at most once per `bind`; a miss is cached as
 * `null` just like a value.
 */
export class FieldSet {
  private readonly matchers = new Map<string, FieldMatcher>();
  private readonly cache = new Map<string, string | null>();
  private current = "";

  constructor(fields: Record<string, FieldInput> = {}) {
    for (const [name, input] of Object.entries(fields)) {
      this.add(name, input);
    }
  }

  add(name: string, input: FieldInput, options?: FieldMatcherOptions): this {
    this.matchers.set(name, toMatcher(input, options));
    this.cache.delete(name);
    return this;
  }

  has(name: string): boolean {
    return this.matchers.has(name);
  }

  keys(): string[] {
    return [...this.matchers.keys()];
  }

  get text(): string {
    return this.current;
  }

  bind(text: string): this {
    this.current = text;
    this.cache.clear();
    return this;
  }

  get(name: string): string | null {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const matcher = this.matchers.get(name);
    if (!matcher) {
      throw new UnknownFieldError(name);
    }
    const value = matcher.find(this.current);
    this.cache.set(name, value);
    return value;
  }

  resolveAll(): FieldRecord {
    const record: FieldRecord = {};
    for (const name of this.matchers.keys()) {
      record[name] = this.get(name);
    }
    return record;
  }

  /** Replaces each `{#name#}` with the field value, or "" when it did not match. */
  applyTemplate(template: string): string {
    return template.replace(
      PLACEHOLDER_PATTERN,
      (_placeholder, name: string) => this.get(name) ?? ""
    );
  }

  /** One `name: value` line per field; `<?>` marks fields not looked up yet. */
  toString(): string {
    return this.keys()
      .map((name) => {
        if (!this.cache.has(name)) {
          return `${name}: <?>`;
        }
        return `${name}: ${this.cache.get(name) ?? "-"}`;
      })
      .join("\n");
  }
}
