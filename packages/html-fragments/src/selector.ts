import { SelectorSyntaxError } from "./errors.js";
import type { Attribute } from "./types.js";

const UNSUPPORTED_CHARS = [" ", ">", "+"] as const;

export interface SelectorParts {
  tag: string | null;
  classes: readonly string[];
}

/**
 * Parses `tag`, `.class` or `tag.class1.class2`.
 * Descendant and sibling combinators are not supported.
 */
export function parseSelector(text: string): SelectorParts {
  if (text.length === 0) {
    throw new SelectorSyntaxError(text, "selector is empty");
  }
  for (const char of UNSUPPORTED_CHARS) {
    if (text.includes(char)) {
      throw new SelectorSyntaxError(
        text,
        `"${char}" is not supported, only a single tag with classes can be matched`
      );
    }
  }

  const [tag = "", ...classes] = text.split(".");
  if (classes.some((cls) => cls.length === 0)) {
    throw new SelectorSyntaxError(text, "class name is empty");
  }

  return {
    tag: tag.length > 0 ? tag.toLowerCase() : null,
    classes
  };
}

export class Selector implements SelectorParts {
  readonly tag: string | null;
  readonly classes: readonly string[];

  constructor(readonly source: string) {
    const parts = parseSelector(source);
    this.tag = parts.tag;
    this.classes = parts.classes;
  }

  matches(tag: string, attributes: readonly Attribute[]): boolean {
    if (this.tag && tag.toLowerCase() !== this.tag) {
      return false;
    }
    if (this.classes.length === 0) {
      return true;
    }

    const classAttr = attributes.find((attr) => attr.name === "class");
    if (!classAttr) {
      return false;
    }
    const present = new Set((classAttr.value ?? "").split(/\s+/));
    return this.classes.every((cls) => present.has(cls));
  }

  toString(): string {
    return this.source;
  }
}

export function toSelector(selector: string | Selector): Selector {
  return typeof selector === "string" ? new Selector(selector) : selector;
}
