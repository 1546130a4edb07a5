import { FieldPatternError } from "./errors.js";
import { collapseWhitespace, stripHtml } from "./utils.js";

export interface FieldMatcherOptions {
  /** Collapse whitespace runs to one space and trim. Defaults to true. */
  cleanup?: boolean;
  /** Reduce the captured markup to text with `stripHtml`. Defaults to false. */
  stripHtml?: boolean;
}

function countCaptureGroups(regex: RegExp): number {
  // an empty alternative always matches and reports every group
  const probe = new RegExp(`${regex.source}|`, regex.flags.replace(/[gy]/g, ""));
  return (probe.exec("")?.length ?? 1) - 1;
}

function compile(pattern: string | RegExp): RegExp {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const flags = typeof pattern === "string" ? "" : pattern.flags;

  let regex: RegExp;
  try {
    // global/sticky would make exec() depend on lastIndex
    regex = new RegExp(source, flags.replace(/[gy]/g, ""));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FieldPatternError(source, reason, { cause: error });
  }

  if (countCaptureGroups(regex) === 0) {
    throw new FieldPatternError(
      source,
      "pattern needs a capturing group, e.g. <h3>([\\s\\S]*?)</h3>"
    );
  }
  return regex;
}

/**
 * A regex whose first capturing group is the extracted value.
 * Use `[\s\S]*?` to match across lines.
 */
export class FieldMatcher {
  readonly pattern: RegExp;
  readonly cleanup: boolean;
  readonly stripHtml: boolean;

  constructor(pattern: string | RegExp, options: FieldMatcherOptions = {}) {
    this.pattern = compile(pattern);
    this.cleanup = options.cleanup ?? true;
    this.stripHtml = options.stripHtml ?? false;
  }

  find(text: string): string | null {
    const match = this.pattern.exec(text);
    const captured = match?.[1];
    if (captured === undefined) {
      return null;
    }

    const value = this.stripHtml ? stripHtml(captured) : captured;
    return this.cleanup ? collapseWhitespace(value) : value;
  }
}
