export type HtmlFragmentsErrorCode =
  | "INVALID_SELECTOR"
  | "INVALID_FIELD_PATTERN"
  | "INVALID_FIELD_SPEC"
  | "UNKNOWN_FIELD"
  | "NESTED_MATCH"
  | "MALFORMED_MARKUP"
  | "STREAM_READ";

/**
 * Base class of every error thrown by html-fragments.
 * `code` is stable and meant for programmatic checks.
 */
export class HtmlFragmentsError extends Error {
  constructor(
    public readonly code: HtmlFragmentsErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "HtmlFragmentsError";
  }
}

export class SelectorSyntaxError extends HtmlFragmentsError {
  constructor(public readonly selector: string, reason: string) {
    super("INVALID_SELECTOR", `Invalid selector "${selector}": ${reason}`);
    this.name = "SelectorSyntaxError";
  }
}

export class FieldPatternError extends HtmlFragmentsError {
  constructor(
    public readonly pattern: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(
      "INVALID_FIELD_PATTERN",
      `Invalid field pattern /${pattern}/: ${reason}`,
      options
    );
    this.name = "FieldPatternError";
  }
}

export class FieldSpecError extends HtmlFragmentsError {
  constructor(public readonly spec: string, reason: string) {
    super("INVALID_FIELD_SPEC", `Invalid field spec "${spec}": ${reason}`);
    this.name = "FieldSpecError";
  }
}

export class UnknownFieldError extends HtmlFragmentsError {
  constructor(public readonly field: string) {
    super("UNKNOWN_FIELD", `Unknown field "${field}"`);
    this.name = "UnknownFieldError";
  }
}

/**
 * The selector matched an element inside an element it already matched.
 * Fatal for the current run; the selector has to exclude nested occurrences.
 */
export class NestedMatchError extends HtmlFragmentsError {
  constructor(public readonly tag: string, public readonly depth: number) {
    super(
      "NESTED_MATCH",
      `Selector matched a nested <${tag}> at depth ${depth}; adjust the selector so matches do not nest`
    );
    this.name = "NestedMatchError";
  }
}

export class MalformedMarkupError extends HtmlFragmentsError {
  constructor(public readonly tag: string) {
    super(
      "MALFORMED_MARKUP",
      `Closing tag </${tag}> has no open <${tag}>`
    );
    this.name = "MalformedMarkupError";
  }
}

export class StreamReadError extends HtmlFragmentsError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("STREAM_READ", `Failed to read input: ${detail}`, { cause });
    this.name = "StreamReadError";
  }
}

export function isHtmlFragmentsError(
  error: unknown
): error is HtmlFragmentsError {
  return error instanceof HtmlFragmentsError;
}
