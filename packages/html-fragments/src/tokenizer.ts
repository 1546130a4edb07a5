import type { Attribute, MarkupEvent } from "./types.js";

const RAW_TEXT_ELEMENTS = new Set(["script", "style"]);

const TAG_NAME_PATTERN = /^[^\s/>]+/;
const ATTRIBUTE_PATTERN =
  /([^\s/>="']+)(?:\s*=\s*("[^"]*"|'[^']*'|[^\s>]+))?/g;

const COMMENT_OPEN = "<!--";
const CDATA_OPEN = "<![CDATA[";

function isAsciiLetter(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z]$/.test(char);
}

function isPrefixOf(head: string, full: string): boolean {
  return head.length < full.length && full.startsWith(head);
}

function unquote(value: string): string {
  const first = value[0];
  if ((first === '"' || first === "'") && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

interface ParsedTag {
  tag: string;
  attributes: Attribute[];
  selfClosing: boolean;
}

/**
 * Parses the source text of a start tag, `<name attr="v" flag>` or `<name/>`.
 */
export function parseStartTag(raw: string): ParsedTag {
  let body = raw.slice(1, -1);
  let selfClosing = false;
  if (body.endsWith("/")) {
    selfClosing = true;
    body = body.slice(0, -1);
  }

  const name = TAG_NAME_PATTERN.exec(body)?.[0] ?? "";
  const attributes: Attribute[] = [];
  for (const match of body.slice(name.length).matchAll(ATTRIBUTE_PATTERN)) {
    const [, attrName = "", attrValue] = match;
    attributes.push({
      name: attrName.toLowerCase(),
      value: attrValue === undefined ? null : unquote(attrValue)
    });
  }

  return { tag: name.toLowerCase(), attributes, selfClosing };
}

/**
 * Index of the `>` closing a start tag that begins at `start`, or -1 when the
 * tag is not complete yet. A `>` inside a quoted attribute value does not count.
 */
function findStartTagEnd(input: string, start: number): number {
  let quote: string | null = null;
  let expectValue = false;

  for (let i = start + 1; i < input.length; i++) {
    const char = input[i];
    if (quote) {
      if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === ">") {
      return i;
    }
    if (char === "=") {
      expectValue = true;
    } else if (expectValue && (char === '"' || char === "'")) {
      quote = char;
      expectValue = false;
    } else if (!/\s/.test(char ?? "")) {
      expectValue = false;
    }
  }
  return -1;
}

/**
 * Incremental markup tokenizer.
 *
 * Input is fed chunk by chunk through `write`; only the unfinished construct
 * at the end of a chunk is kept for the next call, consumed input is never
 * scanned again. Text comes out verbatim and may be split into several
 * `Text` events. Comments, declarations, CDATA sections and processing
 * instructions produce no event.
 */
export class Tokenizer {
  private pending = "";
  private rawTextTag: string | null = null;
  private ended = false;

  write(chunk: string): MarkupEvent[] {
    if (this.ended) {
      throw new Error("Tokenizer.write() called after end()");
    }
    this.pending += chunk;
    return this.drain(false);
  }

  end(): MarkupEvent[] {
    if (this.ended) {
      return [];
    }
    const events = this.drain(true);
    this.ended = true;
    return events;
  }

  private drain(final: boolean): MarkupEvent[] {
    const events: MarkupEvent[] = [];
    const input = this.pending;
    let pos = 0;

    while (pos < input.length) {
      if (this.rawTextTag) {
        const closer = new RegExp(`</${this.rawTextTag}[\\s/>]`, "gi");
        closer.lastIndex = pos;
        const found = closer.exec(input);
        if (!found) {
          // keep a possibly split "</script" for the next chunk
          const safe = Math.max(pos, input.length - this.rawTextTag.length - 2);
          if (safe > pos) {
            events.push({ type: "Text", data: input.slice(pos, safe) });
            pos = safe;
          }
          break;
        }
        if (found.index > pos) {
          events.push({ type: "Text", data: input.slice(pos, found.index) });
        }
        pos = found.index;
        this.rawTextTag = null;
      }

      const lt = input.indexOf("<", pos);
      if (lt === -1) {
        events.push({ type: "Text", data: input.slice(pos) });
        pos = input.length;
        break;
      }
      if (lt > pos) {
        events.push({ type: "Text", data: input.slice(pos, lt) });
        pos = lt;
      }

      const next = this.scanMarkup(input, lt, events);
      if (next === null) {
        break;
      }
      pos = next;
    }

    if (final && pos < input.length) {
      events.push({ type: "Text", data: input.slice(pos) });
      pos = input.length;
    }

    this.pending = input.slice(pos);
    return events;
  }

  /**
   * Consumes the construct starting with `<` at `lt`.
   * Returns the position after it, or null when more input is needed.
   */
  private scanMarkup(
    input: string,
    lt: number,
    events: MarkupEvent[]
  ): number | null {
    const next = input[lt + 1];
    if (next === undefined) {
      return null;
    }

    if (next === "!") {
      const head = input.slice(lt, lt + CDATA_OPEN.length);
      if (isPrefixOf(head, COMMENT_OPEN) || isPrefixOf(head, CDATA_OPEN)) {
        return null;
      }
      if (input.startsWith(COMMENT_OPEN, lt)) {
        // from lt + 2 so that <!--> and <!---> close themselves
        const close = input.indexOf("-->", lt + 2);
        return close === -1 ? null : close + 3;
      }
      if (input.startsWith(CDATA_OPEN, lt)) {
        const close = input.indexOf("]]>", lt + CDATA_OPEN.length);
        return close === -1 ? null : close + 3;
      }
      const gt = input.indexOf(">", lt + 2);
      return gt === -1 ? null : gt + 1;
    }

    if (next === "?") {
      const gt = input.indexOf(">", lt + 2);
      return gt === -1 ? null : gt + 1;
    }

    if (next === "/") {
      const gt = input.indexOf(">", lt + 2);
      if (gt === -1) {
        return null;
      }
      if (isAsciiLetter(input[lt + 2])) {
        const name = TAG_NAME_PATTERN.exec(input.slice(lt + 2, gt))?.[0] ?? "";
        events.push({ type: "EndTag", tag: name.toLowerCase() });
      }
      return gt + 1;
    }

    if (isAsciiLetter(next)) {
      const gt = findStartTagEnd(input, lt);
      if (gt === -1) {
        return null;
      }
      const raw = input.slice(lt, gt + 1);
      const { tag, attributes, selfClosing } = parseStartTag(raw);
      if (selfClosing) {
        events.push({ type: "SelfClosingTag", tag, attributes, raw });
      } else {
        events.push({ type: "StartTag", tag, attributes, raw });
        if (RAW_TEXT_ELEMENTS.has(tag)) {
          this.rawTextTag = tag;
        }
      }
      return gt + 1;
    }

    events.push({ type: "Text", data: "<" });
    return lt + 1;
  }
}

export function tokenize(html: string): MarkupEvent[] {
  const tokenizer = new Tokenizer();
  return [...tokenizer.write(html), ...tokenizer.end()];
}
