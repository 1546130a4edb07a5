import { ChunkDecoder } from "./decode.js";
import {
  MalformedMarkupError,
  NestedMatchError,
  StreamReadError
} from "./errors.js";
import { Selector, toSelector } from "./selector.js";
import { Tokenizer } from "./tokenizer.js";
import type {
  Chunk,
  EndTagEvent,
  FragmentSink,
  FragmentSource,
  MarkupEvent,
  StartTagEvent
} from "./types.js";

export type StrayEndTagPolicy = "throw" | "ignore";

export interface FragmentExtractorOptions {
  /** What to do with a closing tag that has no open element. Defaults to "throw". */
  strayEndTags?: StrayEndTagPolicy;
}

export interface ExtractOptions extends FragmentExtractorOptions {
  /** Label passed to TextDecoder for byte chunks. Defaults to "utf-8". */
  encoding?: string;
}

/**
 * Push-based fragment extractor.
 *
 * Tracks the stack of open tags and, while inside an element matched by the
 * selector, copies the markup into a buffer. Once the matched element closes
 * the buffer is handed to the sink.
 */
export class FragmentExtractor {
  private readonly selector: Selector;
  private readonly tokenizer = new Tokenizer();
  private readonly stack: string[] = [];
  private targetDepth: number | null = null;
  private buffer = "";

  constructor(
    selector: string | Selector,
    private readonly sink: FragmentSink,
    private readonly options: FragmentExtractorOptions = {}
  ) {
    this.selector = toSelector(selector);
  }

  /** Number of currently open elements. */
  get depth(): number {
    return this.stack.length;
  }

  get matching(): boolean {
    return this.targetDepth !== null;
  }

  write(chunk: string): void {
    for (const event of this.tokenizer.write(chunk)) {
      this.handle(event);
    }
  }

  /** Flushes the tokenizer. A match that never closed is dropped. */
  end(): void {
    for (const event of this.tokenizer.end()) {
      this.handle(event);
    }
    this.targetDepth = null;
    this.buffer = "";
  }

  handle(event: MarkupEvent): void {
    switch (event.type) {
      case "StartTag":
        this.startTag(event);
        break;
      case "SelfClosingTag":
        if (this.targetDepth !== null) {
          this.buffer += event.raw;
        }
        break;
      case "Text":
        if (this.targetDepth !== null) {
          this.buffer += event.data;
        }
        break;
      case "EndTag":
        this.endTag(event);
        break;
    }
  }

  private startTag(event: StartTagEvent): void {
    this.stack.push(event.tag);
    if (this.selector.matches(event.tag, event.attributes)) {
      if (this.targetDepth !== null) {
        throw new NestedMatchError(event.tag, this.stack.length - 1);
      }
      this.targetDepth = this.stack.length - 1;
    }
    if (this.targetDepth !== null) {
      this.buffer += event.raw;
    }
  }

  private endTag(event: EndTagEvent): void {
    const index = this.stack.lastIndexOf(event.tag);
    if (index === -1) {
      if (this.options.strayEndTags === "ignore") {
        return;
      }
      throw new MalformedMarkupError(event.tag);
    }

    if (this.targetDepth === null) {
      this.stack.length = index;
      return;
    }

    this.buffer += `</${event.tag}>`;
    // frames above the closed one are elements left open, e.g. <img>
    this.stack.length = index;

    if (this.stack.length === this.targetDepth) {
      const fragment = this.buffer;
      this.targetDepth = null;
      this.buffer = "";
      if (fragment) {
        this.sink(fragment);
      }
    } else if (this.stack.length < this.targetDepth) {
      // the matched element itself was left open and got closed implicitly
      this.targetDepth = null;
      this.buffer = "";
    }
  }
}

function isAsyncIterable(
  source: Iterable<Chunk> | AsyncIterable<Chunk>
): source is AsyncIterable<Chunk> {
  return Symbol.asyncIterator in source;
}

function isSingleChunk(source: FragmentSource): source is Chunk {
  return typeof source === "string" || source instanceof Uint8Array;
}

/**
 * Runs `step` and yields the fragments it completed, also when it throws
 * part-way through a chunk.
 */
function* settle(
  found: string[],
  step: () => void
): Generator<string, void, undefined> {
  try {
    step();
  } catch (error) {
    yield* found.splice(0);
    throw error;
  }
  yield* found.splice(0);
}

/**
 * Lazily yields every fragment of `source` matched by `selector`, in document
 * order. The only suspension point is reading the next chunk.
 */
export async function* extractFragments(
  source: FragmentSource,
  selector: string | Selector,
  options: ExtractOptions = {}
): AsyncGenerator<string, void, undefined> {
  const found: string[] = [];
  const extractor = new FragmentExtractor(
    selector,
    (fragment) => found.push(fragment),
    options
  );
  const decoder = new ChunkDecoder(options.encoding);

  if (isSingleChunk(source)) {
    const text = decoder.decode(source);
    yield* settle(found, () => extractor.write(text));
  } else {
    const iterator = isAsyncIterable(source)
      ? source[Symbol.asyncIterator]()
      : source[Symbol.iterator]();
    let done = false;
    try {
      while (true) {
        let result: IteratorResult<Chunk>;
        try {
          result = await iterator.next();
        } catch (error) {
          done = true;
          throw new StreamReadError(error);
        }
        if (result.done) {
          done = true;
          break;
        }
        const text = decoder.decode(result.value);
        yield* settle(found, () => extractor.write(text));
      }
    } finally {
      if (!done) {
        await iterator.return?.();
      }
    }
  }

  yield* settle(found, () => {
    extractor.write(decoder.flush());
    extractor.end();
  });
}

/** Synchronous counterpart of `extractFragments` for in-memory sources. */
export function* extractFragmentsSync(
  source: Chunk | Iterable<Chunk>,
  selector: string | Selector,
  options: ExtractOptions = {}
): Generator<string, void, undefined> {
  const found: string[] = [];
  const extractor = new FragmentExtractor(
    selector,
    (fragment) => found.push(fragment),
    options
  );
  const decoder = new ChunkDecoder(options.encoding);

  if (isSingleChunk(source)) {
    const text = decoder.decode(source);
    yield* settle(found, () => extractor.write(text));
  } else {
    const iterator = source[Symbol.iterator]();
    let done = false;
    try {
      while (true) {
        let result: IteratorResult<Chunk>;
        try {
          result = iterator.next();
        } catch (error) {
          done = true;
          throw new StreamReadError(error);
        }
        if (result.done) {
          done = true;
          break;
        }
        const text = decoder.decode(result.value);
        yield* settle(found, () => extractor.write(text));
      }
    } finally {
      if (!done) {
        iterator.return?.();
      }
    }
  }

  yield* settle(found, () => {
    extractor.write(decoder.flush());
    extractor.end();
  });
}

/** Extracts all fragments of an in-memory document at once. */
export function extractFragmentList(
  html: string,
  selector: string | Selector,
  options: FragmentExtractorOptions = {}
): string[] {
  return [...extractFragmentsSync(html, selector, options)];
}
