import { TextDecoder } from "node:util";

import type { Chunk } from "./types.js";

export const DEFAULT_ENCODING = "utf-8";

/**
 * Turns a sequence of byte or string chunks into text.
 * An incomplete multi-byte sequence at the end of a byte chunk is held back
 * and completed by the bytes of the next chunk.
 */
export class ChunkDecoder {
  private readonly decoder: TextDecoder;

  constructor(encoding: string = DEFAULT_ENCODING) {
    this.decoder = new TextDecoder(encoding);
  }

  decode(chunk: Chunk): string {
    if (typeof chunk === "string") {
      return this.flush() + chunk;
    }
    return this.decoder.decode(chunk, { stream: true });
  }

  /** Emits whatever is still buffered; an unfinished sequence becomes U+FFFD. */
  flush(): string {
    return this.decoder.decode();
  }
}
