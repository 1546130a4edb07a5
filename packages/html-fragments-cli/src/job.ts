import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";

import {
  UnknownFieldError,
  createFieldSet,
  extractFragments,
  extractOptionsFromConfig,
  renderFragments,
  scrapeRecords,
  type FieldRecord,
  type FragmentsConfig
} from "html-fragments";

export const STDIN_PATH = "-";

export interface JobOutputOptions {
  pretty?: boolean;
}

export function openInput(input: string, chunkSize: number): Readable {
  if (input === STDIN_PATH) {
    return process.stdin;
  }
  return createReadStream(input, { highWaterMark: chunkSize });
}

function writeLine(line: string): void {
  process.stdout.write(`${line}\n`);
}

/**
 * Feeds every item to `emit`, in reverse once the input is exhausted when
 * `reverse` is set. Items held for reversing are still emitted when the
 * iteration fails, before the failure is rethrown.
 */
async function emitAll<T>(
  items: AsyncIterable<T>,
  reverse: boolean,
  emit: (item: T) => void
): Promise<void> {
  const held: T[] = [];

  try {
    for await (const item of items) {
      if (reverse) {
        held.push(item);
      } else {
        emit(item);
      }
    }
  } finally {
    for (const item of held.reverse()) {
      emit(item);
    }
  }
}

/**
 * Runs a scrape job against a file (or stdin with "-") and prints the result:
 * one line per fragment with a template, otherwise a JSON array of records,
 * or of raw fragments when no fields are configured. Whatever was extracted
 * before a failure is printed before the failure is rethrown.
 */
export async function runScrapeJob(
  config: FragmentsConfig,
  input: string,
  options: JobOutputOptions = {}
): Promise<void> {
  const source = openInput(input, config.input.chunkSize);
  const extractOptions = extractOptionsFromConfig(config);
  const fields = createFieldSet(config);

  try {
    if (config.template !== undefined) {
      await emitAll(
        renderFragments(source, config.selector, fields, config.template, extractOptions),
        config.reverse,
        writeLine
      );
      return;
    }

    const items: Array<FieldRecord | string> = [];
    const collectItem = (item: FieldRecord | string) => {
      items.push(item);
    };
    try {
      if (fields.keys().length > 0) {
        await emitAll(
          scrapeRecords(source, config.selector, fields, extractOptions),
          config.reverse,
          collectItem
        );
      } else {
        await emitAll(
          extractFragments(source, config.selector, extractOptions),
          config.reverse,
          collectItem
        );
      }
    } finally {
      writeLine(JSON.stringify(items, null, options.pretty ? 2 : undefined));
    }
  } finally {
    if (source !== process.stdin) {
      source.destroy();
    }
  }
}

export function reportJobError(command: string, error: unknown): void {
  console.error(`[html-fragments] ${command} に失敗しました:`, error);
  if (error instanceof UnknownFieldError) {
    console.error(
      `[html-fragments] フィールド "${error.field}" が定義されていません。name:regex の指定漏れではありませんか？`
    );
  }
  process.exitCode = 1;
}
