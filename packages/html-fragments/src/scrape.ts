import { createFieldSet, type FragmentsConfig } from "./config.js";
import { extractFragments, type ExtractOptions } from "./extractor.js";
import type { FieldSet } from "./fieldset.js";
import type { Selector } from "./selector.js";
import type { FieldRecord, FragmentSource } from "./types.js";

export type ScrapeResult =
  | { kind: "fragments"; fragments: string[] }
  | { kind: "records"; records: FieldRecord[] }
  | { kind: "rendered"; lines: string[] };

export interface CollectOptions {
  /** Reverse document order, e.g. to get oldest-first entries from a news page. */
  reverse?: boolean;
}

/** Resolves every field of each fragment into a record. */
export async function* scrapeRecords(
  source: FragmentSource,
  selector: string | Selector,
  fields: FieldSet,
  options: ExtractOptions = {}
): AsyncGenerator<FieldRecord, void, undefined> {
  for await (const fragment of extractFragments(source, selector, options)) {
    yield fields.bind(fragment).resolveAll();
  }
}

/** Renders `template` once per fragment. */
export async function* renderFragments(
  source: FragmentSource,
  selector: string | Selector,
  fields: FieldSet,
  template: string,
  options: ExtractOptions = {}
): AsyncGenerator<string, void, undefined> {
  for await (const fragment of extractFragments(source, selector, options)) {
    yield fields.bind(fragment).applyTemplate(template);
  }
}

export async function collect<T>(
  items: AsyncIterable<T> | Iterable<T>,
  options: CollectOptions = {}
): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return options.reverse ? result.reverse() : result;
}

export function extractOptionsFromConfig(config: FragmentsConfig): ExtractOptions {
  return {
    encoding: config.input.encoding,
    strayEndTags: config.input.strayEndTags
  };
}

/**
 * Runs a whole scrape job: with a template every fragment is rendered, with
 * fields every fragment becomes a record, otherwise raw fragments are returned.
 */
export async function scrape(
  source: FragmentSource,
  config: FragmentsConfig
): Promise<ScrapeResult> {
  const options = extractOptionsFromConfig(config);
  const collectOptions = { reverse: config.reverse };
  const fields = createFieldSet(config);

  if (config.template !== undefined) {
    const lines = await collect(
      renderFragments(source, config.selector, fields, config.template, options),
      collectOptions
    );
    return { kind: "rendered", lines };
  }

  if (fields.keys().length > 0) {
    const records = await collect(
      scrapeRecords(source, config.selector, fields, options),
      collectOptions
    );
    return { kind: "records", records };
  }

  const fragments = await collect(
    extractFragments(source, config.selector, options),
    collectOptions
  );
  return { kind: "fragments", fragments };
}
