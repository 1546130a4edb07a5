export {
  CONFIG_DEFAULTS,
  ConfigSchema,
  STRAY_END_TAG_OPTIONS,
  createFieldSet,
  defineConfig
} from "./config.js";
export type {
  ConfigLocale,
  DefineConfigOptions,
  FieldConfig,
  FragmentsConfig,
  FragmentsConfigInput,
  InputOptions
} from "./config.js";
export { ChunkDecoder, DEFAULT_ENCODING } from "./decode.js";
export {
  FieldPatternError,
  FieldSpecError,
  HtmlFragmentsError,
  MalformedMarkupError,
  NestedMatchError,
  SelectorSyntaxError,
  StreamReadError,
  UnknownFieldError,
  isHtmlFragmentsError
} from "./errors.js";
export type { HtmlFragmentsErrorCode } from "./errors.js";
export {
  FragmentExtractor,
  extractFragmentList,
  extractFragments,
  extractFragmentsSync
} from "./extractor.js";
export type {
  ExtractOptions,
  FragmentExtractorOptions,
  StrayEndTagPolicy
} from "./extractor.js";
export { FieldMatcher } from "./field.js";
export type { FieldMatcherOptions } from "./field.js";
export { parseFieldSpec, parseFieldSpecs } from "./field-spec.js";
export type { FieldSpec } from "./field-spec.js";
export { FieldSet } from "./fieldset.js";
export type { FieldDefinition, FieldInput } from "./fieldset.js";
export {
  collect,
  extractOptionsFromConfig,
  renderFragments,
  scrape,
  scrapeRecords
} from "./scrape.js";
export type { CollectOptions, ScrapeResult } from "./scrape.js";
export { Selector, parseSelector, toSelector } from "./selector.js";
export type { SelectorParts } from "./selector.js";
export { Tokenizer, parseStartTag, tokenize } from "./tokenizer.js";
export { collapseWhitespace, stripHtml } from "./utils.js";
export type {
  Attribute,
  Chunk,
  EndTagEvent,
  FieldRecord,
  FragmentSink,
  FragmentSource,
  MarkupEvent,
  SelfClosingTagEvent,
  StartTagEvent,
  TextEvent
} from "./types.js";
