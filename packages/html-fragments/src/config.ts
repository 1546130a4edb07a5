import { z } from "zod";

import { DEFAULT_ENCODING } from "./decode.js";
import { FieldMatcher } from "./field.js";
import { FieldSet } from "./fieldset.js";
import { parseSelector } from "./selector.js";

const LOCALE_MESSAGES = {
  en: {
    invalidSelector:
      "Invalid selector: use tag, .class or tag.class1.class2 without spaces, > or +",
    invalidPattern: "Invalid field pattern: needs a valid regex with a capturing group",
    invalidEncoding: "Unknown text encoding"
  },
  ja: {
    invalidSelector:
      "無効なセレクタです。tag / .class / tag.class1.class2 の形式で、空白・>・+ は使えません",
    invalidPattern: "無効なフィールドパターンです。キャプチャグループを含む正規表現を指定してください",
    invalidEncoding: "未対応の文字コードです"
  }
} as const;

export type ConfigLocale = keyof typeof LOCALE_MESSAGES;

const DEFAULT_LOCALE: ConfigLocale = "en";

export const STRAY_END_TAG_OPTIONS = ["throw", "ignore"] as const;

export const CONFIG_DEFAULTS = {
  fields: {
    cleanup: true,
    stripHtml: false
  },
  reverse: false,
  input: {
    encoding: DEFAULT_ENCODING,
    chunkSize: 65_536,
    strayEndTags: "throw"
  }
} as const;

function isSelector(value: string): boolean {
  try {
    parseSelector(value);
    return true;
  } catch {
    return false;
  }
}

function isFieldPattern(value: string): boolean {
  try {
    void new FieldMatcher(value);
    return true;
  } catch {
    return false;
  }
}

function isEncoding(value: string): boolean {
  try {
    void new TextDecoder(value);
    return true;
  } catch {
    return false;
  }
}

function buildSchemas(locale: ConfigLocale) {
  const messages = LOCALE_MESSAGES[locale];

  const PatternSchema = z.string().min(1).refine(isFieldPattern, {
    message: messages.invalidPattern
  });

  const FieldDefinitionSchema = z
    .object({
      pattern: PatternSchema,
      cleanup: z.boolean().default(CONFIG_DEFAULTS.fields.cleanup),
      stripHtml: z.boolean().default(CONFIG_DEFAULTS.fields.stripHtml)
    })
    .strict();

  const FieldSchema = z.preprocess(
    (value) => (typeof value === "string" ? { pattern: value } : value),
    FieldDefinitionSchema
  );

  const InputOptionsSchema = z
    .object({
      encoding: z
        .string()
        .refine(isEncoding, { message: messages.invalidEncoding })
        .default(CONFIG_DEFAULTS.input.encoding),
      chunkSize: z
        .number()
        .int()
        .positive()
        .default(CONFIG_DEFAULTS.input.chunkSize),
      strayEndTags: z
        .enum(STRAY_END_TAG_OPTIONS)
        .default(CONFIG_DEFAULTS.input.strayEndTags)
    })
    .strict();

  const ConfigSchema = z
    .object({
      selector: z
        .string()
        .transform((value) => value.trim())
        .refine(isSelector, { message: messages.invalidSelector }),
      fields: z
        .record(z.string().min(1), FieldSchema)
        .default(() => ({})),
      template: z.string().optional(),
      reverse: z.boolean().default(CONFIG_DEFAULTS.reverse),
      input: InputOptionsSchema.default(() => ({
        ...CONFIG_DEFAULTS.input
      }))
    })
    .strict();

  return {
    ConfigSchema,
    FieldSchema,
    FieldDefinitionSchema,
    InputOptionsSchema
  };
}

const SCHEMAS = {
  en: buildSchemas("en"),
  ja: buildSchemas("ja")
} as const;

export const ConfigSchema = SCHEMAS.en.ConfigSchema;

type FieldSchemaType = typeof SCHEMAS.en.FieldSchema;
type InputOptionsSchemaType = typeof SCHEMAS.en.InputOptionsSchema;

export type FragmentsConfig = z.infer<typeof ConfigSchema>;
export type FragmentsConfigInput = z.input<typeof ConfigSchema>;
export type FieldConfig = z.infer<FieldSchemaType>;
export type InputOptions = z.infer<InputOptionsSchemaType>;

export interface DefineConfigOptions {
  locale?: ConfigLocale;
}

export function defineConfig(
  config: unknown,
  options: DefineConfigOptions = {}
): FragmentsConfig {
  const locale = options.locale ?? DEFAULT_LOCALE;
  const schema = SCHEMAS[locale]?.ConfigSchema ?? ConfigSchema;
  return schema.parse(config);
}

export function createFieldSet(config: Pick<FragmentsConfig, "fields">): FieldSet {
  const fieldSet = new FieldSet();
  for (const [name, field] of Object.entries(config.fields)) {
    fieldSet.add(name, field.pattern, {
      cleanup: field.cleanup,
      stripHtml: field.stripHtml
    });
  }
  return fieldSet;
}
