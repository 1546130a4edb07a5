import { defineConfig, parseFieldSpecs } from "html-fragments";

import { reportJobError, runScrapeJob } from "../job.js";

export interface ExtractCommandOptions {
  template?: string;
  reverse?: boolean;
  pretty?: boolean;
  ignoreStrayEndTags?: boolean;
  encoding?: string;
}

export async function extractCommand(
  file: string,
  selector: string,
  fieldSpecs: string[],
  options: ExtractCommandOptions
): Promise<void> {
  try {
    const config = defineConfig({
      selector,
      fields: parseFieldSpecs(fieldSpecs),
      template: options.template,
      reverse: options.reverse ?? false,
      input: {
        ...(options.encoding ? { encoding: options.encoding } : {}),
        strayEndTags: options.ignoreStrayEndTags ? "ignore" : "throw"
      }
    });

    await runScrapeJob(config, file, { pretty: options.pretty });
  } catch (error) {
    reportJobError("extract", error);
  }
}
