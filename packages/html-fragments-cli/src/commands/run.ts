import type { ConfigLocale, FragmentsConfig } from "html-fragments";

import { DEFAULT_CONFIG_PATH, loadConfig } from "../config-loader.js";
import { STDIN_PATH, reportJobError, runScrapeJob } from "../job.js";

export interface RunCommandOptions {
  config?: string;
  reverse?: boolean;
  pretty?: boolean;
  locale?: string;
}

function toLocale(value: string | undefined): ConfigLocale | undefined {
  return value === "en" || value === "ja" ? value : undefined;
}

function applyOverrides(
  config: FragmentsConfig,
  options: RunCommandOptions
): FragmentsConfig {
  if (options.reverse === undefined) {
    return config;
  }
  return { ...config, reverse: options.reverse };
}

export async function runCommand(
  file: string | undefined,
  options: RunCommandOptions
): Promise<void> {
  const configPath = options.config ?? DEFAULT_CONFIG_PATH;

  try {
    const config = await loadConfig(configPath, toLocale(options.locale));
    await runScrapeJob(
      applyOverrides(config, options),
      file ?? STDIN_PATH,
      { pretty: options.pretty }
    );
  } catch (error) {
    reportJobError("run", error);
  }
}
