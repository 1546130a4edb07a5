import { readFile } from "node:fs/promises";
import path from "node:path";

import {
  defineConfig,
  type ConfigLocale,
  type FragmentsConfig
} from "html-fragments";
import { bundleRequire } from "bundle-require";

export const DEFAULT_CONFIG_PATH = "html-fragments.config.ts";

async function loadConfigModule(resolvedPath: string): Promise<unknown> {
  const ext = path.extname(resolvedPath).toLowerCase();

  if (ext === ".json") {
    const raw = await readFile(resolvedPath, "utf8");
    return JSON.parse(raw);
  }

  const { mod } = await bundleRequire({
    filepath: resolvedPath
  });

  if (mod?.default) {
    return mod.default;
  }

  if (mod?.config) {
    return mod.config;
  }

  return mod;
}

export async function loadConfig(
  configPath: string,
  locale?: ConfigLocale
): Promise<FragmentsConfig> {
  const mod = await loadConfigModule(path.resolve(configPath));
  return defineConfig(mod, { locale });
}
