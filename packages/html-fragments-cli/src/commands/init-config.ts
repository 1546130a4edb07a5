import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { DEFAULT_CONFIG_PATH } from "../config-loader.js";

export interface InitConfigCommandOptions {
  path?: string;
  force?: boolean;
}

export const TEMPLATE_TS = `import { defineConfig } from 'html-fragments';

export default defineConfig({
  selector: 'li.result-row',
  fields: {
    url: '<a href="([^"]*)"',
    title: '<h3[^>]*>([\\\\s\\\\S]*?)</h3>',
    price: {
      pattern: '<span class="result-price">([\\\\s\\\\S]*?)</span>',
      stripHtml: true
    }
  },
  template: '<a href="{#url#}">{#title#}</a> {#price#}',
  reverse: true
});
`;

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function initConfigCommand(
  options: InitConfigCommandOptions = {}
): Promise<void> {
  const targetPath = path.resolve(options.path ?? DEFAULT_CONFIG_PATH);

  if (!options.force && (await fileExists(targetPath))) {
    console.error(
      `[html-fragments] ${targetPath} は既に存在します。--force を指定すると上書きできます。`
    );
    process.exitCode = 1;
    return;
  }

  const dir = path.dirname(targetPath);
  await mkdir(dir, { recursive: true });
  await writeFile(targetPath, TEMPLATE_TS, "utf8");
  console.log(
    `[html-fragments] 設定ファイルの雛形を生成しました: ${targetPath}`
  );
}
