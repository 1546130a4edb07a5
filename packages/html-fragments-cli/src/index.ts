#!/usr/bin/env node
import { Command } from "commander";

import { extractCommand } from "./commands/extract.js";
import { initConfigCommand } from "./commands/init-config.js";
import { runCommand } from "./commands/run.js";
import { DEFAULT_CONFIG_PATH } from "./config-loader.js";

const program = new Command();

program
  .name("html-fragments")
  .description("HTML から繰り返しブロックを切り出し、正規表現でフィールドを抽出するCLIツール")
  .version("0.1.0");

program
  .command("extract")
  .description("HTML ファイルからセレクタに一致する断片を抽出します")
  .argument("<file>", "入力 HTML ファイル（- で標準入力）")
  .argument("<selector>", "セレクタ（例: article.entry）")
  .argument(
    "[fields...]",
    `"名前:正規表現" 形式のフィールド（例: 'url:<a href="(.*?)">'）`
  )
  .option("-t, --template <template>", '出力テンプレート（例: <a href="{#url#}">{#title#}</a>）')
  .option("--reverse", "文書の逆順で出力します")
  .option("--pretty", "JSON を整形して出力します")
  .option("--ignore-stray-end-tags", "対応する開始タグのない終了タグを無視します")
  .option("--encoding <label>", "入力の文字コード", "utf-8")
  .action(async (file: string, selector: string, fields: string[], options) => {
    await extractCommand(file, selector, fields, options);
  });

program
  .command("run")
  .description("設定ファイルに従って HTML から抽出します")
  .argument("[file]", "入力 HTML ファイル（省略時は標準入力）")
  .option("--config <path>", "設定ファイルのパス", DEFAULT_CONFIG_PATH)
  .option("--reverse", "文書の逆順で出力します")
  .option("--pretty", "JSON を整形して出力します")
  .option("--locale <locale>", "設定エラーのメッセージ言語（en|ja）")
  .action(async (file: string | undefined, options) => {
    await runCommand(file, options);
  });

program
  .command("init-config")
  .description("html-fragments.config.ts の雛形を生成します")
  .option("--path <path>", "生成するファイルパス", DEFAULT_CONFIG_PATH)
  .option("--force", "既存ファイルを上書きします")
  .action(async (options) => {
    await initConfigCommand(options);
  });

program.parseAsync(process.argv).catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
