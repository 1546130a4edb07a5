import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { extractCommand } from "../src/commands/extract.js";

const HTML = `<ul>
  <li class="row"><b>Alpha</b> <i>$1</i></li>
  <li class="row"><b>Beta</b></li>
  <li class="ad"><b>Ad</b></li>
</ul>`;

const tempDirs: string[] = [];

async function createHtmlFile(content: string): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "html-fragments-cli-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, "page.html");
  await writeFile(filePath, content, "utf8");
  return filePath;
}

afterAll(async () => {
  await Promise.all(
    tempDirs.map(async (dir) => {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch {
        // noop
      }
    })
  );
});

describe("extractCommand", () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("フィールド指定からレコードの JSON 配列を出力する", async () => {
    const file = await createHtmlFile(HTML);

    await extractCommand(file, "li.row", ["title:<b>(.*?)</b>", "price:<i>(.*?)</i>"], {});

    expect(written).toEqual([
      '[{"title":"Alpha","price":"$1"},{"title":"Beta","price":null}]\n'
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("フィールドがなければ断片の JSON 配列を出力する", async () => {
    const file = await createHtmlFile(HTML);

    await extractCommand(file, "li.ad", [], {});

    expect(written).toEqual(['["<li class=\\"ad\\"><b>Ad</b></li>"]\n']);
  });

  it("テンプレート指定では断片ごとに1行出力し、逆順にもできる", async () => {
    const file = await createHtmlFile(HTML);

    await extractCommand(file, "li.row", ["title:<b>(.*?)</b>"], {
      template: "* {#title#}"
    });
    expect(written).toEqual(["* Alpha\n", "* Beta\n"]);

    written.length = 0;
    await extractCommand(file, "li.row", ["title:<b>(.*?)</b>"], {
      template: "* {#title#}",
      reverse: true
    });
    expect(written).toEqual(["* Beta\n", "* Alpha\n"]);
  });

  it("テンプレートに未定義のフィールドがあれば失敗として報告する", async () => {
    const file = await createHtmlFile(HTML);

    await extractCommand(file, "li.row", ["title:<b>(.*?)</b>"], {
      template: "{#title#}: {#missing#}"
    });

    expect(written).toEqual([]);
    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '[html-fragments] フィールド "missing" が定義されていません。name:regex の指定漏れではありませんか？'
    );
  });

  it("名前のないフィールド指定は失敗として報告する", async () => {
    const file = await createHtmlFile(HTML);

    await extractCommand(file, "li.row", ["<b>(.*?)</b>"], {});

    expect(written).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it("入れ子の一致は失敗として報告する", async () => {
    const file = await createHtmlFile('<div class="c"><div class="c">x</div></div>');

    await extractCommand(file, "div.c", [], {});

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "[html-fragments] extract に失敗しました:",
      expect.objectContaining({ code: "NESTED_MATCH" })
    );
  });

  it("失敗しても、それまでに抽出した分は逆順指定でも出力する", async () => {
    const file = await createHtmlFile(
      '<div class="c">a</div><div class="c">b</div><div class="c"><div class="c">x</div></div>'
    );

    await extractCommand(file, "div.c", ["t:<div[^>]*>(\\w)"], {
      template: "{#t#}",
      reverse: true
    });
    expect(written).toEqual(["b\n", "a\n"]);

    written.length = 0;
    await extractCommand(file, "div.c", [], {});
    expect(written).toEqual([
      '["<div class=\\"c\\">a</div>","<div class=\\"c\\">b</div>"]\n'
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("読み込めないファイルは失敗として報告する", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "html-fragments-cli-"));
    tempDirs.push(dir);

    await extractCommand(path.join(dir, "missing.html"), "li", [], {});

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "[html-fragments] extract に失敗しました:",
      expect.objectContaining({ code: "STREAM_READ" })
    );
  });
});
