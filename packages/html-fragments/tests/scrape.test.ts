import { describe, expect, it } from "vitest";

import {
  FieldSet,
  collect,
  defineConfig,
  renderFragments,
  scrape,
  scrapeRecords
} from "../src/index.js";

const HTML =
  "<ul><li><b>One</b></li><li><b>Two</b></li><li>none</li></ul>";

describe("scrape", () => {
  it("フィールドがあればレコードを返す", async () => {
    const config = defineConfig({
      selector: "li",
      fields: { title: "<b>(.*?)</b>" }
    });

    expect(await scrape(HTML, config)).toEqual({
      kind: "records",
      records: [{ title: "One" }, { title: "Two" }, { title: null }]
    });
  });

  it("テンプレートがあれば描画結果を逆順で返せる", async () => {
    const config = defineConfig({
      selector: "li",
      fields: { title: "<b>(.*?)</b>" },
      template: "{#title#}!",
      reverse: true
    });

    expect(await scrape(HTML, config)).toEqual({
      kind: "rendered",
      lines: ["!", "Two!", "One!"]
    });
  });

  it("フィールドもテンプレートもなければ断片をそのまま返す", async () => {
    const config = defineConfig({ selector: "li" });

    expect(await scrape(Buffer.from(HTML, "utf8"), config)).toEqual({
      kind: "fragments",
      fragments: ["<li><b>One</b></li>", "<li><b>Two</b></li>", "<li>none</li>"]
    });
  });
});

describe("scrapeRecords / renderFragments", () => {
  it("チャンク単位の非同期入力からレコードを順に生成する", async () => {
    async function* source() {
      yield "<ul><li><b>On";
      yield "e</b></li><li><b>Two</b>";
      yield "</li></ul>";
    }
    const fields = new FieldSet({ title: "<b>(.*?)</b>" });

    expect(await collect(scrapeRecords(source(), "li", fields))).toEqual([
      { title: "One" },
      { title: "Two" }
    ]);
  });

  it("断片ごとにテンプレートを描画する", async () => {
    const fields = new FieldSet({ title: "<b>(.*?)</b>" });
    expect(
      await collect(renderFragments(HTML, "li", fields, "- {#title#}"))
    ).toEqual(["- One", "- Two", "- "]);
  });
});

describe("collect", () => {
  it("同期イテラブルも集めて逆順にできる", async () => {
    expect(await collect(["a", "b", "c"], { reverse: true })).toEqual(["c", "b", "a"]);
  });
});
