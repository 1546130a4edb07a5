import { describe, expect, it } from "vitest";

import { FieldSpecError, parseFieldSpec, parseFieldSpecs } from "../src/index.js";

describe("parseFieldSpec", () => {
  it("最初のコロンで名前とパターンに分ける", () => {
    expect(parseFieldSpec('url:<a href="(.*?)">')).toEqual({
      name: "url",
      pattern: '<a href="(.*?)">'
    });
    expect(parseFieldSpec("time:(\\d+:\\d+)")).toEqual({
      name: "time",
      pattern: "(\\d+:\\d+)"
    });
  });

  it("名前のない指定を拒否する", () => {
    expect(() => parseFieldSpec("<a href=\"(.*?)\">")).toThrow(FieldSpecError);
    expect(() => parseFieldSpec(":(.*)")).toThrow(/field name is empty/);
  });

  it("複数の指定をまとめてレコードにする", () => {
    expect(parseFieldSpecs(["url:href=\"(.*?)\"", "title:<b>(.*?)</b>"])).toEqual({
      url: 'href="(.*?)"',
      title: "<b>(.*?)</b>"
    });
  });
});
