import { describe, expect, it } from "vitest";

import { Selector, SelectorSyntaxError, parseSelector } from "../src/index.js";
import type { Attribute } from "../src/index.js";

function classAttr(value: string): Attribute[] {
  return [{ name: "class", value }];
}

describe("parseSelector", () => {
  it("タグとクラスに分解する", () => {
    expect(parseSelector("li.result-row.active")).toEqual({
      tag: "li",
      classes: ["result-row", "active"]
    });
    expect(parseSelector(".entry")).toEqual({ tag: null, classes: ["entry"] });
    expect(parseSelector("DIV")).toEqual({ tag: "div", classes: [] });
  });

  it.each(["ul li", "ul>li", "h1+p", "", "div..a", "div."])(
    "サポートしないセレクタ %j を拒否する",
    (text) => {
      expect(() => parseSelector(text)).toThrow(SelectorSyntaxError);
    }
  );

  it("エラーに INVALID_SELECTOR コードを持たせる", () => {
    let caught: unknown;
    try {
      parseSelector("ul > li");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SelectorSyntaxError);
    expect(caught).toMatchObject({
      code: "INVALID_SELECTOR",
      selector: "ul > li"
    });
  });
});

describe("Selector.matches", () => {
  it("クラスの順序や余分なクラスに関係なく一致する", () => {
    const selector = new Selector(".a.b");
    expect(selector.matches("div", classAttr("b a c"))).toBe(true);
    expect(selector.matches("div", classAttr("a"))).toBe(false);
  });

  it("タグ名が異なる場合は一致しない", () => {
    expect(new Selector("li.x").matches("div", classAttr("x"))).toBe(false);
    expect(new Selector("LI.x").matches("li", classAttr("x"))).toBe(true);
  });

  it("クラス指定がなければ属性に関係なく一致する", () => {
    const selector = new Selector("div");
    expect(selector.matches("div", [])).toBe(true);
    expect(
      selector.matches("div", [{ name: "id", value: "main" }])
    ).toBe(true);
  });

  it("class 属性がなければ一致しない", () => {
    const selector = new Selector("div.card");
    expect(selector.matches("div", [{ name: "id", value: "card" }])).toBe(false);
    expect(selector.matches("div", [{ name: "class", value: null }])).toBe(false);
  });

  it("前方一致では一致しない", () => {
    expect(new Selector(".item").matches("li", classAttr("item-title"))).toBe(false);
  });
});
