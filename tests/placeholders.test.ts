import { describe, expect, test } from "vitest";
import { tokenize } from "../packages/core/src/parser/tokenizer.js";
import {
  PlaceholderCollisionError,
  PlaceholderContext,
  protect,
} from "../packages/core/src/translate/placeholders.js";
import {
  checkPlaceholders,
  reassemble,
  ReassemblyError,
  restore,
} from "../packages/core/src/translate/reassemble.js";

function protectText(text: string) {
  return protect(tokenize(text).segments);
}

describe("placeholder mapper", () => {
  test("replaces link markup around the label with tokens", () => {
    const doc = protectText("Hello [[Paris|the capital]] now.");
    expect(doc.text).toBe("Hello ⟦0⟧the capital⟦1⟧ now.");
    expect(doc.table.size).toBe(2);
    expect(doc.table.get("⟦0⟧")).toEqual({
      token: "⟦0⟧",
      segmentIndex: 1,
      kind: "wikilink",
      text: "[[Paris|",
      order: 0,
    });
    expect(doc.table.get("⟦1⟧")?.text).toBe("]]");
  });

  test("quote and list markup in prose become tokens", () => {
    const doc = protectText("'''Paris''' is ''big''.\n* one item");
    expect(doc.text).toBe("⟦0⟧Paris⟦1⟧ is ⟦2⟧big⟦3⟧.\n⟦4⟧one item");
    expect(doc.table.get("⟦0⟧")).toEqual({
      token: "⟦0⟧",
      segmentIndex: 0,
      kind: "plain_text",
      text: "'''",
      order: 0,
    });
    expect(doc.table.get("⟦4⟧")?.text).toBe("* ");
    expect(restore(doc)).toBe("'''Paris''' is ''big''.\n* one item");
  });

  test("opaque segments become a single token", () => {
    const doc = protectText("{{Infobox|name=Paris}}\nParis is a city.");
    expect(doc.text).toBe("⟦0⟧\nParis is a city.");
    expect(doc.table.get("⟦0⟧")?.text).toBe("{{Infobox|name=Paris}}");
    expect(doc.pieces.map((p) => p.tokens)).toEqual([["⟦0⟧"], []]);
  });

  test("restore without translation is the identity", () => {
    const content = [
      "== Early life ==",
      "Born in [[Lyon|the city of Lyon]]<ref>Source</ref>, she studied <i>law</i>.",
      "{{Quote|text=Hello}} See [https://example.org this page].",
    ].join("\n");
    expect(restore(protectText(content))).toBe(content);
  });

  test("picks other delimiters when the document uses the default ones", () => {
    const context = new PlaceholderContext("Brackets ⟦like this⟧");
    expect(context.table.delimiters).toEqual({ open: "⟪", close: "⟫" });

    const segments = tokenize("{{x}} Brackets ⟦like this⟧").segments;
    const doc = protect(segments);
    expect(doc.text).toBe("⟪0⟫ Brackets ⟦like this⟧");
    expect(restore(doc)).toBe("{{x}} Brackets ⟦like this⟧");
  });

  test("throws when every delimiter pair is in the document", () => {
    expect(() => new PlaceholderContext("⟦ ⟪ ⦃ 〚")).toThrow(PlaceholderCollisionError);
  });

  test("each context numbers its tokens from zero", () => {
    const first = protectText("{{a}} x {{b}}");
    const second = protectText("{{c}}");
    expect(first.table.tokens()).toEqual(["⟦0⟧", "⟦1⟧"]);
    expect(second.table.tokens()).toEqual(["⟦0⟧"]);
  });
});

describe("reassembler", () => {
  const doc = protectText("Hello [[Paris|the capital]] now.");

  test("puts markup back around translated prose", () => {
    expect(reassemble("Hola ⟦0⟧la capital⟦1⟧ ahora.", doc.table)).toBe("Hola [[Paris|la capital]] ahora.");
  });

  test("tolerates whitespace inside tokens", () => {
    expect(reassemble("Hola ⟦ 0 ⟧la capital⟦1 ⟧ ahora.", doc.table)).toBe("Hola [[Paris|la capital]] ahora.");
  });

  test("reports a missing token", () => {
    expect(checkPlaceholders("Hola ⟦0⟧la capital ahora.", doc.table)).toEqual([
      { kind: "missing", token: "⟦1⟧" },
    ]);
  });

  test("reports a duplicated token", () => {
    expect(checkPlaceholders("⟦0⟧⟦0⟧x⟦1⟧", doc.table)).toEqual([{ kind: "duplicated", token: "⟦0⟧" }]);
  });

  test("reports an unknown token", () => {
    expect(checkPlaceholders("⟦0⟧x⟦1⟧⟦7⟧", doc.table)).toEqual([{ kind: "unknown", token: "⟦7⟧" }]);
  });

  test("reports a stray delimiter", () => {
    expect(checkPlaceholders("⟦0⟧x⟦1⟧ ⟦", doc.table)).toEqual([{ kind: "malformed", token: "⟦" }]);
  });

  test("reports tokens of one segment in the wrong order", () => {
    expect(checkPlaceholders("⟦1⟧x⟦0⟧", doc.table)).toEqual([{ kind: "reordered", token: "⟦0⟧" }]);
  });

  test("reassemble throws with every problem", () => {
    let caught: unknown;
    try {
      reassemble("Hola la capital ahora.", doc.table);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ReassemblyError);
    if (caught instanceof ReassemblyError) {
      expect(caught.problems).toEqual([
        { kind: "missing", token: "⟦0⟧" },
        { kind: "missing", token: "⟦1⟧" },
      ]);
      expect(caught.message).toBe("Placeholder integrity check failed: missing ⟦0⟧, missing ⟦1⟧");
    }
  });

  test("formatting tokens in prose may move with their words", () => {
    const doc = protectText("''a'' and ''b''");
    expect(doc.text).toBe("⟦0⟧a⟦1⟧ and ⟦2⟧b⟦3⟧");
    expect(reassemble("⟦2⟧b⟦3⟧ y ⟦0⟧a⟦1⟧", doc.table)).toBe("''b'' y ''a''");
  });

  test("tokens of different segments may move relative to each other", () => {
    const twoLinks = protectText("[[A|one]] and [[B|two]]");
    expect(twoLinks.text).toBe("⟦0⟧one⟦1⟧ and ⟦2⟧two⟦3⟧");
    expect(reassemble("⟦2⟧dos⟦3⟧ y ⟦0⟧uno⟦1⟧", twoLinks.table)).toBe("[[B|dos]] y [[A|uno]]");
  });
});
