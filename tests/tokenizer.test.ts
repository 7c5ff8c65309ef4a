import { describe, expect, test } from "vitest";
import { tokenize } from "../packages/core/src/parser/tokenizer.js";
import { joinSegments, spanText, type Segment } from "../packages/core/src/parser/segments.js";

function kinds(segments: Segment[]): string[] {
  return segments.map((s) => s.kind);
}

function prose(segment: Segment): string[] {
  return segment.translatable.map((span) => spanText(segment, span));
}

describe("tokenizer", () => {
  test("empty input has no segments", () => {
    expect(tokenize("")).toEqual({ segments: [], warnings: [] });
  });

  test("joining segments gives back the document", () => {
    const content = [
      "'''Paris''' is the [[capital city|capital]] of [[France]].{{Citation needed|date=May 2024}}",
      "",
      "== History ==",
      "Founded by the <b>Parisii</b><ref name=\"a\">Smith, p. 3</ref>.",
      "<!-- editors: keep this -->",
      "{| class=\"wikitable\"",
      "! Year !! Population",
      "|-",
      "| 1900 || {{formatnum:2714068}}",
      "|}",
      "See [https://example.org the site] and [[File:Map.png|thumb|A map]].",
      "[[Category:Cities]]",
    ].join("\n");

    const { segments, warnings } = tokenize(content);
    expect(warnings).toEqual([]);
    expect(joinSegments(segments)).toBe(content);
    segments.forEach((segment, index) => {
      expect(segment.index).toBe(index);
      expect(content.slice(segment.start, segment.start + segment.raw.length)).toBe(segment.raw);
    });
  });

  test("nested templates form one segment", () => {
    const { segments } = tokenize("{{a|{{b|x}}}}");
    expect(segments.length).toBe(1);
    expect(segments[0].kind).toBe("template");
    expect(segments[0].raw).toBe("{{a|{{b|x}}}}");
    expect(segments[0].translatable).toEqual([]);
  });

  test("template parameters with triple braces stay inside the template", () => {
    const { segments } = tokenize("{{#if:{{{1|}}}|yes|no}} after");
    expect(kinds(segments)).toEqual(["template", "plain_text"]);
    expect(segments[0].raw).toBe("{{#if:{{{1|}}}|yes|no}}");
  });

  test("plain text is translatable as a whole", () => {
    const { segments } = tokenize("Just prose.");
    expect(segments).toEqual([
      { index: 0, kind: "plain_text", start: 0, raw: "Just prose.", translatable: [{ offset: 0, length: 11 }] },
    ]);
  });

  test("bold and italic quotes are left out of the prose", () => {
    const { segments } = tokenize("'''Paris''' is ''big''.");
    expect(segments.length).toBe(1);
    expect(segments[0].translatable).toEqual([
      { offset: 3, length: 5 },
      { offset: 11, length: 4 },
      { offset: 17, length: 3 },
      { offset: 22, length: 1 },
    ]);
  });

  test("list markers and behavior switches are left out of the prose", () => {
    const segment = tokenize("* one item\n# two\n__NOTOC__\nEnd.").segments[0];
    expect(prose(segment)).toEqual(["one item\n", "two\n", "\nEnd."]);
  });

  test("list markers count only at the start of a line", () => {
    const segment = tokenize("{{x}}\n: indented, 2 * 3").segments[1];
    expect(segment.raw).toBe("\n: indented, 2 * 3");
    expect(prose(segment)).toEqual(["\n", "indented, 2 * 3"]);
    expect(prose(tokenize("{{x}}* 3").segments[1])).toEqual(["* 3"]);
  });

  test("a redirect keeps its keyword out of the prose", () => {
    const { segments } = tokenize("#REDIRECT [[Paris]]");
    expect(kinds(segments)).toEqual(["plain_text", "wikilink"]);
    expect(segments[0].translatable).toEqual([]);
  });

  test("piped wikilink exposes its label", () => {
    const { segments } = tokenize("Hello [[Paris|the capital]] now.");
    expect(kinds(segments)).toEqual(["plain_text", "wikilink", "plain_text"]);
    expect(segments[1].raw).toBe("[[Paris|the capital]]");
    expect(segments[1].start).toBe(6);
    expect(segments[1].translatable).toEqual([{ offset: 8, length: 11 }]);
    expect(prose(segments[1])).toEqual(["the capital"]);
  });

  test("unpiped, category and interlanguage links are opaque", () => {
    for (const link of ["[[Paris]]", "[[Category:Cities|Paris]]", "[[de:Paris|Paris]]", "[[De:Paris|Paris]]"]) {
      const { segments } = tokenize(link);
      expect(segments.length).toBe(1);
      expect(segments[0].kind).toBe("wikilink");
      expect(segments[0].translatable).toEqual([]);
    }
  });

  test("file links expose the caption but not image options", () => {
    const withCaption = tokenize("[[File:Eiffel.jpg|thumb|The tower]]").segments[0];
    expect(withCaption.translatable).toEqual([{ offset: 24, length: 9 }]);
    expect(prose(withCaption)).toEqual(["The tower"]);

    const optionsOnly = tokenize("[[File:Eiffel.jpg|thumb|200px]]").segments[0];
    expect(optionsOnly.translatable).toEqual([]);
  });

  test("links inside a label are protected", () => {
    const segment = tokenize("[[File:Map.png|thumb|Map of [[France]] in 1900]]").segments[0];
    expect(segment.kind).toBe("wikilink");
    expect(prose(segment)).toEqual(["Map of", "in 1900"]);
  });

  test("external link label is translatable, bare link is not", () => {
    const labelled = tokenize("[https://example.org Example site]").segments[0];
    expect(labelled.kind).toBe("external_link");
    expect(labelled.translatable).toEqual([{ offset: 21, length: 12 }]);
    expect(prose(labelled)).toEqual(["Example site"]);

    const bare = tokenize("[https://example.org]").segments[0];
    expect(bare.kind).toBe("external_link");
    expect(bare.translatable).toEqual([]);
  });

  test("brackets without a URL are plain text", () => {
    expect(kinds(tokenize("[not a link]").segments)).toEqual(["plain_text"]);
    expect(kinds(tokenize("[https://example.org\nnext line]").segments)).toEqual(["plain_text"]);
  });

  test("headings expose their title", () => {
    const { segments } = tokenize("== History ==\nText");
    expect(kinds(segments)).toEqual(["heading", "plain_text"]);
    expect(segments[0].raw).toBe("== History ==");
    expect(segments[0].translatable).toEqual([{ offset: 3, length: 7 }]);
    expect(segments[1].raw).toBe("\nText");
  });

  test("a comment after the heading stays with its markup", () => {
    const { segments } = tokenize("== Title == <!-- note -->\nEnd.");
    expect(kinds(segments)).toEqual(["heading", "plain_text"]);
    expect(segments[0].raw).toBe("== Title == <!-- note -->");
    expect(segments[0].translatable).toEqual([{ offset: 3, length: 5 }]);
  });

  test("bold markup in a heading is not prose", () => {
    const heading = tokenize("== '''Early''' life ==").segments[0];
    expect(heading.translatable).toEqual([
      { offset: 6, length: 5 },
      { offset: 14, length: 5 },
    ]);
    expect(prose(heading)).toEqual(["Early", " life"]);
  });

  test("equals signs mid-line are not headings", () => {
    expect(kinds(tokenize("a == b ==").segments)).toEqual(["plain_text"]);
  });

  test("comments are opaque", () => {
    const { segments } = tokenize("Before<!-- note -->after");
    expect(kinds(segments)).toEqual(["plain_text", "comment", "plain_text"]);
    expect(segments[1].raw).toBe("<!-- note -->");
  });

  test("references include their content", () => {
    const { segments } = tokenize('Text<ref name="a">Cite {{x}}</ref> more<ref name="a" />');
    expect(kinds(segments)).toEqual(["plain_text", "reference", "plain_text", "reference"]);
    expect(segments[1].raw).toBe('<ref name="a">Cite {{x}}</ref>');
    expect(segments[3].raw).toBe('<ref name="a" />');
  });

  test("extension tags keep their body verbatim", () => {
    const { segments } = tokenize("a <math>x^2 + [[y]]</math> b");
    expect(kinds(segments)).toEqual(["plain_text", "html_tag", "plain_text"]);
    expect(segments[1].raw).toBe("<math>x^2 + [[y]]</math>");
  });

  test("formatting tags leave their content in the prose", () => {
    const { segments } = tokenize("<b>bold</b>");
    expect(kinds(segments)).toEqual(["html_tag", "plain_text", "html_tag"]);
    expect(segments.map((s) => s.raw)).toEqual(["<b>", "bold", "</b>"]);
  });

  test("unknown tags are plain text", () => {
    expect(kinds(tokenize("a <foo> b").segments)).toEqual(["plain_text"]);
  });

  test("tables are one opaque segment", () => {
    const { segments } = tokenize("{|\n| cell\n|}\nAfter");
    expect(kinds(segments)).toEqual(["table", "plain_text"]);
    expect(segments[0].raw).toBe("{|\n| cell\n|}");
  });

  test("unterminated template keeps the remainder and warns", () => {
    const { segments, warnings } = tokenize("Text {{Infobox|a");
    expect(kinds(segments)).toEqual(["plain_text", "template"]);
    expect(segments[1].raw).toBe("{{Infobox|a");
    expect(warnings).toEqual([
      {
        code: "malformed_markup",
        kind: "template",
        offset: 5,
        message: "Unterminated template at offset 5; kept the remainder as-is",
      },
    ]);
  });

  test("unterminated link and comment are reported", () => {
    const link = tokenize("See [[Paris");
    expect(link.segments[1].raw).toBe("[[Paris");
    expect(link.warnings[0].kind).toBe("wikilink");

    const comment = tokenize("x <!-- open");
    expect(comment.segments[1].kind).toBe("comment");
    expect(comment.warnings[0].message).toBe("Unterminated comment at offset 2; kept the remainder as-is");
  });
});
