import { afterEach, describe, expect, test, vi } from "vitest";
import { tokenize } from "../packages/core/src/parser/tokenizer.js";
import { protect } from "../packages/core/src/translate/placeholders.js";
import type { TranslationUnit } from "../packages/core/src/translate/batching.js";
import {
  hasTranslatableText,
  translateBatch,
  type TranslationRequest,
  type TranslationService,
} from "../packages/core/src/translate/adapter.js";
import { LibreTranslateService } from "../packages/core/src/translate/libretranslate.js";

function unit(id: number, text: string, tokens: string[] = []): TranslationUnit {
  return { id, sourceLang: "en", targetLang: "es", text, segmentIndexes: [id], tokens };
}

function service(translate: (request: TranslationRequest, signal: AbortSignal) => Promise<string>): TranslationService {
  return { name: "fake", translate };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("hasTranslatableText", () => {
  test("needs letters outside tokens", () => {
    const doc = protect(tokenize("{{a}} 123 {{b}}").segments);
    expect(hasTranslatableText(doc.text, doc.table)).toBe(false);
    expect(hasTranslatableText("Straße")).toBe(true);
    expect(hasTranslatableText(" 42, 7 ")).toBe(false);
  });
});

describe("translateBatch", () => {
  test("translates units and keeps edge whitespace", async () => {
    const translate = vi.fn(async (request: TranslationRequest) => request.text.toUpperCase());
    const outcomes = await translateBatch([unit(0, "  hello world\n")], service(translate));

    expect(outcomes).toEqual([{ unitId: 0, status: "translated", text: "  HELLO WORLD\n" }]);
    expect(translate).toHaveBeenCalledWith({ text: "hello world", sourceLang: "en", targetLang: "es" }, expect.any(AbortSignal));
  });

  test("skips units without prose", async () => {
    const translate = vi.fn(async (request: TranslationRequest) => request.text);
    const doc = protect(tokenize("{{a}}\n\n{{b}}").segments);
    const outcomes = await translateBatch(
      [unit(0, doc.text, doc.table.tokens())],
      service(translate),
      { table: doc.table }
    );

    expect(outcomes).toEqual([{ unitId: 0, status: "skipped", text: "⟦0⟧\n\n⟦1⟧" }]);
    expect(translate).not.toHaveBeenCalled();
  });

  test("identical text is sent once", async () => {
    const translate = vi.fn(async (request: TranslationRequest) => `[${request.text}]`);
    const outcomes = await translateBatch([unit(0, "hello"), unit(1, "hello")], service(translate));

    expect(outcomes.map((o) => o.text)).toEqual(["[hello]", "[hello]"]);
    expect(translate).toHaveBeenCalledTimes(1);
  });

  test("a failing unit keeps its text and the others go on", async () => {
    const translate = vi.fn(async (request: TranslationRequest) => {
      if (request.text.includes("bad")) throw new Error("quota exceeded");
      return request.text.toUpperCase();
    });
    const outcomes = await translateBatch(
      [unit(0, "good one"), unit(1, "bad one"), unit(2, "good two")],
      service(translate)
    );

    expect(outcomes).toEqual([
      { unitId: 0, status: "translated", text: "GOOD ONE" },
      { unitId: 1, status: "failed", text: "bad one", error: "quota exceeded" },
      { unitId: 2, status: "translated", text: "GOOD TWO" },
    ]);
  });

  test("empty translation fails the unit", async () => {
    const outcomes = await translateBatch([unit(0, "hello")], service(async () => "   "));
    expect(outcomes[0]).toEqual({
      unitId: 0,
      status: "failed",
      text: "hello",
      error: "Translation service returned no text",
    });
  });

  test("lost placeholders fail the unit", async () => {
    const doc = protect(tokenize("Hello [[Paris|the capital]] now.").segments);
    const outcomes = await translateBatch(
      [unit(0, doc.text, doc.table.tokens())],
      service(async () => "Hola la capital ahora."),
      { table: doc.table }
    );

    expect(outcomes[0].status).toBe("failed");
    expect(outcomes[0].text).toBe(doc.text);
    expect(outcomes[0].error).toBe("Placeholder mismatch: missing ⟦0⟧, missing ⟦1⟧");
  });

  test("a slow unit times out", async () => {
    const outcomes = await translateBatch(
      [unit(0, "hello")],
      service(() => new Promise<string>(() => {})),
      { timeoutMs: 20 }
    );
    expect(outcomes[0]).toEqual({
      unitId: 0,
      status: "failed",
      text: "hello",
      error: "Translation timed out after 20ms",
    });
  });

  test("the service sees the abort on timeout", async () => {
    let aborted = false;
    await translateBatch(
      [unit(0, "hello")],
      service(
        (_request, signal) =>
          new Promise<string>((_resolve, reject) => {
            signal.addEventListener("abort", () => {
              aborted = true;
              reject(new Error("aborted"));
            });
          })
      ),
      { timeoutMs: 20 }
    );
    expect(aborted).toBe(true);
  });

  test("a cancelled batch fails every unit", async () => {
    const controller = new AbortController();
    controller.abort();
    const translate = vi.fn(async (request: TranslationRequest) => request.text);
    const outcomes = await translateBatch([unit(0, "one"), unit(1, "two")], service(translate), {
      signal: controller.signal,
    });

    expect(outcomes.map((o) => o.error)).toEqual(["Translation cancelled", "Translation cancelled"]);
    expect(translate).not.toHaveBeenCalled();
  });

  test("limits units in flight and keeps unit order", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const delays: Record<string, number> = { a: 30, b: 5, c: 20, d: 1, e: 10 };

    const outcomes = await translateBatch(
      ["a", "b", "c", "d", "e"].map((text, id) => unit(id, text)),
      service(async (request) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await sleep(delays[request.text]);
        inFlight--;
        return request.text.toUpperCase();
      }),
      { concurrency: 2 }
    );

    expect(maxInFlight).toBe(2);
    expect(outcomes.map((o) => o.text)).toEqual(["A", "B", "C", "D", "E"]);
  });

  test("reports progress per unit", async () => {
    const progress: Array<[number, number]> = [];
    await translateBatch([unit(0, "one"), unit(1, "two")], service(async (r) => r.text), {
      concurrency: 1,
      onProgress: (completed, total) => progress.push([completed, total]),
    });
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });
});

describe("LibreTranslateService", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("posts the text and returns the translation", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(JSON.stringify({ translatedText: "Hola" }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const libre = new LibreTranslateService({ endpoint: "https://translate.test/translate", apiKey: "test-secret" });
    const result = await libre.translate(
      { text: "Hello", sourceLang: "en", targetLang: "es" },
      new AbortController().signal
    );

    expect(result).toBe("Hola");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://translate.test/translate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      q: "Hello",
      source: "en",
      target: "es",
      format: "text",
      api_key: "test-secret",
    });
  });

  test("surfaces the service error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ error: "Invalid language" }), { status: 400 }))
    );
    const libre = new LibreTranslateService();
    await expect(
      libre.translate({ text: "Hello", sourceLang: "en", targetLang: "xx" }, new AbortController().signal)
    ).rejects.toThrow("HTTP 400: Invalid language");
  });

  test("rejects a response without translatedText", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("{}", { status: 200 })));
    const libre = new LibreTranslateService();
    await expect(
      libre.translate({ text: "Hello", sourceLang: "en", targetLang: "es" }, new AbortController().signal)
    ).rejects.toThrow("Translation API response missing translatedText");
  });
});
