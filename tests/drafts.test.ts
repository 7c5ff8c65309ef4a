import { mkdtempSync, rmSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DraftEngine, type SiteFactory, type WikiSite } from "../packages/core/src/drafts/engine.js";
import { Database } from "../packages/core/src/storage/sqlite.js";
import { Filesystem } from "../packages/core/src/storage/filesystem.js";
import type { PageContent } from "../packages/core/src/api/types.js";
import type { EditRequest, EditSubmission, RevisionInfo } from "../packages/core/src/publish/guard.js";
import type { TranslationService } from "../packages/core/src/translate/adapter.js";

class FakeSite implements WikiSite {
  readonly pages = new Map<string, PageContent>();
  readonly submitted: EditRequest[] = [];
  private nextRevision = 201;

  addPage(title: string, content: string, revisionId: string): void {
    this.pages.set(title, {
      title,
      content,
      timestamp: "2024-05-01T12:00:00Z",
      revisionId,
      pageId: this.pages.size + 1,
      contentModel: "wikitext",
    });
  }

  async getPageContent(title: string): Promise<PageContent | null> {
    return this.pages.get(title) ?? null;
  }

  async getCurrentRevision(title: string): Promise<RevisionInfo | null> {
    const page = this.pages.get(title);
    return page ? { revisionId: page.revisionId, timestamp: page.timestamp } : null;
  }

  async submitEdit(request: EditRequest): Promise<EditSubmission> {
    this.submitted.push(request);
    const newRevisionId = String(this.nextRevision++);
    this.addPage(request.title, request.text, newRevisionId);
    return { kind: "saved", newRevisionId, unchanged: false };
  }
}

const spanish: TranslationService = {
  name: "fake",
  translate: async (request) => request.text.replace("is a", "es una"),
};

describe("DraftEngine", () => {
  let root: string;
  let db: Database;
  let fs: Filesystem;
  let sites: Record<string, FakeSite>;
  let authRequests: boolean[];
  let engine: DraftEngine;

  beforeEach(async () => {
    root = mkdtempSync(path.join(tmpdir(), "engine-"));
    db = await Database.create(":memory:");
    fs = new Filesystem({ rootDir: root });
    sites = { en: new FakeSite(), es: new FakeSite() };
    sites.en.addPage("Paris", "Paris is a [[City|city]].", "100");
    authRequests = [];

    const factory: SiteFactory = async (lang, options) => {
      authRequests.push(options.auth);
      const site = sites[lang];
      if (!site) throw new Error(`No wiki for ${lang}`);
      return site;
    };
    engine = new DraftEngine(db, fs, factory);
  });

  afterEach(() => {
    db.close();
    rmSync(root, { recursive: true, force: true });
  });

  test("download writes the draft and records its revision", async () => {
    const result = await engine.download({ lang: "en", title: "Paris" });

    expect(result).toEqual({
      lang: "en",
      title: "Paris",
      filepath: "articles/en/Paris.wiki",
      revisionId: "100",
      bytes: 25,
    });
    expect(fs.readFile("articles/en/Paris.wiki")?.content).toBe("Paris is a [[City|city]].");
    expect(db.getDraft("en", "Paris")?.base_revision_id).toBe("100");
    expect(db.getOperationLogs()[0].operation).toBe("download");
  });

  test("download of a missing page fails", async () => {
    await expect(engine.download({ lang: "en", title: "Nowhere" })).rejects.toThrow("Page not found: en:Nowhere");
  });

  test("translate writes a draft for the target wiki", async () => {
    const result = await engine.translate({
      sourceLang: "en",
      title: "Paris",
      targetLang: "es",
      service: spanish,
    });

    expect(result.filepath).toBe("articles/es/Paris.wiki");
    expect(result.baseRevisionId).toBeNull();
    expect(result.sourceRevisionId).toBe("100");
    expect(result.report?.status).toBe("translated");
    expect(fs.readFile(result.filepath)?.content).toBe("Paris es una [[City|city]].");

    const draft = db.getDraft("es", "Paris");
    expect(draft?.origin).toBe("translation");
    expect(draft?.reference_text).toBe("Paris is a [[City|city]].");
    expect(draft?.translation_status).toBe("translated");
    expect(JSON.parse(draft?.translation_stats ?? "{}")).toEqual({
      segments: 3,
      tokens: 2,
      units: 1,
      translated: 1,
      failed: 0,
      warnings: 0,
    });
  });

  test("translate bases the draft on an existing target page", async () => {
    sites.es.addPage("París", "Texto antiguo.", "77");
    const result = await engine.translate({
      sourceLang: "en",
      title: "Paris",
      targetLang: "es",
      targetTitle: "París",
      service: null,
    });

    expect(result.baseRevisionId).toBe("77");
    expect(result.report).toBeNull();
    expect(fs.readFile("articles/es/París.wiki")?.content).toBe("Paris is a [[City|city]].");
    expect(db.getDraft("es", "París")?.translation_status).toBe("copied");
  });

  test("publish saves an edit based on the current revision", async () => {
    await engine.download({ lang: "en", title: "Paris" });
    fs.writeFile("articles/en/Paris.wiki", "Paris is a big [[City|city]].");

    const outcome = await engine.publish({ path: "articles/en/Paris.wiki", summary: "Expand" });

    expect(outcome).toEqual({
      lang: "en",
      title: "Paris",
      filepath: "articles/en/Paris.wiki",
      baseRevisionId: "100",
      result: { status: "published", newRevisionId: "201", unchanged: false },
    });
    expect(sites.en.submitted).toEqual([
      { title: "Paris", baseRevisionId: "100", text: "Paris is a big [[City|city]].", summary: "Expand", minor: undefined },
    ]);
    expect(db.getDraft("en", "Paris")?.base_revision_id).toBe("201");
    expect(engine.status().map((s) => s.state)).toEqual(["unchanged"]);
    expect(authRequests[authRequests.length - 1]).toBe(true);
  });

  test("publish refuses when the page changed since the download", async () => {
    await engine.download({ lang: "en", title: "Paris" });
    sites.en.addPage("Paris", "Someone else's edit.", "105");
    fs.writeFile("articles/en/Paris.wiki", "My edit.");

    const outcome = await engine.publish({ path: "articles/en/Paris.wiki", summary: "Expand" });

    expect(outcome.result).toEqual({ status: "edit_conflict", source: "guard", remoteRevisionId: "105" });
    expect(sites.en.submitted).toEqual([]);
    expect(db.getDraft("en", "Paris")?.base_revision_id).toBe("100");
    expect(db.getOperationLogs()[0].status).toBe("edit_conflict");
  });

  test("publish of a translation creates the page", async () => {
    await engine.translate({ sourceLang: "en", title: "Paris", targetLang: "es", service: spanish });
    const outcome = await engine.publish({ path: "articles/es/Paris.wiki", summary: "Traducción" });

    expect(outcome.result.status).toBe("published");
    expect(sites.es.submitted[0].baseRevisionId).toBeNull();
  });

  test("dry run only checks the revision", async () => {
    await engine.download({ lang: "en", title: "Paris" });
    const outcome = await engine.publish({ path: "articles/en/Paris.wiki", summary: "x", dryRun: true });

    expect(outcome.result).toEqual({
      status: "current",
      remote: { revisionId: "100", timestamp: "2024-05-01T12:00:00Z" },
    });
    expect(sites.en.submitted).toEqual([]);
    expect(authRequests).toEqual([false, false]);
  });

  test("publish needs a recorded base revision", async () => {
    fs.writeFile("articles/fr/Nouveau.wiki", "Texte.");
    await expect(engine.publish({ path: "articles/fr/Nouveau.wiki", summary: "x" })).rejects.toThrow(
      "No base revision recorded for fr:Nouveau; download or translate it first"
    );
  });

  test("preview compares the draft with the source article", async () => {
    await engine.translate({ sourceLang: "en", title: "Paris", targetLang: "es", service: spanish });
    fs.writeFile("articles/es/Paris.wiki", "Paris es una ciudad.");

    const { report, draft } = engine.preview("articles/es/Paris.wiki");

    expect(draft?.title).toBe("Paris");
    expect(report.ok).toBe(false);
    expect(report.missingLinks).toEqual(["City"]);
    expect(report.edits.removedLines).toBe(1);
    expect(report.edits.addedLines).toBe(1);
  });

  test("status tells modified and missing drafts apart", async () => {
    await engine.download({ lang: "en", title: "Paris" });
    await engine.translate({ sourceLang: "en", title: "Paris", targetLang: "es", service: spanish });
    fs.writeFile("articles/en/Paris.wiki", "Changed.");
    unlinkSync(path.join(root, "articles", "es", "Paris.wiki"));

    expect(engine.status().map((s) => [s.record.lang, s.state])).toEqual([
      ["en", "modified"],
      ["es", "missing"],
    ]);
  });
});
