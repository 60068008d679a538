import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IndexNotFoundError, InvalidRequestError } from "./errors";
import type { LanguageDetector } from "./language";
import { QueryPipeline } from "./query";
import {
  createTestService,
  FixedLanguageDetector,
  makeTempDir,
  TableEmbeddings,
  writeCorpus,
} from "./test-utils";

const table = {
  e0: [1, 0, 0, 0],
  e1: [0, 1, 0, 0],
  e2: [0, 0, 1, 0],
  e3: [0, 0, 0, 1],
  e4: [0, 0, 0.6, 0.8],
  "which entries point along the third axis": [0.1, 0.2, 0.9, 0.3],
};
const QUESTION = "which entries point along the third axis";

describe("QueryPipeline", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function builtFixture(detector?: LanguageDetector) {
    const embeddings = new TableEmbeddings(table);
    const fixture = createTestService({ root, embeddings, detector });
    await writeCorpus(fixture.corpusDir, {
      "e0.txt": "e0",
      "e1.txt": "e1",
      "e2.txt": "e2",
      "e3.txt": "e3",
      "e4.txt": "e4",
    });
    await fixture.store.build(fixture.corpusDir);
    embeddings.calls.length = 0;
    return { ...fixture, embeddings };
  }

  it("fails with IndexNotFoundError before any build, without embedding", async () => {
    const embeddings = new TableEmbeddings(table);
    const { pipeline } = createTestService({ root, embeddings });
    await expect(pipeline.query(QUESTION, 3)).rejects.toBeInstanceOf(IndexNotFoundError);
    expect(embeddings.calls).toEqual([]);
  });

  it("ranks entries by cosine similarity to the query", async () => {
    const { pipeline } = await builtFixture();
    const result = await pipeline.query(QUESTION, 3);
    expect(result.query).toBe(QUESTION);
    expect(result.detectedLanguage).toBe("eng");
    expect(result.results.map((r) => r.source)).toEqual(["e2.txt", "e4.txt", "e3.txt"]);
    // query norm is sqrt(0.95)
    expect(result.results[0].score).toBeCloseTo(0.923381, 5);
    expect(result.results[1].score).toBeCloseTo(0.800263, 5);
    expect(result.results[2].score).toBeCloseTo(0.307794, 5);
    expect(result.results[0]).toMatchObject({ chunkIndex: 0, text: "e2" });
  });

  it("returns every entry when k exceeds the index size", async () => {
    const { pipeline } = await builtFixture();
    const result = await pipeline.query(QUESTION, 10);
    expect(result.results.map((r) => r.source)).toEqual([
      "e2.txt",
      "e4.txt",
      "e3.txt",
      "e1.txt",
      "e0.txt",
    ]);
  });

  it("loads the persisted index on first use", async () => {
    await builtFixture();
    const embeddings = new TableEmbeddings(table);
    const fresh = createTestService({ root, embeddings });
    expect(fresh.store.isLoaded()).toBe(false);
    const result = await fresh.pipeline.query(QUESTION, 1);
    expect(fresh.store.isLoaded()).toBe(true);
    expect(result.results.map((r) => r.source)).toEqual(["e2.txt"]);
  });

  it.each([
    ["   ", 3, "query required"],
    ["", 3, "query required"],
    [QUESTION, 0, "k must be a positive integer (got 0)"],
    [QUESTION, -2, "k must be a positive integer (got -2)"],
    [QUESTION, 1.5, "k must be a positive integer (got 1.5)"],
  ])("rejects query=%j k=%d", async (text, k, message) => {
    const { pipeline, embeddings } = await builtFixture();
    const run = pipeline.query(text, k);
    await expect(run).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(run).rejects.toThrow(message);
    expect(embeddings.calls).toEqual([]);
  });

  describe("language annotation", () => {
    it("reports unknown when the detector throws", async () => {
      const throwing: LanguageDetector = {
        detect: () => {
          throw new Error("no profile");
        },
      };
      const { pipeline } = await builtFixture(throwing);
      const result = await pipeline.query(QUESTION, 2);
      expect(result.detectedLanguage).toBe("unknown");
      expect(result.results).toHaveLength(2);
    });

    it("reports unknown when the detector returns nothing", async () => {
      const { pipeline } = await builtFixture(new FixedLanguageDetector(""));
      expect((await pipeline.query(QUESTION, 1)).detectedLanguage).toBe("unknown");
    });

    it("does not change the ranking", async () => {
      const a = await builtFixture(new FixedLanguageDetector("fra"));
      const ranked = await a.pipeline.query(QUESTION, 5);
      const direct = new QueryPipeline({
        store: a.store,
        embeddings: a.embeddings,
        detector: new FixedLanguageDetector("deu"),
      });
      const other = await direct.query(QUESTION, 5);
      expect(ranked.detectedLanguage).toBe("fra");
      expect(other.detectedLanguage).toBe("deu");
      expect(other.results).toEqual(ranked.results);
    });
  });
});
