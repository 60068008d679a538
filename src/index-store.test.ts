import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { EmbeddingProvider } from "./embeddings";
import {
  CorpusNotFoundError,
  DimensionMismatchError,
  EmbeddingError,
  EmptyCorpusError,
  IndexNotFoundError,
} from "./errors";
import { IndexStore } from "./index-store";
import { Persistence, type IndexSnapshot } from "./persistence";
import { StatusManager } from "./status";
import { HashingEmbeddings, makeTempDir, writeCorpus } from "./test-utils";
import type { ChunkPolicy, SearchHit } from "./types";
import {
  FlatInnerProductIndex,
  l2Norm,
  l2Normalize,
  type VectorIndexFactory,
} from "./vector-index";

describe("IndexStore", () => {
  let root: string;
  let corpus: string;
  let storePath: string;

  beforeEach(async () => {
    root = await makeTempDir();
    corpus = path.join(root, "docs");
    storePath = path.join(root, "store", "index.json");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function makeStore(
    embeddings: EmbeddingProvider = new HashingEmbeddings(),
    extra: { policy?: Partial<ChunkPolicy>; status?: StatusManager; indexFactory?: VectorIndexFactory } = {},
  ) {
    return new IndexStore({
      embeddings,
      persistence: new Persistence(storePath),
      policy: extra.policy,
      status: extra.status,
      indexFactory: extra.indexFactory,
    });
  }

  describe("build", () => {
    it("fails when the corpus directory does not exist", async () => {
      await expect(makeStore().build(path.join(root, "missing"))).rejects.toBeInstanceOf(
        CorpusNotFoundError,
      );
    });

    it("fails when the corpus path is a file", async () => {
      await writeCorpus(root, { "file.txt": "hello" });
      await expect(makeStore().build(path.join(root, "file.txt"))).rejects.toMatchObject({
        code: "CORPUS_NOT_FOUND",
      });
    });

    it("fails on an empty corpus instead of writing an empty index", async () => {
      await writeCorpus(corpus, { "notes.pdf": "binary", "data.json": "{}", "blank.txt": " \n " });
      await expect(makeStore().build(corpus)).rejects.toBeInstanceOf(EmptyCorpusError);
      await expect(fs.access(storePath)).rejects.toThrow();
    });

    it("indexes a two-word document as exactly one chunk", async () => {
      await writeCorpus(corpus, { "hello.txt": "hello world" });
      const store = makeStore();
      expect(await store.build(corpus)).toEqual({ entryCount: 1, dimension: 16 });
      expect(store.chunkAt(0)).toEqual({ source: "hello.txt", chunkIndex: 0, text: "hello world" });
    });

    it("reads only top-level .txt and .md files, in file-name order", async () => {
      await writeCorpus(corpus, {
        "b.txt": "bravo text",
        "a.md": "# alpha heading",
        "c.json": '{"x": "ignored"}',
        "d.TXT.bak": "ignored too",
        "sub/e.txt": "nested file",
      });
      const store = makeStore();
      expect((await store.build(corpus)).entryCount).toBe(2);
      expect(store.chunkAt(0)?.source).toBe("a.md");
      expect(store.chunkAt(1)?.source).toBe("b.txt");
    });

    it("numbers chunks per document in source order", async () => {
      const ten = Array.from({ length: 10 }, (_, i) => `w${i}`).join(" ");
      await writeCorpus(corpus, { "a.txt": ten, "b.txt": "short doc" });
      const store = makeStore(undefined, { policy: { chunkSize: 4, chunkOverlap: 1 } });
      expect((await store.build(corpus)).entryCount).toBe(5);
      const chunks = [0, 1, 2, 3, 4].map((i) => store.chunkAt(i));
      expect(chunks.map((c) => `${c?.source}#${c?.chunkIndex}`)).toEqual([
        "a.txt#0",
        "a.txt#1",
        "a.txt#2",
        "a.txt#3",
        "b.txt#0",
      ]);
      expect(chunks[1]?.text).toBe("w3 w4 w5 w6");
    });

    it("stores truncated text but embeds the full chunk", async () => {
      await writeCorpus(corpus, { "long.txt": "abcdefghij klmnop" });
      const embeddings = new HashingEmbeddings();
      const store = makeStore(embeddings, { policy: { textLimit: 10 } });
      await store.build(corpus);
      expect(store.chunkAt(0)?.text).toBe("abcdefghij");
      expect(embeddings.calls).toEqual(["abcdefghij klmnop"]);
    });

    it("persists only unit-length vectors", async () => {
      await writeCorpus(corpus, {
        "a.txt": "the quick brown fox jumps over the lazy dog",
        "b.md": "lorem ipsum dolor sit amet consectetur",
        "c.txt": "retrieval augmented generation with embeddings",
      });
      await makeStore().build(corpus);
      const snap = await new Persistence(storePath).load();
      expect(snap.chunks).toHaveLength(3);
      for (let row = 0; row < snap.chunks.length; row++) {
        const v = snap.vectors.subarray(row * snap.dimension, (row + 1) * snap.dimension);
        expect(l2Norm(v)).toBeCloseTo(1, 5);
      }
    });

    it("produces identical artifacts when rebuilt from an unchanged corpus", async () => {
      await writeCorpus(corpus, { "a.txt": "one two three four five", "b.txt": "six seven" });
      const store = makeStore(undefined, { policy: { chunkSize: 3, chunkOverlap: 1 } });
      const first = await store.build(corpus);
      const snapA = await new Persistence(storePath).load();
      const second = await store.build(corpus);
      const snapB = await new Persistence(storePath).load();
      expect(second).toEqual(first);
      expect(Array.from(snapB.vectors)).toEqual(Array.from(snapA.vectors));
      expect(snapB.chunks).toEqual(snapA.chunks);
    });

    it("fails loudly when the provider changes dimension, keeping the previous index", async () => {
      await writeCorpus(corpus, { "a.txt": "alpha", "b.txt": "bravo" });
      let dims = [4, 4];
      const embeddings: EmbeddingProvider = {
        getModelName: () => "test/shifting",
        embed: async () => Float32Array.from({ length: dims.shift() ?? 0 }, () => 1),
      };
      const store = makeStore(embeddings);
      expect((await store.build(corpus)).dimension).toBe(4);

      dims = [4, 5];
      await expect(store.build(corpus)).rejects.toBeInstanceOf(DimensionMismatchError);
      expect(store.size()).toBe(2);
      expect(store.dimension()).toBe(4);
      expect((await new Persistence(storePath).load()).dimension).toBe(4);
    });

    it("propagates provider failures without writing an index", async () => {
      await writeCorpus(corpus, { "a.txt": "alpha" });
      const embeddings: EmbeddingProvider = {
        getModelName: () => "test/broken",
        embed: async () => {
          throw new EmbeddingError("model offline");
        },
      };
      await expect(makeStore(embeddings).build(corpus)).rejects.toThrow("model offline");
      await expect(new Persistence(storePath).load()).rejects.toBeInstanceOf(IndexNotFoundError);
    });

    it("runs overlapping builds one after the other", async () => {
      await writeCorpus(corpus, { "a.txt": "alpha beta", "b.txt": "gamma delta", "c.txt": "eps" });
      let active = 0;
      let maxActive = 0;
      const inner = new HashingEmbeddings();
      const embeddings: EmbeddingProvider = {
        getModelName: () => inner.getModelName(),
        embed: async (text) => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, 2));
          active--;
          return inner.embed(text);
        },
      };
      const store = makeStore(embeddings);
      const results = await Promise.all([store.build(corpus), store.build(corpus)]);
      expect(results.map((r) => r.entryCount)).toEqual([3, 3]);
      expect(maxActive).toBe(1);
    });

    it("keeps accepting builds after a failed one", async () => {
      const store = makeStore();
      await expect(store.build(path.join(root, "missing"))).rejects.toBeInstanceOf(
        CorpusNotFoundError,
      );
      await writeCorpus(corpus, { "a.txt": "recovered" });
      expect((await store.build(corpus)).entryCount).toBe(1);
    });

    it("reports progress to the status manager", async () => {
      await writeCorpus(corpus, { "a.txt": "alpha", "b.txt": "bravo" });
      const status = new StatusManager();
      await makeStore(undefined, { status }).build(corpus);
      const s = status.getStatus();
      expect(s.ready).toBe(true);
      expect(s.building).toBe(false);
      expect(s.entryCount).toBe(2);
      expect(s.dimension).toBe(16);
      expect(s.indexing).toMatchObject({ documentsDiscovered: 2, chunksTotal: 2, chunksEmbedded: 2 });
    });
  });

  describe("load / search", () => {
    const docs = {
      "cats.txt": "cats purr and sleep all day",
      "dogs.txt": "dogs bark and fetch the ball",
      "fish.md": "fish swim in the water",
      "birds.md": "birds sing and fly south",
    };

    it("searching before any build or load is an explicit error", () => {
      expect(() => makeStore().search(new Float32Array(16), 3)).toThrow(IndexNotFoundError);
    });

    it("ensureLoaded reports a missing index", async () => {
      await expect(makeStore().ensureLoaded()).rejects.toBeInstanceOf(IndexNotFoundError);
    });

    it("returns the same top-k and scores after a persist/load round-trip", async () => {
      await writeCorpus(corpus, docs);
      const embeddings = new HashingEmbeddings();
      const built = makeStore(embeddings);
      const info = await built.build(corpus);

      const loaded = makeStore(embeddings);
      expect(await loaded.load()).toEqual(info);
      expect(loaded.size()).toBe(4);

      for (const q of ["cats sleep", "the ball", "water", "south birds fly"]) {
        const vec = l2Normalize(await embeddings.embed(q));
        for (const k of [1, 2, 4]) {
          const a = built.search(vec, k);
          const b = loaded.search(vec, k);
          expect(b.map((h) => h.index)).toEqual(a.map((h) => h.index));
          b.forEach((hit, i) => expect(hit.score).toBeCloseTo(a[i].score, 6));
        }
      }
    });

    it("keeps a build's index when a lazy load started before it finishes after it", async () => {
      await writeCorpus(corpus, { "old.txt": "old contents" });
      await makeStore().build(corpus);

      let fileRead: () => void = () => undefined;
      const readDone = new Promise<void>((resolve) => {
        fileRead = resolve;
      });
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      class SlowPersistence extends Persistence {
        public async load(): Promise<IndexSnapshot> {
          const snap = await super.load();
          fileRead();
          await gate;
          return snap;
        }
      }
      const store = new IndexStore({
        embeddings: new HashingEmbeddings(),
        persistence: new SlowPersistence(storePath),
      });

      const pending = store.ensureLoaded();
      await readDone;
      await writeCorpus(corpus, { "new.txt": "new contents" });
      expect(await store.build(corpus)).toEqual({ entryCount: 2, dimension: 16 });

      release();
      expect(await pending).toEqual({ entryCount: 2, dimension: 16 });
      expect(store.size()).toBe(2);
      expect(store.chunkAt(0)?.source).toBe("new.txt");
      expect(store.chunkAt(1)?.source).toBe("old.txt");
    });

    it("persist() rewrites the live index", async () => {
      await writeCorpus(corpus, docs);
      const store = makeStore();
      await store.build(corpus);
      await fs.rm(storePath);
      await store.persist();
      expect((await new Persistence(storePath).load()).chunks).toHaveLength(4);
    });

    it("persist() without a live index is an error", async () => {
      await expect(makeStore().persist()).rejects.toBeInstanceOf(IndexNotFoundError);
    });

    it("joins hits with their chunks", async () => {
      await writeCorpus(corpus, docs);
      const embeddings = new HashingEmbeddings();
      const store = makeStore(embeddings);
      await store.build(corpus);
      const [top] = store.searchChunks(l2Normalize(await embeddings.embed("fish swim in the water")), 1);
      expect(top.source).toBe("fish.md");
      expect(top.chunkIndex).toBe(0);
      expect(top.text).toBe("fish swim in the water");
      expect(top.score).toBeCloseTo(1, 5);
    });

    it("drops negative placeholder hits from engines that pad results", async () => {
      const padded: VectorIndexFactory = (dimension, vectors) => {
        const flat = new FlatInnerProductIndex(dimension, vectors);
        return {
          dimension,
          size: () => flat.size(),
          add: (v) => flat.add(v),
          vectors: () => flat.vectors(),
          search: (q, k): SearchHit[] => {
            const hits = flat.search(q, k);
            while (hits.length < k) hits.push({ score: -1, index: -1 });
            return hits;
          },
        };
      };
      await writeCorpus(corpus, { "a.txt": "alpha", "b.txt": "bravo" });
      const store = makeStore(undefined, { indexFactory: padded });
      await store.build(corpus);
      const hits = store.search(new Float32Array(16).fill(0.25), 5);
      expect(hits).toHaveLength(2);
      expect(hits.every((h) => h.index >= 0)).toBe(true);
    });

    it("rejects a query vector of the wrong dimension", async () => {
      await writeCorpus(corpus, docs);
      const store = makeStore();
      await store.build(corpus);
      expect(() => store.search(new Float32Array(8), 2)).toThrow(DimensionMismatchError);
    });
  });
});
