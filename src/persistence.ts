import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { IndexCorruptError, IndexNotFoundError } from "./errors";
import type { Chunk, ChunkPolicy } from "./types";

/** Bumped whenever the on-disk layout changes incompatibly. */
export const STORE_VERSION = 2;

/**
 * Everything needed to bring an index back to life: the row-major vector
 * matrix and the parallel chunk metadata (row `i` belongs to `chunks[i]`).
 */
export interface IndexSnapshot {
  readonly dimension: number;
  readonly vectors: Float32Array;
  readonly chunks: readonly Chunk[];
  readonly modelName: string;
  readonly policy: ChunkPolicy;
  /** ISO timestamp; set by {@link Persistence.save} when written. */
  readonly savedAt?: string;
}

const storedChunkSchema = z.object({
  source: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
});

const storeFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  meta: z.object({
    dimension: z.number().int().positive(),
    count: z.number().int().nonnegative(),
    modelName: z.string(),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    textLimit: z.number().int().positive(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  /** Whole matrix as little-endian float32, base64 encoded. */
  vectors: z.string(),
  chunks: z.array(storedChunkSchema),
});

type StoreFile = z.infer<typeof storeFileSchema>;

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

function encodeVectors(vectors: Float32Array): string {
  return Buffer.from(vectors.buffer, vectors.byteOffset, vectors.byteLength).toString("base64");
}

function decodeVectors(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  // copy into a fresh, 4-byte aligned buffer
  const bytes = new Uint8Array(buf);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / 4);
}

/**
 * Reads and writes the persisted index. Vectors and chunk metadata live in a
 * single JSON container replaced by temp-file + rename, so a reader observes
 * either the previous or the new index, never a mix of the two.
 */
export class Persistence {
  private readonly storePath: string;
  private readonly verbose: boolean;

  /**
   * @param storePath File path of the JSON container.
   * @param verbose   Log every save / load.
   */
  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public getStorePath(): string {
    return this.storePath;
  }

  /**
   * Load the persisted index.
   *
   * @throws {IndexNotFoundError} If no index has been written yet.
   * @throws {IndexCorruptError} If the file is unreadable, malformed, or its
   *         vector and chunk counts disagree.
   */
  public async load(): Promise<IndexSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) throw new IndexNotFoundError(this.storePath);
      throw new IndexCorruptError(this.storePath, "cannot be read", { cause: e });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new IndexCorruptError(this.storePath, "not valid JSON", { cause: e });
    }
    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new IndexCorruptError(this.storePath, parsed.error.issues[0]?.message ?? "bad layout", {
        cause: parsed.error,
      });
    }
    const { meta, chunks } = parsed.data;

    const vectors = decodeVectors(parsed.data.vectors);
    if (!vectors || vectors.length % meta.dimension !== 0) {
      throw new IndexCorruptError(
        this.storePath,
        `vector payload is not a whole number of ${meta.dimension}-d vectors`,
      );
    }
    const vectorCount = vectors.length / meta.dimension;
    if (vectorCount !== chunks.length || vectorCount !== meta.count) {
      throw new IndexCorruptError(
        this.storePath,
        `entry count mismatch (vectors=${vectorCount}, chunks=${chunks.length}, recorded=${meta.count})`,
      );
    }

    console.error(`[RAG] Loaded persisted index: ${vectorCount} entries (dim=${meta.dimension}).`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${this.storePath}`);
    return {
      dimension: meta.dimension,
      vectors,
      chunks,
      modelName: meta.modelName,
      policy: {
        chunkSize: meta.chunkSize,
        chunkOverlap: meta.chunkOverlap,
        textLimit: meta.textLimit,
      },
      savedAt: meta.savedAt,
    };
  }

  /** Persist a snapshot, replacing any previous index in one rename. */
  public async save(snapshot: IndexSnapshot): Promise<void> {
    const count = snapshot.chunks.length;
    if (snapshot.vectors.length !== count * snapshot.dimension) {
      throw new IndexCorruptError(
        this.storePath,
        `refusing to write ${snapshot.vectors.length} floats for ${count} chunks of dim ${snapshot.dimension}`,
      );
    }
    const out: StoreFile = {
      version: STORE_VERSION,
      meta: {
        dimension: snapshot.dimension,
        count,
        modelName: snapshot.modelName,
        chunkSize: snapshot.policy.chunkSize,
        chunkOverlap: snapshot.policy.chunkOverlap,
        textLimit: snapshot.policy.textLimit,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      vectors: encodeVectors(snapshot.vectors),
      chunks: snapshot.chunks.map((c) => ({
        source: c.source,
        chunkIndex: c.chunkIndex,
        text: c.text,
      })),
    };

    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const tmp = `${this.storePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(out));
      await fs.rename(tmp, this.storePath);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
    if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
  }
}
