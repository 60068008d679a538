import { ConfigError } from "./errors";

/**
 * Validate a chunk size / overlap pair. `overlap` must be strictly below
 * `size`, otherwise the window never advances.
 *
 * @throws {ConfigError} On non-integer, non-positive size or out-of-range overlap.
 */
export function assertChunkParams(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`Chunk size must be a positive integer (got ${size})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`Chunk overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= size) {
    throw new ConfigError(
      `Chunk overlap (=${overlap}) must be smaller than chunk size (=${size})`,
    );
  }
}

/**
 * Split text into overlapping windows of whitespace-delimited tokens.
 *
 * Windows start at token 0 and advance by `size - overlap` until the start
 * reaches the token count; each window is re-joined with single spaces. The
 * trailing window may hold fewer than `size` tokens. Whitespace-only input
 * yields no chunks.
 *
 * @param size Tokens per window.
 * @param overlap Tokens shared by consecutive windows.
 * @returns Ordered list of non-empty chunk strings.
 */
export function splitChunks(text: string, size = 300, overlap = 50): string[] {
  assertChunkParams(size, overlap);
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  const step = size - overlap;
  const out: string[] = [];
  for (let start = 0; start < tokens.length; start += step) {
    out.push(tokens.slice(start, start + size).join(" "));
  }
  return out;
}
