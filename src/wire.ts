/**
 * JSON payloads shared by the HTTP and MCP surfaces. Field names are
 * snake_case on the wire.
 */
import { z } from "zod";
import { describeError, InvalidRequestError } from "./errors";
import type { AnswerReport, QueryReport, RebuildReport } from "./service";
import type { SearchResult } from "./types";

export interface WireResult {
  score: number;
  source: string;
  chunk_index: number;
  text: string;
}

export function toWireResult(r: SearchResult): WireResult {
  return { score: r.score, source: r.source, chunk_index: r.chunkIndex, text: r.text };
}

export function rebuildPayload(report: RebuildReport) {
  return {
    status: "ok" as const,
    entry_count: report.entryCount,
    dimension: report.dimension,
    elapsed_time: report.elapsedTime,
  };
}

export function queryPayload(report: QueryReport) {
  return {
    status: "ok" as const,
    query: report.query,
    detected_language: report.detectedLanguage,
    results: report.results.map(toWireResult),
    elapsed_time: report.elapsedTime,
  };
}

export function answerPayload(report: AnswerReport) {
  return { ...queryPayload(report), answer: report.answer };
}

export function errorPayload(err: unknown) {
  return { status: "error" as const, ...describeError(err) };
}

/** `{ query, k? }` request body; `k` may arrive as a numeric string. */
export const queryRequestSchema = z.object({
  query: z.string().trim().min(1, "query required"),
  k: z.coerce.number().int("k must be an integer").positive("k must be positive").optional(),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

/**
 * Validate an untrusted query body.
 *
 * @throws {InvalidRequestError} With the first validation message.
 */
export function parseQueryRequest(body: unknown): QueryRequest {
  const parsed = queryRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const message =
      issue?.path[0] === "query" && issue.code === "invalid_type"
        ? "query required"
        : issue?.message ?? "invalid request";
    throw new InvalidRequestError(message);
  }
  return parsed.data;
}
