import OpenAI from "openai";
import { SynthesisError } from "./errors";
import type { SearchResult } from "./types";

/** Turns a query plus its ranked passages into a short cited answer. */
export interface AnswerSynthesizer {
  synthesize(query: string, chunks: readonly SearchResult[]): Promise<string>;
}

export const CITATIONS_ONLY_MESSAGE =
  "LLM synthesis not configured; returning cited passages instead.";

/** Used when no LLM credential is configured. Never fails. */
export class CitationsOnlySynthesizer implements AnswerSynthesizer {
  public async synthesize(): Promise<string> {
    return CITATIONS_ONLY_MESSAGE;
  }
}

/** Single-message prompt listing each passage as `[source | chunk N]: text`. */
export function buildAnswerPrompt(query: string, chunks: readonly SearchResult[]): string {
  let prompt =
    "You are a helpful assistant. Use the following source passages to answer the query. " +
    "Cite each passage by filename and chunk index in square brackets.\n\n" +
    `Query: ${query}\n\nSources:\n`;
  for (const c of chunks) {
    prompt += `[${c.source} | chunk ${c.chunkIndex}]: ${c.text}\n\n`;
  }
  prompt +=
    "\nProvide a concise answer in the same language as the query and include citations like [file.txt|chunk 0].";
  return prompt;
}

export interface OpenAiSynthesizerOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  baseURL?: string;
}

export class OpenAiSynthesizer implements AnswerSynthesizer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;

  public constructor(opts: OpenAiSynthesizerOptions) {
    this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
    this.model = opts.model ?? "gpt-4o-mini";
    this.maxTokens = opts.maxTokens ?? 200;
  }

  public async synthesize(query: string, chunks: readonly SearchResult[]): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: buildAnswerPrompt(query, chunks) }],
        max_tokens: this.maxTokens,
        temperature: 0,
      });
      return (response.choices[0]?.message?.content ?? "").trim();
    } catch (e) {
      throw new SynthesisError(`Answer synthesis with ${this.model} failed`, { cause: e });
    }
  }
}

/** OpenAI-backed synthesizer when a key is present, citations-only otherwise. */
export function createSynthesizer(opts: Partial<OpenAiSynthesizerOptions>): AnswerSynthesizer {
  const apiKey = opts.apiKey?.trim();
  if (!apiKey) return new CitationsOnlySynthesizer();
  return new OpenAiSynthesizer({ ...opts, apiKey });
}
