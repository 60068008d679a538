import { franc } from "franc";

/** Value reported when a query's language cannot be determined. */
export const UNKNOWN_LANGUAGE = "unknown";

/**
 * Best-effort language annotation for queries. Implementations return a
 * language code, or {@link UNKNOWN_LANGUAGE}; they may also throw, which the
 * query pipeline downgrades to {@link UNKNOWN_LANGUAGE}.
 */
export interface LanguageDetector {
  detect(text: string): string;
}

/**
 * Trigram-based detector (franc). Returns ISO 639-3 codes such as `eng`,
 * `fra`, `deu`; text shorter than `minLength` characters is undetermined.
 */
export class FrancLanguageDetector implements LanguageDetector {
  private readonly minLength: number;

  public constructor(minLength = 10) {
    this.minLength = minLength;
  }

  public detect(text: string): string {
    const code = franc(text, { minLength: this.minLength });
    return code === "und" ? UNKNOWN_LANGUAGE : code;
  }
}
