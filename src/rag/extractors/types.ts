import type { PageContent } from "../types.js";

export interface TextExtractor {
  /** Lower-case, with the leading dot. */
  readonly extensions: readonly string[];
  extract(filePath: string): AsyncIterable<PageContent>;
}
