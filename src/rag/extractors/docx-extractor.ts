import mammoth from "mammoth";
import type { PageContent } from "../types.js";
import type { TextExtractor } from "./types.js";

/**
 * DOCX carries no layout, so the body is page 1. Explicit page breaks that
 * survive as form feeds start a new page.
 */
export class DocxExtractor implements TextExtractor {
  readonly extensions = [".docx"];

  async *extract(filePath: string): AsyncGenerator<PageContent> {
    const result = await mammoth.extractRawText({ path: filePath });
    const pages = result.value.split("\f");
    for (let i = 0; i < pages.length; i++) {
      yield { pageNumber: i + 1, text: pages[i] ?? "" };
    }
  }
}
