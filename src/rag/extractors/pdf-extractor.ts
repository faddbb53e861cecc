import { readFile } from "node:fs/promises";
import { getDocumentProxy } from "unpdf";
import type { PageContent } from "../types.js";
import type { TextExtractor } from "./types.js";

export class PdfExtractor implements TextExtractor {
  readonly extensions = [".pdf"];

  async *extract(filePath: string): AsyncGenerator<PageContent> {
    const buffer = await readFile(filePath);
    const pdf = await getDocumentProxy(new Uint8Array(buffer));

    try {
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const textContent = await page.getTextContent();
        const text = textContent.items
          .map((item) => ("str" in item ? item.str : ""))
          .join(" ");
        yield { pageNumber: i, text };
      }
    } finally {
      await pdf.destroy();
    }
  }
}
