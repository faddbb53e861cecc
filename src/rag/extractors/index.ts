import { DocxExtractor } from "./docx-extractor.js";
import { PdfExtractor } from "./pdf-extractor.js";
import type { TextExtractor } from "./types.js";

export type ExtractorRegistry = ReadonlyMap<string, TextExtractor>;

export function createExtractorRegistry(extractors: TextExtractor[]): ExtractorRegistry {
  const registry = new Map<string, TextExtractor>();
  for (const extractor of extractors) {
    for (const ext of extractor.extensions) registry.set(ext.toLowerCase(), extractor);
  }
  return registry;
}

export function defaultExtractors(): ExtractorRegistry {
  return createExtractorRegistry([new PdfExtractor(), new DocxExtractor()]);
}

export { PdfExtractor } from "./pdf-extractor.js";
export { DocxExtractor } from "./docx-extractor.js";
export type { TextExtractor } from "./types.js";
