import { createHash } from "node:crypto";
import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { DocumentNotFoundError, SourceReadError, errorMessage } from "./errors.js";
import type { ExtractorRegistry } from "./extractors/index.js";
import type { PageContent, SourceDocument } from "./types.js";

export interface SkippedFile {
  documentId: string;
  reason: string;
}

export interface DocumentListing {
  documents: SourceDocument[];
  /** Supported files that exist but could not be read this pass. */
  skipped: SkippedFile[];
}

export interface LoadedDocument {
  document: SourceDocument;
  pages: PageContent[];
}

export interface DocumentSource {
  list(): Promise<DocumentListing>;
  /** Lazily extracted pages; extraction failures surface as SourceReadError. */
  pages(document: SourceDocument): AsyncIterable<PageContent>;
  /** All pages of one document, for direct page lookups. */
  readPages(documentId: string): Promise<LoadedDocument>;
}

export async function hashFile(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return createHash("sha256").update(buffer).digest("hex");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

interface CachedPages {
  mtimeMs: number;
  size: number;
  loaded: LoadedDocument;
}

export class FolderDocumentSource implements DocumentSource {
  private readonly pageCache = new Map<string, CachedPages>();

  constructor(
    readonly root: string,
    private readonly extractors: ExtractorRegistry,
    private readonly logger: Logger,
  ) {}

  async list(): Promise<DocumentListing> {
    const listing: DocumentListing = { documents: [], skipped: [] };

    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch (err) {
      // A missing folder just means nothing to index yet. Any other failure
      // must not look like an empty folder, or every document would be removed.
      if (isMissingFile(err)) {
        this.logger.warn({ root: this.root }, "document folder does not exist");
        return listing;
      }
      throw new SourceReadError(this.root, errorMessage(err), { cause: err });
    }

    const candidates = entries
      .filter((name) => this.extractors.has(path.extname(name).toLowerCase()))
      .map((name) => path.join(this.root, name))
      .sort();

    for (const filePath of candidates) {
      try {
        listing.documents.push(await this.describe(filePath));
      } catch (err) {
        const error = new SourceReadError(filePath, errorMessage(err), { cause: err });
        this.logger.warn({ documentId: filePath, err: error.message }, "skipping unreadable file");
        listing.skipped.push({ documentId: filePath, reason: error.message });
      }
    }

    this.logger.info(
      { root: this.root, documents: listing.documents.length, skipped: listing.skipped.length },
      "scanned document folder",
    );
    return listing;
  }

  async *pages(document: SourceDocument): AsyncGenerator<PageContent> {
    const extractor = this.extractors.get(document.extension);
    if (!extractor) {
      throw new SourceReadError(document.documentId, `unsupported extension ${document.extension}`);
    }
    try {
      yield* extractor.extract(document.documentId);
    } catch (err) {
      if (err instanceof SourceReadError) throw err;
      throw new SourceReadError(document.documentId, errorMessage(err), { cause: err });
    }
  }

  async readPages(documentId: string): Promise<LoadedDocument> {
    const filePath = await this.resolve(documentId);

    const fileStat = await stat(filePath).catch(() => {
      throw new DocumentNotFoundError(documentId);
    });

    const cached = this.pageCache.get(filePath);
    if (cached && cached.mtimeMs === fileStat.mtimeMs && cached.size === fileStat.size) {
      return cached.loaded;
    }

    const document = await this.describe(filePath);
    const pages: PageContent[] = [];
    for await (const page of this.pages(document)) pages.push(page);

    const loaded = { document, pages };
    this.pageCache.set(filePath, { mtimeMs: fileStat.mtimeMs, size: fileStat.size, loaded });
    return loaded;
  }

  /**
   * Accepts an absolute path, a path relative to the folder, or a file name
   * that is unique within the folder. Nothing outside the folder resolves.
   */
  private async resolve(documentId: string): Promise<string> {
    const candidate = path.resolve(this.root, documentId);
    const relative = path.relative(path.resolve(this.root), candidate);
    if (relative === "" || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new DocumentNotFoundError(documentId);
    }
    const exists = await stat(candidate).then(
      (s) => s.isFile(),
      () => false,
    );
    if (exists && this.extractors.has(path.extname(candidate).toLowerCase())) return candidate;

    let entries: string[] = [];
    try {
      entries = await readdir(this.root);
    } catch {
      throw new DocumentNotFoundError(documentId);
    }
    const wanted = documentId.toLowerCase();
    const matches = entries.filter((name) => {
      const lower = name.toLowerCase();
      return (
        this.extractors.has(path.extname(lower)) &&
        (lower === wanted || path.parse(lower).name === wanted)
      );
    });
    const [match] = matches;
    if (matches.length !== 1 || match === undefined) throw new DocumentNotFoundError(documentId);
    return path.join(this.root, match);
  }

  private async describe(filePath: string): Promise<SourceDocument> {
    const fileStat = await stat(filePath);
    if (!fileStat.isFile()) throw new Error("not a regular file");
    return {
      documentId: filePath,
      source: path.basename(filePath),
      extension: path.extname(filePath).toLowerCase(),
      contentHash: await hashFile(filePath),
      mtimeMs: fileStat.mtimeMs,
      size: fileStat.size,
    };
  }
}
