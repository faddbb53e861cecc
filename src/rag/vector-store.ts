import { open, rm } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { LocalIndex } from "vectra";
import { IndexCorruptionError, errorMessage } from "./errors.js";
import { loadManifest, manifestEntriesEqual, saveManifest } from "./manifest.js";
import type { IndexedChunk, Manifest, ManifestEntry, SearchHit, TextChunk } from "./types.js";

interface Snapshot {
  readonly items: ReadonlyMap<string, IndexedChunk>;
  readonly manifest: Readonly<Manifest>;
}

interface BatchChanges {
  deletedDocuments: ReadonlySet<string>;
  upserts: ReadonlyMap<string, IndexedChunk>;
  manifest: ReadonlyMap<string, ManifestEntry | null>;
}

export interface CommitSummary {
  deleted: number;
  upserted: number;
  manifestChanged: boolean;
}

export interface OpenOptions {
  /** Discard an unreadable store and start empty instead of failing. */
  rebuildIfCorrupt?: boolean;
}

/** vectra rewrites its file in place; flush it before anything points at it. */
async function syncFile(filePath: string): Promise<void> {
  const handle = await open(filePath, "r+");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

export function normalize(vector: number[]): number[] {
  let sum = 0;
  for (const v of vector) sum += v * v;
  const norm = Math.sqrt(sum);
  if (norm === 0) return vector.map(() => 0);
  return vector.map((v) => v / norm);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Staged mutations for one document. Nothing is visible to readers or
 * written to disk until `commit()`; a discarded batch leaves no trace.
 */
export class IndexBatch {
  private readonly deletedDocuments = new Set<string>();
  private readonly upserts = new Map<string, IndexedChunk>();
  private readonly manifest = new Map<string, ManifestEntry | null>();
  private closed = false;

  constructor(private readonly apply: (changes: BatchChanges) => Promise<CommitSummary>) {}

  deleteByDocument(documentId: string): this {
    this.assertOpen();
    this.deletedDocuments.add(documentId);
    return this;
  }

  upsert(chunk: TextChunk, vector: number[]): this {
    this.assertOpen();
    if (vector.length === 0 || !vector.every(Number.isFinite)) {
      throw new RangeError(`Invalid vector for chunk ${chunk.id}`);
    }
    this.upserts.set(chunk.id, {
      id: chunk.id,
      text: chunk.text,
      metadata: { ...chunk.metadata },
      vector: normalize(vector),
    });
    return this;
  }

  manifestSet(documentId: string, entry: ManifestEntry): this {
    this.assertOpen();
    this.manifest.set(documentId, { ...entry, chunkIds: [...entry.chunkIds] });
    return this;
  }

  manifestDelete(documentId: string): this {
    this.assertOpen();
    this.manifest.set(documentId, null);
    return this;
  }

  async commit(): Promise<CommitSummary> {
    this.assertOpen();
    this.closed = true;
    return this.apply({
      deletedDocuments: this.deletedDocuments,
      upserts: this.upserts,
      manifest: this.manifest,
    });
  }

  discard(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("IndexBatch already committed or discarded");
  }
}

function readChunk(item: { id: string; vector: number[]; metadata: Record<string, unknown> }): IndexedChunk {
  const { documentId, source, page, start, end, text } = item.metadata;
  if (
    typeof documentId !== "string" ||
    typeof source !== "string" ||
    typeof text !== "string" ||
    typeof page !== "number" ||
    typeof start !== "number" ||
    typeof end !== "number"
  ) {
    throw new IndexCorruptionError(`item ${item.id} has incomplete metadata`);
  }
  return { id: item.id, text, vector: item.vector, metadata: { documentId, source, page, start, end } };
}

/**
 * Durable chunk store: vectors in a vectra LocalIndex under `vectors/`, the
 * manifest in `manifest.json` beside it. Searches read an immutable snapshot
 * that is swapped only after a batch is fully on disk.
 */
export class VectorIndex {
  private snapshot: Snapshot;
  private writeChain: Promise<unknown> = Promise.resolve();

  private constructor(
    private readonly store: LocalIndex,
    private readonly vectorsFile: string,
    private readonly manifestPath: string,
    private readonly logger: Logger,
    snapshot: Snapshot,
  ) {
    this.snapshot = snapshot;
  }

  static async open(indexDir: string, logger: Logger, options: OpenOptions = {}): Promise<VectorIndex> {
    try {
      return await VectorIndex.load(indexDir, logger);
    } catch (err) {
      if (!(err instanceof IndexCorruptionError) || !options.rebuildIfCorrupt) throw err;
      logger.warn({ indexDir, err: err.message }, "discarding corrupt index store");
      const manifestPath = path.join(indexDir, "manifest.json");
      await rm(path.join(indexDir, "vectors"), { recursive: true, force: true });
      await rm(manifestPath, { force: true });
      await rm(`${manifestPath}.tmp`, { force: true });
      return VectorIndex.load(indexDir, logger);
    }
  }

  private static async load(indexDir: string, logger: Logger): Promise<VectorIndex> {
    const vectorsDir = path.join(indexDir, "vectors");
    const store = new LocalIndex(vectorsDir);
    const manifestPath = path.join(indexDir, "manifest.json");

    const items = new Map<string, IndexedChunk>();
    try {
      if (!(await store.isIndexCreated())) {
        await store.createIndex({ version: 1 });
      }
      for (const item of await store.listItems()) {
        items.set(item.id, readChunk(item));
      }
    } catch (err) {
      if (err instanceof IndexCorruptionError) throw err;
      throw new IndexCorruptionError(`cannot load vectors: ${errorMessage(err)}`, { cause: err });
    }
    const manifest = await loadManifest(manifestPath);

    const vectorsFile = path.join(vectorsDir, "index.json");
    const index = new VectorIndex(store, vectorsFile, manifestPath, logger, { items, manifest });
    await index.recover();
    return index;
  }

  get chunkCount(): number {
    return this.snapshot.items.size;
  }

  batch(): IndexBatch {
    return new IndexBatch((changes) => this.serialize(() => this.applyChanges(changes)));
  }

  manifestGet(): Manifest {
    return { ...this.snapshot.manifest };
  }

  documentIds(): string[] {
    return Object.keys(this.snapshot.manifest).sort();
  }

  getChunk(chunkId: string): IndexedChunk | undefined {
    return this.snapshot.items.get(chunkId);
  }

  chunksForDocument(documentId: string): IndexedChunk[] {
    return [...this.snapshot.items.values()]
      .filter((c) => c.metadata.documentId === documentId)
      .sort((a, b) => a.metadata.page - b.metadata.page || a.metadata.start - b.metadata.start);
  }

  /**
   * Cosine similarity against every stored chunk of the query's dimension.
   * Ties go to the smaller chunk id.
   */
  search(queryVector: number[], k: number): SearchHit[] {
    const { items } = this.snapshot;
    if (k <= 0 || items.size === 0) return [];

    const query = normalize(queryVector);
    const hits: SearchHit[] = [];
    for (const chunk of items.values()) {
      // Left over from a different embedding model until re-embedded
      if (chunk.vector.length !== query.length) continue;
      hits.push({ chunkId: chunk.id, score: dot(query, chunk.vector), chunk });
    }
    hits.sort((a, b) => b.score - a.score || compareIds(a.chunkId, b.chunkId));
    return hits.slice(0, k);
  }

  async clear(): Promise<void> {
    await this.serialize(async () => {
      try {
        await this.store.createIndex({ version: 1, deleteIfExists: true });
        await syncFile(this.vectorsFile);
        await saveManifest(this.manifestPath, {});
      } catch (err) {
        throw new IndexCorruptionError(`clear failed: ${errorMessage(err)}`, { cause: err });
      }
      this.snapshot = { items: new Map(), manifest: {} };
      this.logger.info("index cleared");
    });
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const next = this.writeChain.then(work, work);
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async applyChanges(changes: BatchChanges): Promise<CommitSummary> {
    const current = this.snapshot;
    const items = new Map(current.items);
    const manifest: Manifest = { ...current.manifest };

    const deletions = new Set<string>();
    for (const documentId of changes.deletedDocuments) {
      for (const [id, chunk] of items) {
        if (chunk.metadata.documentId === documentId) {
          items.delete(id);
          deletions.add(id);
        }
      }
    }

    const writes: IndexedChunk[] = [];
    for (const chunk of changes.upserts.values()) {
      items.set(chunk.id, chunk);
      deletions.delete(chunk.id);
      writes.push(chunk);
    }

    let manifestChanged = false;
    for (const [documentId, entry] of changes.manifest) {
      if (manifestEntriesEqual(manifest[documentId], entry ?? undefined)) continue;
      manifestChanged = true;
      if (entry) {
        const missing = entry.chunkIds.find((id) => !items.has(id));
        if (missing !== undefined) {
          throw new Error(`Manifest entry for ${documentId} references unknown chunk ${missing}`);
        }
        manifest[documentId] = entry;
      } else {
        delete manifest[documentId];
      }
    }

    if (deletions.size === 0 && writes.length === 0 && !manifestChanged) {
      return { deleted: 0, upserted: 0, manifestChanged: false };
    }

    if (deletions.size > 0 || writes.length > 0) {
      await this.writeItems(deletions, writes);
    }
    if (manifestChanged) {
      try {
        await saveManifest(this.manifestPath, manifest);
      } catch (err) {
        throw new IndexCorruptionError(`manifest write failed: ${errorMessage(err)}`, { cause: err });
      }
    }

    this.snapshot = { items, manifest };
    return { deleted: deletions.size, upserted: writes.length, manifestChanged };
  }

  private async writeItems(deletions: ReadonlySet<string>, writes: readonly IndexedChunk[]): Promise<void> {
    try {
      await this.store.beginUpdate();
    } catch (err) {
      throw new IndexCorruptionError(`cannot open vectors for update: ${errorMessage(err)}`, { cause: err });
    }
    try {
      for (const id of deletions) await this.store.deleteItem(id);
      for (const chunk of writes) {
        await this.store.upsertItem({
          id: chunk.id,
          vector: chunk.vector,
          metadata: {
            documentId: chunk.metadata.documentId,
            source: chunk.metadata.source,
            page: chunk.metadata.page,
            start: chunk.metadata.start,
            end: chunk.metadata.end,
            text: chunk.text,
          },
        });
      }
      await this.store.endUpdate();
    } catch (err) {
      this.store.cancelUpdate();
      throw new IndexCorruptionError(`vector write failed: ${errorMessage(err)}`, { cause: err });
    }
    try {
      await syncFile(this.vectorsFile);
    } catch (err) {
      throw new IndexCorruptionError(`vector flush failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Brings vectors and manifest back in line after an interrupted commit:
   * entries naming a missing chunk are dropped (their documents re-index as
   * new) and chunks no entry names are deleted.
   */
  private async recover(): Promise<void> {
    const { items, manifest } = this.snapshot;

    const phantoms = Object.entries(manifest)
      .filter(([, entry]) => entry.chunkIds.some((id) => !items.has(id)))
      .map(([documentId]) => documentId);
    const phantomSet = new Set(phantoms);

    const referenced = new Set<string>();
    for (const [documentId, entry] of Object.entries(manifest)) {
      if (phantomSet.has(documentId)) continue;
      for (const id of entry.chunkIds) referenced.add(id);
    }
    const orphans = [...items.keys()].filter((id) => !referenced.has(id));

    if (phantoms.length === 0 && orphans.length === 0) return;

    this.logger.warn(
      { phantomDocuments: phantoms, orphanChunks: orphans.length },
      "repairing index after an interrupted write",
    );

    const nextItems = new Map(items);
    for (const id of orphans) nextItems.delete(id);
    const nextManifest: Manifest = { ...manifest };
    for (const documentId of phantoms) delete nextManifest[documentId];

    if (orphans.length > 0) await this.writeItems(new Set(orphans), []);
    if (phantoms.length > 0) {
      try {
        await saveManifest(this.manifestPath, nextManifest);
      } catch (err) {
        throw new IndexCorruptionError(`manifest write failed: ${errorMessage(err)}`, { cause: err });
      }
    }
    this.snapshot = { items: nextItems, manifest: nextManifest };
  }
}
