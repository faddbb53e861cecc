import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, test } from "node:test";

import { silentLogger } from "../../logger.js";
import { PageChunker } from "../../rag/chunking/index.js";
import { buildContext, collectCitations, formatCitations } from "../../rag/context-builder.js";
import { IndexManager } from "../../rag/index-manager.js";
import { RetrievalEngine, type RetrievalConfig } from "../../rag/retriever.js";
import type { RetrievedChunk } from "../../rag/types.js";
import { VectorIndex } from "../../rag/vector-store.js";
import { FakeEmbeddingGateway, MemoryDocumentSource, makeTempDir, noSleep, removeDir } from "../support/fakes.js";

const DOC = "/docs/doc.pdf";

const retrievalConfig: RetrievalConfig = {
  topK: 3,
  minScore: 0.3,
  contextCharBudget: 6000,
  queryPrefix: "",
  maxAttempts: 2,
  retryBaseDelayMs: 0,
};

describe("RetrievalEngine", () => {
  let dir: string | null = null;
  let gateway: FakeEmbeddingGateway;
  const logger = silentLogger();

  beforeEach(async () => {
    dir = await makeTempDir("folio-retrieval-");
    gateway = new FakeEmbeddingGateway();
  });

  afterEach(async () => {
    await removeDir(dir);
    dir = null;
  });

  async function indexed(pages: string[], config: Partial<RetrievalConfig> = {}) {
    const source = new MemoryDocumentSource();
    source.put("doc.pdf", pages);
    const index = await VectorIndex.open(dir ?? "", logger);
    const manager = new IndexManager({
      source,
      index,
      gateway,
      chunker: new PageChunker({ maxSize: 1000, overlap: 200 }),
      config: { embeddingBatchSize: 20, embeddingConcurrency: 1, maxAttempts: 2, retryBaseDelayMs: 0 },
      logger,
      sleep: noSleep,
    });
    await manager.reindex();
    return new RetrievalEngine(index, gateway, { ...retrievalConfig, ...config }, logger);
  }

  test("finds the page a term appears on", async () => {
    const engine = await indexed(["Alpha text on page 1", "Beta text on page 2"]);

    const result = await engine.retrieve("Alpha");

    assert.deepEqual(result.citations, [{ documentId: DOC, source: "doc.pdf", page: 1 }]);
    assert.deepEqual(
      result.matches.map((m) => m.text),
      ["Alpha text on page 1"],
    );
    assert.equal(result.context, "[Source: doc.pdf, Page 1]\nAlpha text on page 1");
    assert.ok(Math.abs((result.matches[0]?.score ?? 0) - 1 / Math.sqrt(5)) < 1e-9);
  });

  test("blank queries return nothing without embedding", async () => {
    const engine = await indexed(["Alpha text on page 1"]);
    const calls = gateway.calls;

    for (const query of ["", "   "]) {
      const result = await engine.retrieve(query);
      assert.deepEqual(result, { query, matches: [], included: [], context: "", citations: [] });
    }
    assert.equal(gateway.calls, calls);
  });

  test("an empty index returns nothing without embedding", async () => {
    const engine = await indexed([]);
    const result = await engine.retrieve("Alpha");
    assert.deepEqual(result.matches, []);
    assert.equal(gateway.calls, 0);
  });

  test("matches below the relevance floor are dropped", async () => {
    const engine = await indexed(["Alpha text on page 1", "Beta text on page 2"]);
    const result = await engine.retrieve("gamma");
    assert.deepEqual(result.matches, []);
    assert.deepEqual(result.citations, []);
    assert.equal(result.context, "");
  });

  test("k limits the candidates", async () => {
    const engine = await indexed(["Alpha text on page 1", "Alpha text on page 2"]);
    assert.equal((await engine.retrieve("alpha text")).matches.length, 2);
    assert.equal((await engine.retrieve("alpha text", { k: 1 })).matches.length, 1);
  });

  test("citations follow the chunks that fit the budget", async () => {
    const engine = await indexed(["Alpha text on page 1", "Alpha text on page 2"], { contextCharBudget: 60 });

    const result = await engine.retrieve("alpha text");

    assert.equal(result.matches.length, 2);
    assert.equal(result.included.length, 1);
    assert.deepEqual(result.citations, [
      { documentId: DOC, source: "doc.pdf", page: result.included[0]?.metadata.page },
    ]);
    assert.equal(result.context.length, 46);
  });
});

function retrieved(source: string, page: number, text: string, score = 0.5): RetrievedChunk {
  return {
    chunkId: `${source}-${page}-${text.length}`,
    text,
    score,
    metadata: { documentId: `/docs/${source}`, source, page, start: 0, end: text.length },
  };
}

describe("buildContext", () => {
  const a = retrieved("a.pdf", 1, "x".repeat(10));
  const b = retrieved("b.pdf", 2, "y".repeat(10));

  test("joins labelled blocks in rank order", () => {
    const built = buildContext([a, b], 70);
    assert.equal(built.context, `[Source: a.pdf, Page 1]\n${"x".repeat(10)}\n\n[Source: b.pdf, Page 2]\n${"y".repeat(10)}`);
    assert.equal(built.context.length, 70);
    assert.deepEqual(
      built.citations.map((c) => c.source),
      ["a.pdf", "b.pdf"],
    );
  });

  test("drops lower-ranked chunks and their citations when over budget", () => {
    const built = buildContext([a, b], 69);
    assert.deepEqual(built.included, [a]);
    assert.deepEqual(built.citations, [{ documentId: "/docs/a.pdf", source: "a.pdf", page: 1 }]);
  });

  test("cuts an oversized top chunk to fit", () => {
    const built = buildContext([a, b], 30);
    assert.equal(built.context, "[Source: a.pdf, Page 1]\nxxxxxx");
    assert.equal(built.included[0]?.text, "xxxxxx");
    assert.equal(built.citations.length, 1);
  });

  test("no room for any text means no context and no citations", () => {
    assert.deepEqual(buildContext([a], 20), { context: "", included: [], citations: [] });
  });
});

describe("citations", () => {
  test("collectCitations keeps the first occurrence of each page", () => {
    const chunks = [retrieved("a.pdf", 3, "one"), retrieved("a.pdf", 3, "two!"), retrieved("b.pdf", 1, "three")];
    assert.deepEqual(collectCitations(chunks), [
      { documentId: "/docs/a.pdf", source: "a.pdf", page: 3 },
      { documentId: "/docs/b.pdf", source: "b.pdf", page: 1 },
    ]);
  });

  test("formatCitations groups pages per document", () => {
    const line = formatCitations([
      { documentId: "/docs/a.pdf", source: "a.pdf", page: 3 },
      { documentId: "/docs/b.docx", source: "b.docx", page: 1 },
      { documentId: "/docs/a.pdf", source: "a.pdf", page: 1 },
    ]);
    assert.equal(line, "a.pdf p.1, p.3 | b.docx p.1");
  });

  test("formatCitations of nothing is empty", () => {
    assert.equal(formatCitations([]), "");
  });
});
