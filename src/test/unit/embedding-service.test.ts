import assert from "node:assert/strict";
import { describe, test } from "node:test";

import {
  HttpEmbeddingGateway,
  embedQuery,
  embedTexts,
  type EmbeddingGateway,
} from "../../rag/embedding-service.js";
import { AbortError, EmbeddingPermanentError, EmbeddingTransientError } from "../../rag/errors.js";

interface RecordedRequest {
  url: string;
  body: unknown;
  authorization: string | null;
}

function stubFetch(respond: (body: { input: string[] }) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const impl: typeof fetch = async (input, init) => {
    const body: unknown = JSON.parse(String(init?.body));
    requests.push({
      url: String(input),
      body,
      authorization: new Headers(init?.headers).get("authorization"),
    });
    const inputTexts =
      typeof body === "object" && body !== null && "input" in body && Array.isArray(body.input)
        ? body.input.map(String)
        : [];
    return respond({ input: inputTexts });
  };
  return { impl, requests };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function gateway(impl: typeof fetch, apiKey?: string): HttpEmbeddingGateway {
  return new HttpEmbeddingGateway({
    baseUrl: "http://embedder.test/v1/",
    model: "all-minilm",
    apiKey,
    timeoutMs: 1000,
    fetch: impl,
  });
}

describe("HttpEmbeddingGateway", () => {
  test("posts the batch and returns vectors in input order", async () => {
    const { impl, requests } = stubFetch(() =>
      json({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      }),
    );

    const vectors = await gateway(impl, "test-secret").embed(["first", "second"]);

    assert.deepEqual(vectors, [
      [1, 0],
      [0, 1],
    ]);
    assert.deepEqual(requests, [
      {
        url: "http://embedder.test/v1/embeddings",
        body: { model: "all-minilm", input: ["first", "second"] },
        authorization: "Bearer test-secret",
      },
    ]);
  });

  test("no request for an empty batch", async () => {
    const { impl, requests } = stubFetch(() => json({ data: [] }));
    assert.deepEqual(await gateway(impl).embed([]), []);
    assert.equal(requests.length, 0);
  });

  test("omits the authorization header without a key", async () => {
    const { impl, requests } = stubFetch(() => json({ data: [{ embedding: [1] }] }));
    await gateway(impl).embed(["x"]);
    assert.equal(requests[0]?.authorization, null);
  });

  test("rate limits and server errors are transient", async () => {
    for (const status of [429, 500, 503]) {
      const { impl } = stubFetch(() => new Response("busy", { status }));
      await assert.rejects(
        gateway(impl).embed(["x"]),
        (err: unknown) =>
          err instanceof EmbeddingTransientError &&
          err.status === status &&
          err.message === `Embedding API error (${status}): busy`,
      );
    }
  });

  test("client errors are permanent", async () => {
    const { impl } = stubFetch(() => new Response("unknown model", { status: 400 }));
    await assert.rejects(
      gateway(impl).embed(["x"]),
      (err: unknown) => err instanceof EmbeddingPermanentError && err.status === 400,
    );
  });

  test("connection failures are transient", async () => {
    const impl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    await assert.rejects(gateway(impl).embed(["x"]), {
      name: "EmbeddingTransientError",
      message: "Embedding request failed: fetch failed",
    });
  });

  test("malformed responses are permanent", async () => {
    const cases: Array<[Response, string]> = [
      [new Response("not json", { status: 200 }), "Embedding API returned invalid JSON"],
      [json({ vectors: [] }), "Embedding API response has an unexpected shape"],
      [json({ data: [{ embedding: [1] }] }), "Embedding API returned 1 vectors for 2 inputs"],
      [
        json({ data: [{ embedding: [1, 2] }, { embedding: [1] }] }),
        "Embedding API returned vectors of inconsistent dimension",
      ],
      [json({ data: [{ embedding: [] }, { embedding: [] }] }), "Embedding API returned vectors of inconsistent dimension"],
    ];
    for (const [response, message] of cases) {
      const { impl } = stubFetch(() => response);
      await assert.rejects(gateway(impl).embed(["a", "b"]), { name: "EmbeddingPermanentError", message });
    }
  });

  test("slow responses time out as transient errors", async () => {
    const impl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted by signal")));
      });
    const slow = new HttpEmbeddingGateway({
      baseUrl: "http://embedder.test/v1",
      model: "all-minilm",
      timeoutMs: 10,
      fetch: impl,
    });
    await assert.rejects(slow.embed(["x"]), {
      name: "EmbeddingTransientError",
      message: "Embedding request timed out after 10ms",
    });
  });
});

/** Returns `[text.length]` per text, failing per `script` first. */
class ScriptedGateway implements EmbeddingGateway {
  readonly model = "scripted";
  readonly batches: string[][] = [];
  constructor(private readonly script: Error[] = []) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push(texts);
    const failure = this.script.shift();
    if (failure) throw failure;
    return texts.map((t) => [t.length]);
  }
}

const retry = { maxAttempts: 3, baseDelayMs: 100 };

describe("embedTexts", () => {
  test("batches and keeps input order under concurrency", async () => {
    const gw = new ScriptedGateway();
    const texts = ["a", "bb", "ccc", "dddd", "eeeee"];
    const progress: Array<[number, number]> = [];

    const vectors = await embedTexts(gw, texts, {
      batchSize: 2,
      concurrency: 2,
      retry,
      onProgress: (done, total) => progress.push([done, total]),
    });

    assert.deepEqual(vectors, [[1], [2], [3], [4], [5]]);
    assert.equal(gw.batches.length, 3);
    assert.deepEqual(progress[progress.length - 1], [5, 5]);
  });

  test("retries transient failures with exponential backoff", async () => {
    const gw = new ScriptedGateway([new EmbeddingTransientError("busy", 503), new EmbeddingTransientError("busy", 503)]);
    const delays: number[] = [];

    const vectors = await embedTexts(gw, ["abc"], {
      batchSize: 10,
      concurrency: 1,
      retry,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    assert.deepEqual(vectors, [[3]]);
    assert.equal(gw.batches.length, 3);
    assert.deepEqual(delays, [100, 200]);
  });

  test("permanent failures are not retried", async () => {
    const gw = new ScriptedGateway([new EmbeddingPermanentError("bad input", 400)]);
    await assert.rejects(
      embedTexts(gw, ["abc"], { batchSize: 10, concurrency: 1, retry, sleep: async () => undefined }),
      EmbeddingPermanentError,
    );
    assert.equal(gw.batches.length, 1);
  });

  test("gives up after the attempt budget", async () => {
    const gw = new ScriptedGateway([
      new EmbeddingTransientError("busy", 503),
      new EmbeddingTransientError("busy", 503),
      new EmbeddingTransientError("busy", 503),
    ]);
    await assert.rejects(
      embedTexts(gw, ["abc"], { batchSize: 10, concurrency: 1, retry, sleep: async () => undefined }),
      EmbeddingTransientError,
    );
    assert.equal(gw.batches.length, 3);
  });

  test("an aborted signal stops before any request", async () => {
    const gw = new ScriptedGateway();
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(
      embedTexts(gw, ["a", "b"], { batchSize: 1, concurrency: 1, retry, signal: controller.signal }),
      AbortError,
    );
    assert.equal(gw.batches.length, 0);
  });

  test("nothing to embed returns nothing", async () => {
    const gw = new ScriptedGateway();
    assert.deepEqual(await embedTexts(gw, [], { batchSize: 4, concurrency: 2, retry }), []);
    assert.equal(gw.batches.length, 0);
  });
});

describe("embedQuery", () => {
  test("applies the query prefix", async () => {
    const gw = new ScriptedGateway();
    const vector = await embedQuery(gw, "what is alpha", { prefix: "query: ", retry });
    assert.deepEqual(gw.batches, [["query: what is alpha"]]);
    assert.deepEqual(vector, ["query: what is alpha".length]);
  });
});
