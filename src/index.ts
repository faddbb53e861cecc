#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { createLogger } from "./logger.js";
import {
  ConfigError,
  RagError,
  createRagEngine,
  formatCitations,
  loadRagConfig,
  type AnswerResult,
  type ChatTurn,
  type InspectMode,
  type RagEngine,
  type ReindexReport,
} from "./rag/pipeline.js";

// ── Usage ───────────────────────────────────────────────────────────────────
const USAGE = `usage: folio-rag <command> [args]

  reindex [--force]                      bring the index in line with the folder
                                         (--force rebuilds, even from a corrupt index)
  clear                                  drop every indexed chunk
  status                                 list indexed documents
  ask <question...>                      answer from the indexed documents
  chat                                   interactive question loop with history
  page <document> <n...> [--translate|--explain]
                                         print pages straight from a document`;

// Keeps the conversation short enough to stay inside the model's window
const MAX_HISTORY_TURNS = 10;

// ── Output Helpers ──────────────────────────────────────────────────────────
function printReport(report: ReindexReport): void {
  console.log(
    `added ${report.added.length}, changed ${report.changed.length}, removed ${report.removed.length}, ` +
      `unchanged ${report.unchanged.length}, skipped ${report.skipped.length}, failed ${report.failed.length}` +
      ` (${report.chunksEmbedded} chunks embedded in ${(report.durationMs / 1000).toFixed(1)}s)`,
  );
  for (const skipped of report.skipped) console.log(`  skipped ${skipped.documentId}: ${skipped.reason}`);
  for (const failure of report.failed) console.log(`  failed ${failure.documentId}: ${failure.message}`);
  if (report.cancelled) console.log("  cancelled before all documents were processed");
}

function printAnswer(result: AnswerResult): void {
  console.log(result.text);
  if (result.status === "answered" && result.citations.length > 0) {
    console.log("");
    console.log(`sources: ${formatCitations(result.citations)}`);
  }
}

function pageMode(flags: string[]): InspectMode {
  if (flags.includes("--explain")) return "explain";
  if (flags.includes("--translate")) return "translate";
  return "raw";
}

// ── Commands ────────────────────────────────────────────────────────────────
async function runChat(engine: RagEngine, signal: AbortSignal): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const history: ChatTurn[] = [];
  console.log("Ask a question about your documents. Empty line or Ctrl+D to quit.");
  try {
    while (!signal.aborted) {
      const line = (await rl.question("you > ")).trim();
      if (!line) break;
      try {
        const result = await engine.answer(line, { history, signal });
        printAnswer(result);
        if (result.status === "answered") {
          history.push({ role: "user", content: line }, { role: "assistant", content: result.text });
          history.splice(0, Math.max(0, history.length - MAX_HISTORY_TURNS * 2));
        }
      } catch (err) {
        if (!(err instanceof RagError) || err.code === "INDEX_CORRUPTION") throw err;
        console.log(`error: ${err.message}`);
      }
      console.log("");
    }
  } finally {
    rl.close();
  }
}

async function run(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  const flags = rest.filter((arg) => arg.startsWith("--"));
  const args = rest.filter((arg) => !arg.startsWith("--"));

  if (!command || command === "help" || command === "--help") {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  const config = loadRagConfig();
  const logger = createLogger({ level: config.logLevel, filePath: config.logFilePath });
  const force = flags.includes("--force");
  const engine = await createRagEngine(config, { logger }, { rebuildCorruptIndex: command === "reindex" && force });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  const { signal } = controller;

  switch (command) {
    case "reindex": {
      const report = await engine.reindex({
        force,
        signal,
        onProgress: (message) => console.log(`  ${message}`),
      });
      printReport(report);
      return report.failed.length > 0 ? 2 : 0;
    }
    case "clear":
      await engine.clear();
      console.log("index cleared");
      return 0;
    case "status": {
      const status = engine.status();
      console.log(`${status.documentCount} document(s), ${status.chunkCount} chunks`);
      for (const doc of status.documents) {
        console.log(`  ${doc.source}  ${doc.pageCount} page(s), ${doc.chunkCount} chunks, indexed ${doc.indexedAt}`);
      }
      return 0;
    }
    case "ask": {
      const query = args.join(" ");
      printAnswer(await engine.answer(query, { signal }));
      return 0;
    }
    case "chat":
      await runChat(engine, signal);
      return 0;
    case "page": {
      const [documentId, ...pageArgs] = args;
      const pageNumbers = pageArgs.map(Number);
      if (!documentId || pageNumbers.length === 0) {
        console.error(USAGE);
        return 1;
      }
      const outcomes = await engine.inspectPages(documentId, pageNumbers, pageMode(flags));
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          console.log(`error: ${outcome.error.message}`);
          continue;
        }
        const { inspection } = outcome;
        console.log(`── ${inspection.source}, page ${inspection.pageNumber}/${inspection.pageCount} ──`);
        console.log(inspection.transformed ?? inspection.raw);
        console.log("");
      }
      return outcomes.every((o) => o.ok) ? 0 : 2;
    }
    default:
      console.error(`unknown command: ${command}`);
      console.error(USAGE);
      return 1;
  }
}

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError || err instanceof RagError) {
      console.error(`error: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  });
