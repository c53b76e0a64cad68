#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "node:util";
import { INSUFFICIENT_CONTEXT_ANSWER, formatSourcesForUI, pageLabel } from "./rag/context-builder.js";
import { loadRagConfig } from "./rag/config.js";
import { IndexError, NoRelevantContent, errorMessage } from "./rag/errors.js";
import { initRagPipeline, type IngestionReport } from "./rag/pipeline.js";
import type { AnswerRecord } from "./rag/types.js";
import { configureLogger, loggingConfigFromEnv } from "./utils/logger.js";

const USAGE = `Usage:
  folio ingest [libraryId]
  folio ask "<question>" [--k N]`;

function printReport(report: IngestionReport): void {
  console.log(`Library ${report.libraryId}:`);
  console.log(
    `  ${report.succeeded.length} indexed, ${report.unchanged.length} unchanged, ` +
      `${report.failed.length} failed, ${report.removed.length} removed`,
  );
  for (const doc of report.succeeded) {
    const warned = doc.warnings.length > 0 ? ` (${doc.warnings.length} page warning(s))` : "";
    console.log(`  ✓ ${doc.identity}: ${doc.pages} page(s), ${doc.chunks} chunk(s)${warned}`);
    for (const warning of doc.warnings) console.log(`      ${warning.message}`);
  }
  for (const doc of report.failed) {
    console.log(`  ✗ ${doc.identity} [${doc.stage}] ${doc.message}`);
  }
  for (const identity of report.removed) console.log(`  - ${identity}`);
}

function printAnswer(record: AnswerRecord): void {
  console.log(record.answer);
  console.log("");
  for (const citation of record.citations) {
    console.log(
      `[${citation.ref}] ${citation.source}, ${pageLabel(citation.pageStart, citation.pageEnd)} ` +
        `(score ${citation.score.toFixed(3)})`,
    );
  }
  console.log(`\n\u{1F4C4} ${formatSourcesForUI(record.citations)}`);
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      k: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return command || values.help ? 0 : 1;
  }

  const logger = configureLogger(loggingConfigFromEnv());
  const config = loadRagConfig();

  const apiKey = process.env["OPENROUTER_API_KEY"];
  if (!apiKey) {
    console.error("Error: OPENROUTER_API_KEY environment variable is required.");
    console.error("  export OPENROUTER_API_KEY=your-key");
    return 1;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

  const pipeline = await initRagPipeline(apiKey, config, logger);

  switch (command) {
    case "ingest": {
      const report = await pipeline.ingestLibrary(rest[0] ?? config.defaultLibrary, { signal: controller.signal });
      printReport(report);
      return report.failed.length > 0 ? 1 : 0;
    }
    case "ask": {
      const question = rest.join(" ");
      const k = values.k === undefined ? undefined : Number.parseInt(values.k, 10);
      if (k !== undefined && (!Number.isInteger(k) || k <= 0)) {
        console.error(`Error: --k must be a positive integer, got ${values.k}`);
        return 1;
      }
      try {
        printAnswer(await pipeline.ask(question, { k, signal: controller.signal }));
        return 0;
      } catch (error) {
        if (error instanceof IndexError && error.reason === "empty_index") {
          console.log("Nothing indexed yet. Run `folio ingest` first.");
          return 1;
        }
        if (error instanceof NoRelevantContent) {
          console.log(INSUFFICIENT_CONTEXT_ANSWER);
          return 1;
        }
        throw error;
      }
    }
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
