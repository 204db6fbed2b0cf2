#!/usr/bin/env node

import { Command } from "commander";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});
process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err.message);
});
import { configFromEnv, configure, getConfig } from "./config.js";
import { ReportStore } from "./persistence/store.js";
import { createResearchEngine } from "./setup.js";
import { ResearchServer } from "./ui/server.js";
import { setLogLevel } from "./utils/logger.js";

configure(configFromEnv());
setLogLevel(getConfig().logLevel);

const program = new Command();

program
  .name("research-engine")
  .description("Plan-driven product research: search, scrape, analyze, report")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function openStore(dbPath?: string): ReportStore {
  return new ReportStore(dbPath ?? getConfig().persistence.dbPath);
}

// --- run ---
program
  .command("run")
  .description("Research a query and print the final report")
  .argument("<query>", "Product, comparison or product URL to research")
  .option("--deep", "Use the deep research model and longer reports")
  .option("--db <path>", "Save the report to this SQLite database")
  .option("--no-save", "Do not save the report")
  .action(async (query: string, opts: { deep?: boolean; db?: string; save: boolean }) => {
    const store = opts.save ? openStore(opts.db) : undefined;
    const engine = createResearchEngine({ sink: store });
    const controller = new AbortController();
    process.once("SIGINT", () => {
      console.error("\nCancelling after the current task...");
      controller.abort();
    });

    try {
      const stream = engine.stream(query, { signal: controller.signal, deepResearch: opts.deep ?? false });
      let next = await stream.next();
      while (!next.done) {
        const event = next.value;
        const failed = event.metadata?.failed ? " (failed)" : "";
        console.error(`[${Math.round(event.progress).toString().padStart(3)}%] ${event.description}${failed}`);
        next = await stream.next();
      }

      const terminal = next.value;
      if (terminal.type === "error") {
        console.error(`Run ${terminal.reportId} ended: ${terminal.error.code}: ${terminal.error.message}`);
        process.exitCode = 1;
        return;
      }
      console.log(`\n${terminal.finalOutput}`);
      if (store) console.error(`\nSaved report ${terminal.reportId}`);
    } catch (err) {
      console.error("Run failed:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Print the research plan for a query without running it")
  .argument("<query>", "The query to plan")
  .action(async (query: string) => {
    const engine = createResearchEngine();
    try {
      const plan = await engine.plan(query);
      console.log(JSON.stringify(plan, null, 2));
    } catch (err) {
      console.error("Error:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

// --- reports ---
const reports = program.command("reports").description("Browse saved reports");

reports
  .command("list")
  .description("List saved reports, newest first")
  .option("-l, --limit <n>", "Maximum number of reports", "20")
  .option("--db <path>", "SQLite database path")
  .action((opts: { limit: string; db?: string }) => {
    const store = openStore(opts.db);
    try {
      const rows = store.list(Number(opts.limit) || 20);
      if (rows.length === 0) {
        console.log("No saved reports.");
        return;
      }
      for (const r of rows) {
        const when = new Date(r.createdAt).toISOString();
        console.log(`${r.id}  ${when}  [${r.status}]  ${r.query}`);
        if (r.preview) console.log(`    ${r.preview}`);
      }
    } finally {
      store.close();
    }
  });

reports
  .command("show")
  .description("Print a saved report")
  .argument("<id>", "Report id")
  .option("--db <path>", "SQLite database path")
  .option("--json", "Print the full record as JSON")
  .action((id: string, opts: { db?: string; json?: boolean }) => {
    const store = openStore(opts.db);
    try {
      const report = store.get(id);
      if (!report) {
        console.error(`Report not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      console.log(opts.json ? JSON.stringify(report, null, 2) : report.finalOutput ?? `(no report: ${report.status})`);
    } finally {
      store.close();
    }
  });

// --- serve ---
program
  .command("serve")
  .description("Start the research HTTP and WebSocket server")
  .option("-p, --port <port>", "Server port")
  .option("--host <host>", "Server host")
  .option("--db <path>", "SQLite database path")
  .action(async (opts: { port?: string; host?: string; db?: string }) => {
    const store = openStore(opts.db);
    const engine = createResearchEngine({ sink: store });
    const server = new ResearchServer({
      engine,
      store,
      port: opts.port ? Number(opts.port) : undefined,
      host: opts.host,
    });

    const addr = await server.start();
    console.log(`Research API: http://${addr.host}:${addr.port}/api/research`);
    console.log(`WebSocket:    ws://${addr.host}:${addr.port}/api/stream`);
    console.log(`Actions:      ${engine.registry.actions().join(", ")}`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      server.stop();
      store.close();
      process.exit(0);
    });
  });

void (async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
})();
