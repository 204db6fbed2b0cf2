import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { randomUUID } from "node:crypto";
import type { WebSocketServer } from "ws";
import { getConfig } from "../config.js";
import type { ResearchEngine } from "../engine/engine.js";
import type { RunState, TerminalValue } from "../engine/types.js";
import type { ReportStore } from "../persistence/store.js";
import { ResearchRequestSchema, type ResearchRequest } from "../schemas.js";
import { log, errorMessage } from "../utils/logger.js";
import type { SSEEvent, StreamMessage, SyncResearchResponse } from "./types.js";
import { attachStreamSocket } from "./ws-stream.js";

export type ResearchServerOptions = {
  engine: ResearchEngine;
  port?: number;
  host?: string;
  /** Backs the reports API; without one the list is empty and lookups answer 404. */
  store?: ReportStore;
};

export class ResearchServer {
  private engine: ResearchEngine;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private store?: ReportStore;
  private sseClients = new Set<ServerResponse>();
  private activeRuns = new Map<string, AbortController>();

  constructor(opts: ResearchServerOptions) {
    this.engine = opts.engine;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.store = opts.store;
  }

  async start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        } else if (!res.writableEnded) {
          res.end();
        }
      });
    });
    this.server = server;
    this.wss = attachStreamSocket(server, (request, signal, send) => this.streamRun(request, signal, send));

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Research server running at http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  stop(): void {
    for (const controller of this.activeRuns.values()) {
      controller.abort();
    }
    this.activeRuns.clear();
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();
    for (const socket of this.wss?.clients ?? []) {
      socket.terminate();
    }
    this.wss?.close();
    this.wss = null;
    this.server?.closeAllConnections();
    this.server?.close();
    this.server = null;
  }

  /**
   * Run one request, sending the report id, every step event and the
   * terminal value. Shared by the NDJSON and WebSocket surfaces.
   */
  async streamRun(
    request: ResearchRequest,
    signal: AbortSignal,
    send: (message: StreamMessage) => void,
  ): Promise<TerminalValue> {
    const reportId = randomUUID();
    const startedAt = Date.now();
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) controller.abort();
    this.activeRuns.set(reportId, controller);

    send({ type: "report_id", reportId });
    this.broadcastSSE({ type: "run:started", reportId, query: request.query });

    let terminal: TerminalValue;
    try {
      const stream = this.engine.stream(request.query, {
        signal: controller.signal,
        reportId,
        sessionId: request.sessionId,
        deepResearch: request.deepResearch,
      });
      let next = await stream.next();
      while (!next.done) {
        const event = next.value;
        send({ type: "step", ...event });
        this.broadcastSSE({
          type: "run:step",
          reportId,
          step: event.step,
          progress: event.progress,
          description: event.description,
        });
        next = await stream.next();
      }
      terminal = next.value;
    } catch (err) {
      log.error("Research stream failed", { reportId, error: errorMessage(err) });
      terminal = { type: "error", reportId, error: { code: "INTERNAL_ERROR", message: errorMessage(err) } };
    } finally {
      signal.removeEventListener("abort", onAbort);
      this.activeRuns.delete(reportId);
    }

    send(terminal);
    if (terminal.type === "result") {
      this.broadcastSSE({ type: "run:complete", reportId, durationMs: Date.now() - startedAt });
    } else {
      this.broadcastSSE({ type: "run:error", reportId, error: terminal.error });
    }
    return terminal;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    // CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      return this.handleHealth(res);
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "POST" && pathname === "/api/research") {
      return this.handleResearch(req, res);
    }

    if (method === "POST" && pathname === "/api/research/sync") {
      return this.handleResearchSync(req, res);
    }

    if (method === "GET" && pathname === "/api/reports") {
      return this.handleListReports(res, url);
    }

    const reportMatch = pathname.match(/^\/api\/reports\/([^/]+)$/);
    if (method === "GET" && reportMatch) {
      return this.handleGetReport(res, decodeURIComponent(reportMatch[1]));
    }

    if (method === "DELETE" && reportMatch) {
      return this.handleDeleteReport(res, decodeURIComponent(reportMatch[1]));
    }

    json(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    json(res, 200, { ok: true, actions: this.engine.registry.actions(), activeRuns: this.activeRuns.size });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private async handleResearch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const request = await this.readRequest(req, res);
    if (!request) return;

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        log.info("Client disconnected, cancelling run");
        controller.abort();
      }
    });

    res.writeHead(200, {
      "Content-Type": "application/x-ndjson",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    await this.streamRun(request, controller.signal, (message) => {
      if (!res.writableEnded) res.write(`${JSON.stringify(message)}\n`);
    });
    res.end();
  }

  private async handleResearchSync(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const request = await this.readRequest(req, res);
    if (!request) return;

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const { state, terminal } = await this.engine.run(request.query, {
      signal: controller.signal,
      sessionId: request.sessionId,
      deepResearch: request.deepResearch,
    });
    json(res, terminal.type === "result" ? 200 : 500, syncResponse(state, terminal));
  }

  private handleListReports(res: ServerResponse, url: URL): void {
    if (!this.store) {
      json(res, 200, []);
      return;
    }
    const limit = Number.parseInt(url.searchParams.get("limit") ?? "", 10);
    const sessionId = url.searchParams.get("sessionId");
    const safeLimit = Number.isInteger(limit) && limit > 0 ? limit : 50;
    json(res, 200, sessionId ? this.store.listBySession(sessionId, safeLimit) : this.store.list(safeLimit));
  }

  private handleGetReport(res: ServerResponse, id: string): void {
    const report = this.store?.get(id);
    if (!report) {
      json(res, 404, { error: "Report not found" });
      return;
    }
    json(res, 200, report);
  }

  private handleDeleteReport(res: ServerResponse, id: string): void {
    const deleted = this.store?.delete(id) ?? false;
    if (!deleted) {
      json(res, 404, { error: "Report not found" });
      return;
    }

    this.broadcastSSE({ type: "report:deleted", reportId: id });
    json(res, 200, { deleted: true, reportId: id });
  }

  /** Parse and validate a research request body; answers 400 and returns null when invalid. */
  private async readRequest(req: IncomingMessage, res: ServerResponse): Promise<ResearchRequest | null> {
    const body = await readBody(req);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      json(res, 400, { error: "Invalid JSON body" });
      return null;
    }

    const result = ResearchRequestSchema.safeParse(raw);
    if (!result.success) {
      const msg = result.error.issues.map((i) => i.message).join("; ");
      json(res, 400, { error: msg });
      return null;
    }
    return result.data;
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

/** Flatten a finished run into the sync response, picking the first output of each kind. */
export function syncResponse(state: RunState, terminal: TerminalValue): SyncResearchResponse {
  const response: SyncResearchResponse = {
    reportId: terminal.reportId,
    query: state.query,
    plan: state.plan,
    taskResults: state.taskResults,
    finalReport: state.finalOutput,
    terminal,
    url: null,
    productData: null,
    summary: null,
    sentiment: null,
    comparison: null,
  };

  for (const output of state.taskResults) {
    switch (output.kind) {
      case "scrape":
        response.url ??= output.url;
        response.productData ??= output.productData;
        break;
      case "summarize":
        response.summary ??= output.summary;
        break;
      case "sentiment":
        response.sentiment ??= output.sentiment;
        break;
      case "compare":
        response.comparison ??= output.comparison;
        break;
    }
  }
  return response;
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
