import type { Server } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { ResearchRequestSchema } from "../schemas.js";
import { log, errorMessage } from "../utils/logger.js";
import type { StreamMessage, StreamRunner } from "./types.js";

export const STREAM_PATH = "/api/stream";

type ErrorFrame = { type: "error"; error: { code: string; message: string } };

function send(socket: WebSocket, frame: StreamMessage | ErrorFrame): void {
  if (socket.readyState === WebSocket.OPEN) {
    socket.send(JSON.stringify(frame));
  }
}

function parseFrame(data: RawData): unknown {
  return JSON.parse(data.toString());
}

/**
 * Research over a WebSocket on `/api/stream`. Each text frame
 * `{ query, deepResearch?, sessionId? }` starts a run whose messages come
 * back as JSON frames; one run per socket at a time. Closing the socket
 * cancels its run.
 */
export function attachStreamSocket(server: Server, runner: StreamRunner): WebSocketServer {
  const wss = new WebSocketServer({ server, path: STREAM_PATH });

  wss.on("connection", (socket) => {
    let active: AbortController | null = null;

    socket.on("message", (data) => {
      if (active) {
        send(socket, { type: "error", error: { code: "VALIDATION_FAILED", message: "A run is already in progress" } });
        return;
      }

      let raw: unknown;
      try {
        raw = parseFrame(data);
      } catch {
        send(socket, { type: "error", error: { code: "VALIDATION_FAILED", message: "Invalid JSON message" } });
        return;
      }
      const parsed = ResearchRequestSchema.safeParse(raw);
      if (!parsed.success) {
        const message = parsed.error.issues.map((i) => i.message).join("; ");
        send(socket, { type: "error", error: { code: "VALIDATION_FAILED", message } });
        return;
      }

      const controller = new AbortController();
      active = controller;
      runner(parsed.data, controller.signal, (msg) => send(socket, msg))
        .catch((err) => {
          log.error("Stream run failed", { error: errorMessage(err) });
          send(socket, { type: "error", error: { code: "INTERNAL_ERROR", message: errorMessage(err) } });
        })
        .finally(() => {
          if (active === controller) active = null;
        });
    });

    socket.on("close", () => {
      active?.abort();
      active = null;
    });
  });

  wss.on("error", (err) => {
    log.error("WebSocket server error", { error: errorMessage(err) });
  });

  return wss;
}
