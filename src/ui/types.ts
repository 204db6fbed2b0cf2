import type { RunState, StepEvent, TerminalValue } from "../engine/types.js";
import type { ProductData, ResearchRequest, SentimentAnalysis } from "../schemas.js";

// --- Streaming (NDJSON lines and WebSocket frames) ---

export type StepMessage = { type: "step" } & StepEvent;

export type StreamMessage = { type: "report_id"; reportId: string } | StepMessage | TerminalValue;

/** Runs one research request, sending every message of its stream; resolves to the terminal value. */
export type StreamRunner = (
  request: ResearchRequest,
  signal: AbortSignal,
  send: (message: StreamMessage) => void,
) => Promise<TerminalValue>;

// --- REST Request/Response ---

export type SyncResearchResponse = {
  reportId: string;
  query: string;
  plan: RunState["plan"];
  taskResults: RunState["taskResults"];
  finalReport: string | null;
  terminal: TerminalValue;
  url: string | null;
  productData: ProductData | null;
  summary: string | null;
  sentiment: SentimentAnalysis | null;
  comparison: string | null;
};

// --- SSE Event Types ---

export type SSEEvent =
  | { type: "run:started"; reportId: string; query: string }
  | { type: "run:step"; reportId: string; step: StepEvent["step"]; progress: number; description: string }
  | { type: "run:complete"; reportId: string; durationMs: number }
  | { type: "run:error"; reportId: string; error: { code: string; message: string } }
  | { type: "report:deleted"; reportId: string };
