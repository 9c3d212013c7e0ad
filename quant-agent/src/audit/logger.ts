import { randomUUID } from "node:crypto";
import { type FileHandle, mkdir, open } from "node:fs/promises";
import { join } from "node:path";
import type { DecisionRecord, FallbackReason } from "../decision/types.ts";

/** Payload of each event the decision path records */
export interface DecisionAuditEvents {
  reasoning_request: { symbol: string; model: string; prompt: string };
  reasoning_response: { symbol: string; model: string; raw: string };
  decision: { symbol: string; model: string; fallback: FallbackReason | null; record: DecisionRecord };
}

export type DecisionAuditEvent = keyof DecisionAuditEvents;

export interface AuditSink {
  log<E extends DecisionAuditEvent>(event: E, data: DecisionAuditEvents[E]): Promise<void>;
}

/** One JSONL line; `seq` orders lines within a session */
export interface AuditEntry {
  seq: number;
  timestamp: string;
  sessionId: string;
  event: DecisionAuditEvent | "session_start" | "session_end";
  data: unknown;
}

export interface JsonlAuditLogOptions {
  logsPath?: string;
  sessionId?: string;
  now?: () => Date;
}

/**
 * Append-only JSONL file of what the synthesizer sent and got back, one
 * file per session: `<logsPath>/session-<date>-<id8>.jsonl`.
 * Events logged before open() or after close() are dropped.
 */
export class JsonlAuditLog implements AuditSink {
  readonly sessionId: string;
  readonly path: string;
  private readonly now: () => Date;
  private handle: FileHandle | null = null;
  private seq = 0;

  constructor(options: JsonlAuditLogOptions = {}) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
    const date = this.now().toISOString().slice(0, 10);
    this.path = join(options.logsPath ?? "./logs", `session-${date}-${this.sessionId.slice(0, 8)}.jsonl`);
  }

  async open(): Promise<void> {
    await mkdir(join(this.path, ".."), { recursive: true });
    this.handle = await open(this.path, "a");
    await this.write("session_start", {});
  }

  log<E extends DecisionAuditEvent>(event: E, data: DecisionAuditEvents[E]): Promise<void> {
    return this.write(event, data);
  }

  async close(): Promise<void> {
    if (!this.handle) return;
    await this.write("session_end", { events: this.seq - 1 });
    await this.handle.close();
    this.handle = null;
  }

  private async write(event: AuditEntry["event"], data: unknown): Promise<void> {
    if (!this.handle) return;
    const entry: AuditEntry = {
      seq: this.seq++,
      timestamp: this.now().toISOString(),
      sessionId: this.sessionId,
      event,
      data,
    };
    await this.handle.write(JSON.stringify(entry) + "\n");
  }
}
