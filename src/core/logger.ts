import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const SENTINEL_EVENT_TYPES = [
  "sentinel.start",
  "sentinel.state",
  "probe.result",
  "tier.start",
  "tier.iteration",
  "tier.complete",
  "repair.applied",
  "repair.invalid_response",
  "radius.violation",
  "cascade.apply",
  "manifest.write",
  "sentinel.fault",
  "sentinel.halt",
  "sentinel.complete",
] as const;

export type SentinelEventType = (typeof SENTINEL_EVENT_TYPES)[number];

export type LogEvent = {
  ts: string;
  type: SentinelEventType;
  run_id: string;
  task_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: SentinelEventType;
  runId?: string;
  taskId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

/** Sink for sentinel events. Components take this port; JsonlLogger writes it to disk. */
export interface EventLogger {
  log(event: LogEventInput): void;
}

export type JsonlLoggerOptions = {
  runId: string;
  taskId?: string;
  /** Append the stack to warnings about a failed write. */
  debug?: boolean;
};

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Appends one JSON object per line and fsyncs after every event, so a crashed
 * run still leaves a readable trail. I/O failures become console warnings;
 * logging never fails a sentinel run.
 */
export class JsonlLogger implements EventLogger {
  private readonly fd: number;
  private closed = false;

  constructor(
    readonly filePath: string,
    private readonly options: JsonlLoggerOptions,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    const line = JSON.stringify(eventWithTs(event, this.options));
    this.guard(`write log event to ${this.filePath}`, () => {
      fs.writeSync(this.fd, `${line}\n`);
      fs.fsyncSync(this.fd);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.guard(`close log file ${this.filePath}`, () => {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    });
  }

  private guard(action: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      const stack = this.options.debug
        ? formatErrorLines(err, { mode: "debug" }).find((line) => line.kind === "stack")?.text
        : undefined;
      const message = `Warning: failed to ${action}: ${formatErrorMessage(err)}`;
      console.warn(stack ? `${message}\n${stack}` : message);
    }
  }
}

export function withTaskId(logger: EventLogger, taskId: string): EventLogger {
  return {
    log: (event) => logger.log({ ...event, taskId: event.taskId ?? taskId }),
  };
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(
  event: LogEventInput,
  defaults: { runId?: string; taskId?: string } = {},
): LogEvent {
  const runId = event.runId ?? defaults.runId;
  if (!runId) {
    throw new Error(`run_id is required for log events (type ${event.type})`);
  }

  const result: LogEvent = {
    ts: event.ts instanceof Date ? event.ts.toISOString() : (event.ts ?? isoNow()),
    type: event.type,
    run_id: runId,
  };

  const taskId = event.taskId ?? defaults.taskId;
  if (taskId) result.task_id = taskId;
  if (event.payload && Object.keys(event.payload).length > 0) result.payload = event.payload;

  return result;
}
