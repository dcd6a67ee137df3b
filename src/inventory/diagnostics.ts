/**
 * Structured diagnostics for a collection sweep.
 *
 * Every warning raised while mapping a container is an event with a severity,
 * a message, the container it concerns and the step that raised it. Events are
 * forwarded to the process logger and kept on the channel until it is closed.
 */

import type winston from "winston";
import { logger as rootLogger } from "../logger.js";

export type DiagnosticSeverity = "warning" | "error";

export type DiagnosticOperation = "inspect" | "config" | "state" | "hostConfig";

export interface DiagnosticEvent {
  severity: DiagnosticSeverity;
  message: string;
  /** Container the event concerns; null when the payload carried no usable Id. */
  containerId: string | null;
  operation: DiagnosticOperation;
}

export interface DiagnosticSink {
  emit(event: DiagnosticEvent): void;
}

export interface SweepSummary {
  records: number;
  warnings: number;
  errors: number;
  durationMs: number;
}

/** Cap on buffered events for a single sweep. */
const MAX_EVENTS = 10_000;

/**
 * Diagnostics channel scoped to one sweep. Open it when the sweep starts and
 * close it when it ends; emitting after close still logs but is not buffered.
 */
export class DiagnosticChannel implements DiagnosticSink {
  private readonly buffer: DiagnosticEvent[] = [];
  private readonly startedAt = Date.now();
  private closed = false;

  constructor(private readonly log: winston.Logger = rootLogger) {}

  emit(event: DiagnosticEvent): void {
    const meta = { containerId: event.containerId, operation: event.operation };
    if (event.severity === "error") {
      this.log.error(`[inventory] ${event.message}`, meta);
    } else {
      this.log.warn(`[inventory] ${event.message}`, meta);
    }
    if (this.closed) return;

    this.buffer.push(event);
    if (this.buffer.length > MAX_EVENTS) {
      this.buffer.splice(0, this.buffer.length - MAX_EVENTS);
    }
  }

  get events(): readonly DiagnosticEvent[] {
    return this.buffer;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Close the channel and log a one-line summary of the sweep. */
  close(records: number): SweepSummary {
    const summary: SweepSummary = {
      records,
      warnings: this.buffer.filter((e) => e.severity === "warning").length,
      errors: this.buffer.filter((e) => e.severity === "error").length,
      durationMs: Date.now() - this.startedAt,
    };
    if (!this.closed) {
      this.closed = true;
      this.log.info("[inventory] Sweep complete", summary);
    }
    return summary;
  }
}

export function openDiagnosticChannel(log?: winston.Logger): DiagnosticChannel {
  return new DiagnosticChannel(log);
}
