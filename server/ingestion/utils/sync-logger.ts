/**
 * Sync Logger
 *
 * Tracks one task run from start to end, prints a summary line and hands the finished entry
 * to an optional sink (the record store's `data_ingestion_log`).
 */

import type { IngestionStatus } from "../../../drizzle/schema";
import { errorMessage } from "../../_core/errors";
import { createLogger } from "../../_core/logger";

const log = createLogger("sync");

export interface SyncContext {
  worker: string;
  parameters: Record<string, unknown>;
  startedAt: Date;
  recordsProcessed: number;
  recordsWritten: number;
  errors: string[];
}

export interface SyncLog {
  worker: string;
  source: string;
  status: IngestionStatus;
  parameters: Record<string, unknown>;
  recordsProcessed: number;
  recordsWritten: number;
  errors: string[];
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

export type SyncLogSink = (entry: SyncLog) => Promise<void>;

export function statusOf(context: SyncContext): "success" | "partial" | "failure" {
  if (context.errors.length === 0) return "success";
  return context.recordsWritten > 0 ? "partial" : "failure";
}

export class SyncLogger {
  constructor(private readonly sink?: SyncLogSink) {}

  startSync(worker: string, parameters: Record<string, unknown> = {}): SyncContext {
    log.debug(`${worker} started`, parameters);
    return {
      worker,
      parameters,
      startedAt: new Date(),
      recordsProcessed: 0,
      recordsWritten: 0,
      errors: [],
    };
  }

  /** `status` overrides the status derived from the counters (no_data, skipped). */
  async endSync(context: SyncContext, source: string, status: IngestionStatus = statusOf(context)): Promise<SyncLog> {
    const completedAt = new Date();
    const entry: SyncLog = {
      worker: context.worker,
      source,
      status,
      parameters: context.parameters,
      recordsProcessed: context.recordsProcessed,
      recordsWritten: context.recordsWritten,
      errors: [...context.errors],
      startedAt: context.startedAt,
      completedAt,
      durationMs: completedAt.getTime() - context.startedAt.getTime(),
    };

    const summary = {
      status,
      processed: entry.recordsProcessed,
      written: entry.recordsWritten,
      errors: entry.errors.length,
      durationMs: entry.durationMs,
    };
    if (status === "failure" || status === "partial") {
      log.warn(`${context.worker} finished`, summary);
    } else {
      log.info(`${context.worker} finished`, summary);
    }

    if (this.sink) {
      try {
        await this.sink(entry);
      } catch (error) {
        log.error(`Could not persist sync log for ${context.worker}`, errorMessage(error));
      }
    }

    return entry;
  }
}
