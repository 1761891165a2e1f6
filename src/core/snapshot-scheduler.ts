/**
 * Party Registry -- Snapshot Scheduler
 *
 * Drives full capture passes over the snapshot ledger on an interval.
 * A pass is a sequence of captureBatch calls resumed from each call's
 * nextPartyId until the ledger reports completion.
 *
 * @module snapshot-scheduler
 * @license AGPL-3.0-or-later
 */

import { SnapshotLedger } from "./snapshot-ledger";
import type { Identity } from "../types";
import { FIRST_PARTY_ID } from "../types";
import { createLogger } from "../utils/logger";

const logger = createLogger("SnapshotScheduler");

export interface SchedulerOptions {
  /** Identity the scheduler captures as (must be the owner) */
  operator: () => Identity;
  batchSize: number;
  intervalMs: number;
}

/** Summary of one completed pass */
export interface PassSummary {
  batches: number;
  snapshots: number;
}

export class SnapshotScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly ledger: SnapshotLedger,
    private readonly options: SchedulerOptions
  ) {}

  /**
   * Runs one full pass synchronously, batch by batch.
   */
  runPass(): PassSummary {
    let start = FIRST_PARTY_ID;
    let batches = 0;
    let snapshots = 0;

    do {
      const result = this.ledger.captureBatch(this.options.operator(), start, this.options.batchSize);
      batches++;
      snapshots += result.processed;
      start = result.nextPartyId;
    } while (start !== 0);

    return { batches, snapshots };
  }

  start(): void {
    if (this.options.intervalMs <= 0) {
      logger.info("Disabled");
      return;
    }
    if (this.timer) return;

    this.timer = setInterval(() => this.safeRun(), this.options.intervalMs);
    this.timer.unref();

    logger.info("Started", { intervalMs: this.options.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Stopped");
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * One scheduled tick.  A failed pass (paused platform, operator no
   * longer the owner) is logged and retried on the next tick.
   */
  safeRun(): PassSummary | null {
    try {
      const summary = this.runPass();
      logger.info("Pass completed", { ...summary });
      return summary;
    } catch (err) {
      logger.error("Pass failed", { error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }
}
