import type { ComparisonRun, ExemptionRule, RunTally, SampleOutcome } from "shared-types";
import { applyTolerance } from "./exemptions";
import { toOutcome } from "./metrics";
import { Mutex } from "./mutex";
import { statusLabel, type ReportRow } from "./reportRow";
import type { ReportDocument } from "./reportStore";

export type CompareFn = (locator: string, timeoutSec: number) => Promise<ComparisonRun>;
export type PersistFn = (report: ReportDocument) => Promise<void>;

export type ScheduleOptions = {
  report: ReportDocument;
  /** Pending rows in report order. */
  worklist: readonly ReportRow[];
  jobs: number;
  timeoutSec: number;
  failureKeywords?: readonly string[];
  exemptions: readonly ExemptionRule[];
  compare: CompareFn;
  persist: PersistFn;
  log?: (line: string) => void;
};

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<R>
): Promise<R[]> {
  const n = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array(items.length);
  let nextIdx = 0;
  let failed = false;

  async function worker(): Promise<void> {
    // after the first rejection no worker picks up new items
    while (!failed) {
      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) return;

      const item = items[idx];
      if (item === undefined) return;

      try {
        results[idx] = await fn(item, idx);
      } catch (e) {
        failed = true;
        throw e;
      }
    }
  }

  const workers = Array.from({ length: Math.min(n, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/** Folds one outcome into its row. Callers hold the report lock. */
export function recordOutcome(row: ReportRow, outcome: SampleOutcome): void {
  if (outcome.kind === "metrics") {
    const m = outcome.metrics;
    row.status = "success";
    row.set("reason", "");
    row.set("decoderCount", String(m.decoderCount));
    row.set("referenceCount", String(m.referenceCount));
    row.set("countDelta", String(m.delta));
    row.set("maxErr", m.maxErr);
    row.set("psnr", m.psnr);
    row.set("precision", m.precision);
    row.set("remark", outcome.remark);
    return;
  }
  row.status = "failure";
  row.set("reason", outcome.reason);
  row.clearMetrics();
  row.set("remark", "");
}

/**
 * Runs every pending row through the comparison command with at most `jobs`
 * in flight. Each finished row is written into the report and the whole report
 * is persisted before the next result is recorded.
 */
export async function runScheduled(opts: ScheduleOptions): Promise<RunTally> {
  const log = opts.log ?? console.log;
  const lock = new Mutex();
  const total = opts.report.rows.length;
  const tally: RunTally = { processed: 0, success: 0, failure: 0 };

  await runWithConcurrency(opts.worklist, opts.jobs, async (row) => {
    const locator = row.locator;
    log(`start ${row.position}/${total}: ${locator}`);

    const run = await opts.compare(locator, opts.timeoutSec);
    const outcome = applyTolerance(toOutcome(run, opts.failureKeywords), locator, opts.exemptions);

    await lock.runExclusive(async () => {
      recordOutcome(row, outcome);
      await opts.persist(opts.report);
      tally.processed += 1;
      if (outcome.kind === "metrics") tally.success += 1;
      else tally.failure += 1;
      log(`recorded ${row.position}/${total}: ${statusLabel(row.status)}`);
    });
  });

  return tally;
}
