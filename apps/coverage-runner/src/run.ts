import path from "node:path";
import type { CodecProfile, RowState, RunTally } from "shared-types";
import type { CliOptions } from "./cli";
import { loadConfig, resolveProfile } from "./config";
import { applyHardSkips, findHardSkip } from "./exemptions";
import { runComparison } from "./executor";
import { loadReport, writeReport } from "./reportStore";
import { runScheduled, type CompareFn, type PersistFn } from "./scheduler";
import { selectPending } from "./selection";
import { formatSummary, summarizeRows } from "./summary";

export type RunDeps = {
  /** Defaults to the profile's comparison command. */
  compare?: CompareFn;
  /** Defaults to an atomic write of the report file. */
  persist?: PersistFn;
  log?: (line: string) => void;
};

function profileCompare(profile: CodecProfile): CompareFn {
  return (locator, timeoutSec) =>
    runComparison({
      command: profile.command,
      args: profile.args,
      cwd: profile.cwd,
      envVar: profile.envVar,
      locator,
      timeoutSec,
    });
}

/**
 * One coverage run for the selected profile. Resolves with the tally, or null
 * when nothing was compared (summary, dry run, no pending rows).
 */
export async function run(opts: CliOptions, deps: RunDeps = {}): Promise<RunTally | null> {
  const log = deps.log ?? console.log;
  const persist = deps.persist ?? writeReport;
  const rel = (p: string) => {
    const r = path.relative(opts.repoRoot, p).split(path.sep).join("/");
    return r.length ? r : ".";
  };
  const printSummary = (profile: CodecProfile, rows: readonly RowState[]) => {
    log(`Report summary (${profile.name}):`);
    for (const line of formatSummary(summarizeRows(rows))) log(`  ${line}`);
  };

  const config = await loadConfig(opts.configPath);
  const profile = resolveProfile(config, opts.profile, opts.repoRoot);
  const reportPath = opts.reportPath ?? profile.report;
  const timeoutSec = opts.timeoutSec ?? profile.timeoutSec;

  const report = await loadReport(reportPath);

  if (opts.summaryOnly) {
    printSummary(profile, report.rows);
    return null;
  }

  if (!opts.includeSkipped) {
    const changed = applyHardSkips(report.rows, profile.exemptions);
    if (changed > 0) {
      await persist(report);
      log(`Marked ${changed} row(s) as skipped by rule`);
    }
  }

  const pending = selectPending(report.rows, {
    mode: opts.mode,
    indices: opts.indices ? new Set(opts.indices) : null,
    includeSkipped: opts.includeSkipped,
    isHardSkipped: (row) => findHardSkip(profile.exemptions, row) !== undefined,
  });

  if (pending.length === 0) {
    log("No rows to process.");
    return null;
  }

  log("Coverage run started");
  log(`profile: ${profile.name}`);
  log(`report: ${rel(reportPath)}`);
  log(`mode: ${opts.mode}`);
  if (opts.indices) log(`index: ${opts.indices.join(", ")}`);
  log(`pending: ${pending.length}/${report.rows.length}, jobs: ${opts.jobs}, timeout: ${timeoutSec}s`);

  if (opts.dryRun) {
    for (const row of pending) log(`would run ${row.position}: ${row.locator}`);
    return null;
  }

  const tally = await runScheduled({
    report,
    worklist: pending,
    jobs: opts.jobs,
    timeoutSec,
    failureKeywords: profile.failureKeywords,
    exemptions: profile.exemptions,
    compare: deps.compare ?? profileCompare(profile),
    persist,
    log,
  });

  log("Coverage run finished");
  log(`processed: ${tally.processed}, success: ${tally.success}, failure: ${tally.failure}`);
  printSummary(profile, report.rows);
  return tally;
}
