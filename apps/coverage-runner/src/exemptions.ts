import type { ExemptionRule, MetricsOutcome, RowState, SampleOutcome } from "shared-types";
import { sanitizeCell, type ReportRow } from "./reportRow";
import { FULL_PRECISION, isFullPrecision } from "./selection";
import { formatPrecision } from "./metrics";

export const SKIPPED_REMARK = "已跳过";
export const DEFAULT_SKIP_REASON = "按规则跳过";
export const TOLERANCE_REMARK_PREFIX = "容差豁免";

/** Last path segment of a URL or file path, without query or fragment. */
export function sampleBasename(locator: string): string {
  const bare = locator.trim().replace(/[?#].*$/, "").replace(/[\\/]+$/, "");
  const parts = bare.split(/[\\/]/);
  return parts[parts.length - 1] ?? "";
}

function matches(rule: ExemptionRule, row: Pick<RowState, "position" | "locator">): boolean {
  if (rule.index !== undefined && rule.index === row.position) return true;
  if (rule.basename !== undefined && rule.basename === sampleBasename(row.locator)) return true;
  return false;
}

export function findHardSkip(
  rules: readonly ExemptionRule[],
  row: Pick<RowState, "position" | "locator">
): ExemptionRule | undefined {
  return rules.find((r) => r.kind === "hard_skip" && matches(r, row));
}

export function findTolerance(rules: readonly ExemptionRule[], locator: string): ExemptionRule | undefined {
  const basename = sampleBasename(locator);
  return rules.find((r) => r.kind === "tolerance" && r.basename !== undefined && r.basename === basename);
}

/**
 * Forces every hard-skipped row to the skipped state. Rows already skipped with
 * the rule's reason are left alone, so applying this twice changes nothing.
 * Returns how many rows changed; the caller persists when that is non-zero.
 */
export function applyHardSkips(rows: readonly ReportRow[], rules: readonly ExemptionRule[]): number {
  let changed = 0;
  for (const row of rows) {
    const rule = findHardSkip(rules, row);
    if (!rule) continue;
    const reason = sanitizeCell(rule.reason) || DEFAULT_SKIP_REASON;
    if (row.status === "skipped" && row.reason === reason) continue;
    row.status = "skipped";
    row.set("reason", reason);
    row.clearMetrics();
    row.set("remark", SKIPPED_REMARK);
    changed += 1;
  }
  return changed;
}

function joinRemark(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join("; ");
}

/**
 * Reports a tolerated sample's precision as fully passing and keeps the measured
 * value in the remark. Max error and PSNR stay as measured.
 */
export function applyTolerance(
  outcome: SampleOutcome,
  locator: string,
  rules: readonly ExemptionRule[]
): SampleOutcome {
  if (outcome.kind !== "metrics") return outcome;
  if (isFullPrecision(outcome.metrics.precision)) return outcome;
  const rule = findTolerance(rules, locator);
  if (!rule) return outcome;

  const note = `${TOLERANCE_REMARK_PREFIX}: 实测精度 ${outcome.metrics.precision}% (${rule.reason})`;
  const tolerated: MetricsOutcome = {
    kind: "metrics",
    metrics: { ...outcome.metrics, precision: formatPrecision(FULL_PRECISION) },
    remark: joinRemark(outcome.remark, note),
  };
  return tolerated;
}
