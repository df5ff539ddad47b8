import type { RowState } from "shared-types";
import { isFullPrecision } from "./selection";

export type ReportSummary = {
  total: number;
  pending: number;
  success: number;
  failure: number;
  skipped: number;
  fullPrecision: number;
  /** Positions of successful rows below full precision. */
  imprecise: number[];
};

export function summarizeRows(rows: readonly RowState[]): ReportSummary {
  const s: ReportSummary = {
    total: rows.length,
    pending: 0,
    success: 0,
    failure: 0,
    skipped: 0,
    fullPrecision: 0,
    imprecise: [],
  };
  for (const row of rows) {
    s[row.status] += 1;
    if (row.status !== "success") continue;
    if (isFullPrecision(row.precision)) s.fullPrecision += 1;
    else s.imprecise.push(row.position);
  }
  return s;
}

export function formatSummary(s: ReportSummary): string[] {
  const pct = (n: number) => (s.total > 0 ? ((n / s.total) * 100).toFixed(1) : "0.0");
  const lines = [
    `total: ${s.total}`,
    `success: ${s.success} (${pct(s.success)}%), full precision: ${s.fullPrecision}`,
    `failure: ${s.failure}`,
    `skipped: ${s.skipped}`,
    `pending: ${s.pending}`,
  ];
  if (s.imprecise.length) lines.push(`imprecise: ${s.imprecise.join(", ")}`);
  return lines;
}
