import type { RowState, RowStatus, RunMode } from "shared-types";

/** A precision at or above this (within PRECISION_EPSILON) counts as fully passing. */
export const FULL_PRECISION = 100;
export const PRECISION_EPSILON = 1e-9;

export type SelectionPolicy = {
  mode: RunMode;
  /** 1-based positions; null selects every row. */
  indices: ReadonlySet<number> | null;
  includeSkipped: boolean;
  isHardSkipped: (row: RowState) => boolean;
};

export function isFullPrecision(value: string): boolean {
  if (value.trim() === "") return false;
  const n = Number(value);
  if (!Number.isFinite(n)) return false;
  return n >= FULL_PRECISION - PRECISION_EPSILON;
}

export function isPending(row: RowState, policy: SelectionPolicy): boolean {
  if (policy.indices && !policy.indices.has(row.position)) return false;
  if (row.locator.trim() === "") return false;

  if (!policy.includeSkipped && (row.status === "skipped" || policy.isHardSkipped(row))) return false;

  // includeSkipped: skipped rows count as untested.
  const status: RowStatus = row.status === "skipped" ? "pending" : row.status;

  switch (policy.mode) {
    case "retest-all":
      return true;
    case "retest-failed":
      return status === "failure";
    case "retest-imprecise":
      if (status === "failure" || status === "pending") return true;
      return !isFullPrecision(row.precision);
    case "resume":
      return status === "pending";
  }
}

export function selectPending<R extends RowState>(rows: readonly R[], policy: SelectionPolicy): R[] {
  return rows.filter((r) => isPending(r, policy));
}
