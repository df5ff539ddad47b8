import type { ColumnIndex, ColumnKey, RowState, RowStatus } from "shared-types";

/** Header label of every column the runner reads or writes. */
export const REPORT_COLUMNS: Readonly<Record<ColumnKey, string>> = {
  sequence: "序号",
  locator: "URL",
  status: "状态",
  reason: "失败原因",
  decoderCount: "Tao样本数",
  referenceCount: "FFmpeg样本数",
  countDelta: "样本数差异",
  maxErr: "max_err",
  psnr: "psnr(dB)",
  precision: "精度(%)",
  remark: "备注",
};

export const STATUS_LABELS: Readonly<Record<Exclude<RowStatus, "pending">, string>> = {
  success: "成功",
  failure: "失败",
  skipped: "跳过",
};

export const METRIC_COLUMNS: readonly ColumnKey[] = [
  "decoderCount",
  "referenceCount",
  "countDelta",
  "maxErr",
  "psnr",
  "precision",
];

export function statusFromLabel(label: string): RowStatus {
  switch (label.trim()) {
    case STATUS_LABELS.success:
      return "success";
    case STATUS_LABELS.failure:
      return "failure";
    case STATUS_LABELS.skipped:
      return "skipped";
    default:
      return "pending";
  }
}

export function statusLabel(status: RowStatus): string {
  return status === "pending" ? "" : STATUS_LABELS[status];
}

/** Cell text that cannot break the pipe table. */
export function sanitizeCell(value: string): string {
  return value.replace(/\|/g, "/").replace(/[\r\n]+/g, " ").trim();
}

export function splitRow(line: string): string[] {
  const parts = line.trim().split("|").map((p) => p.trim());
  if (parts.length < 3) return [];
  return parts.slice(1, -1);
}

export function formatRow(cells: readonly string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/**
 * One data line of the report table. Cells are addressed by column key through
 * the index resolved from the header, so the document may order columns freely.
 * Until a cell is written the row renders as its original text.
 */
export class ReportRow implements RowState {
  private readonly cells: string[];
  private dirty = false;

  constructor(
    public readonly position: number,
    private readonly raw: string,
    private readonly columns: ColumnIndex,
    /** Line terminator the row is written back with. */
    public readonly eol = "\n"
  ) {
    this.cells = splitRow(raw);
  }

  get(key: ColumnKey): string {
    return this.cells[this.columns[key]] ?? "";
  }

  set(key: ColumnKey, value: string): void {
    const idx = this.columns[key];
    const next = sanitizeCell(value);
    if (this.cells[idx] === next) return;
    while (this.cells.length <= idx) this.cells.push("");
    this.cells[idx] = next;
    this.dirty = true;
  }

  get locator(): string {
    return this.get("locator");
  }

  get status(): RowStatus {
    return statusFromLabel(this.get("status"));
  }

  set status(status: RowStatus) {
    this.set("status", statusLabel(status));
  }

  get reason(): string {
    return this.get("reason");
  }

  get precision(): string {
    return this.get("precision");
  }

  get remark(): string {
    return this.get("remark");
  }

  clearMetrics(): void {
    for (const key of METRIC_COLUMNS) this.set(key, "");
  }

  get modified(): boolean {
    return this.dirty;
  }

  render(): string {
    return this.dirty ? formatRow(this.cells) : this.raw;
  }
}
