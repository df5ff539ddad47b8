export type ReportFormatCode = "missing_report" | "missing_header" | "missing_separator" | "missing_column";

/** The report cannot be used at all; raised before any sample runs. */
export class ReportFormatError extends Error {
  public readonly exitCode = 1;
  constructor(
    public readonly code: ReportFormatCode,
    message: string,
    public readonly column?: string
  ) {
    super(message);
    this.name = "ReportFormatError";
  }
}

export class ConfigError extends Error {
  public readonly exitCode = 1;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function hasExitCode(err: unknown): err is { exitCode: number } {
  return typeof err === "object" && err !== null && "exitCode" in err && typeof err.exitCode === "number";
}
