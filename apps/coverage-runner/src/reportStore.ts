import { readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ColumnIndex, ColumnKey } from "shared-types";
import { ReportFormatError } from "./errors";
import { REPORT_COLUMNS, ReportRow, splitRow } from "./reportRow";

export const HEADER_PREFIX = `| ${REPORT_COLUMNS.sequence} |`;

const SEPARATOR_RE = /^\|\s*:?-{3,}:?\s*\|/;

/** One physical line and the terminator it ended with ("" on an unterminated last line). */
export type TextLine = {
  text: string;
  eol: string;
};

export type ReportDocument = {
  path: string;
  prefix: TextLine[];
  headerIndex: number;
  headerLine: TextLine;
  header: string[];
  separatorLine: TextLine;
  columns: ColumnIndex;
  /** Table lines after the separator, in order; lines with no cells stay as text. */
  body: Array<ReportRow | TextLine>;
  rows: ReportRow[];
  suffix: TextLine[];
};

export function requireColumns(
  header: readonly string[],
  columns: Readonly<Record<ColumnKey, string>> = REPORT_COLUMNS
): ColumnIndex {
  const at = (key: ColumnKey): number => {
    const name = columns[key];
    const idx = header.indexOf(name);
    if (idx === -1) {
      throw new ReportFormatError("missing_column", `Report table is missing column: ${name}`, name);
    }
    return idx;
  };

  return {
    sequence: at("sequence"),
    locator: at("locator"),
    status: at("status"),
    reason: at("reason"),
    decoderCount: at("decoderCount"),
    referenceCount: at("referenceCount"),
    countDelta: at("countDelta"),
    maxErr: at("maxErr"),
    psnr: at("psnr"),
    precision: at("precision"),
    remark: at("remark"),
  };
}

export function splitLines(text: string): TextLine[] {
  if (text === "") return [];
  return text.split(/(?<=\n)/).map((segment) => {
    const eol = segment.endsWith("\r\n") ? "\r\n" : segment.endsWith("\n") ? "\n" : "";
    return { text: segment.slice(0, segment.length - eol.length), eol };
  });
}

export function parseReport(text: string, reportPath: string): ReportDocument {
  const lines = splitLines(text);

  const headerIndex = lines.findIndex((l) => l.text.startsWith(HEADER_PREFIX));
  const headerLine = lines[headerIndex];
  if (headerLine === undefined) {
    throw new ReportFormatError("missing_header", `Report header not found (expected a line starting with "${HEADER_PREFIX}"): ${reportPath}`);
  }
  const separatorLine = lines[headerIndex + 1];
  if (separatorLine === undefined || !SEPARATOR_RE.test(separatorLine.text)) {
    throw new ReportFormatError("missing_separator", `Report separator line missing after header: ${reportPath}`);
  }

  const header = splitRow(headerLine.text);
  const columns = requireColumns(header);

  const body: Array<ReportRow | TextLine> = [];
  const rows: ReportRow[] = [];
  let cursor = headerIndex + 2;
  while (cursor < lines.length) {
    const line = lines[cursor];
    if (line === undefined || !line.text.startsWith("|")) break;
    if (splitRow(line.text).length === 0) {
      // no cells: kept as text, not a sample
      body.push(line);
    } else {
      const row = new ReportRow(rows.length + 1, line.text, columns, line.eol);
      rows.push(row);
      body.push(row);
    }
    cursor += 1;
  }

  return {
    path: reportPath,
    prefix: lines.slice(0, headerIndex),
    headerIndex,
    headerLine,
    header,
    separatorLine,
    columns,
    body,
    rows,
    suffix: lines.slice(cursor),
  };
}

export async function loadReport(reportPath: string): Promise<ReportDocument> {
  let text: string;
  try {
    text = await readFile(reportPath, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new ReportFormatError("missing_report", `Report not found, generate the report template first: ${reportPath}`);
    }
    throw e;
  }
  return parseReport(text, reportPath);
}

function renderLine(line: ReportRow | TextLine): string {
  return line instanceof ReportRow ? line.render() + line.eol : line.text + line.eol;
}

export function renderReport(doc: ReportDocument): string {
  const lines = [...doc.prefix, doc.headerLine, doc.separatorLine, ...doc.body, ...doc.suffix];
  return lines.map(renderLine).join("");
}

/** Replaces the report in one rename so readers never see a partial table. */
export async function writeReport(doc: ReportDocument): Promise<void> {
  const dir = path.dirname(doc.path);
  const tmp = path.join(dir, `.${path.basename(doc.path)}.${process.pid}.tmp`);
  try {
    await writeFile(tmp, renderReport(doc), "utf-8");
    await rename(tmp, doc.path);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
}
