/**
 * Reads what the comparison test printed.
 *
 * The comparison output is free text we do not control, so this is a heuristic:
 * one structured line gives metrics; otherwise the reason is the last line that
 * carries a known failure keyword, else the last three lines, else a fixed
 * "no output" marker.
 */

import type { ComparisonRun, Metrics, SampleOutcome } from "shared-types";

export const COMPARE_COUNT_MARKER = "对比样本=";
export const COMPARE_RATIO_MARKER = "Tao/FFmpeg:";

export const TIMEOUT_MARKER = "单样本测试超时";
export const SPAWN_FAILURE_MARKER = "对比命令启动失败";
export const NO_OUTPUT_REASON = "无输出";
export const STRICT_THRESHOLD_REMARK = "严格阈值未通过";

/** Always recognised, whatever the profile lists. */
export const BUILTIN_FAILURE_KEYWORDS: readonly string[] = [TIMEOUT_MARKER, SPAWN_FAILURE_MARKER];

export const DEFAULT_FAILURE_KEYWORDS: readonly string[] = [
  "缺少对比输入参数",
  "未找到可解码音频流",
  "ffmpeg 解码失败",
  "打开输入失败",
  "解析失败",
];

const NUM = String.raw`[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?`;

const METRICS_RE = new RegExp(
  String.raw`对比样本=(\d+), Tao=(\d+), FFmpeg=(\d+), (?:lag=[-+]?\d+, )?Tao/FFmpeg: ` +
    `max_err=(${NUM}), ` +
    `psnr=([A-Za-z]+|${NUM})dB, ` +
    String.raw`精度=([-+]?[0-9]*\.?[0-9]+)%`
);

const TAIL_LINES = 3;

export function formatPrecision(value: number): string {
  return value.toFixed(2);
}

export function parseMetrics(output: string): Metrics | null {
  for (const line of output.split(/\r?\n/)) {
    if (!line.includes(COMPARE_COUNT_MARKER) || !line.includes(COMPARE_RATIO_MARKER)) continue;
    const m = METRICS_RE.exec(line);
    if (!m) continue;
    const [, , decoder, reference, maxErr, psnr, precision] = m;
    if (decoder === undefined || reference === undefined || maxErr === undefined || psnr === undefined || precision === undefined) {
      continue;
    }
    const decoderCount = Number.parseInt(decoder, 10);
    const referenceCount = Number.parseInt(reference, 10);
    return {
      decoderCount,
      referenceCount,
      delta: decoderCount - referenceCount,
      maxErr,
      psnr,
      precision: formatPrecision(Number.parseFloat(precision)),
    };
  }
  return null;
}

function escapeCell(line: string): string {
  return line.replace(/\|/g, "/");
}

export function classifyFailure(output: string, keywords: readonly string[] = DEFAULT_FAILURE_KEYWORDS): string {
  const lines = output
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  if (lines.length === 0) return NO_OUTPUT_REASON;

  const all = [...BUILTIN_FAILURE_KEYWORDS, ...keywords];
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (line !== undefined && all.some((k) => line.includes(k))) return escapeCell(line);
  }

  return lines.slice(-TAIL_LINES).map(escapeCell).join(" / ");
}

export function toOutcome(run: ComparisonRun, keywords?: readonly string[]): SampleOutcome {
  const metrics = parseMetrics(run.output);
  if (metrics) {
    return { kind: "metrics", metrics, remark: run.exitCode === 0 ? "" : STRICT_THRESHOLD_REMARK };
  }
  return { kind: "failure", reason: classifyFailure(run.output, keywords) };
}
