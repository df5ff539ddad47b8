import { describe, it, expect } from "vitest";
import type { ComparisonRun, ExemptionRule } from "shared-types";
import { parseReport, renderReport, type ReportDocument } from "./reportStore";
import { recordOutcome, runScheduled, runWithConcurrency } from "./scheduler";
import { selectPending } from "./selection";

const HEADER = "| 序号 | URL | 状态 | 失败原因 | Tao样本数 | FFmpeg样本数 | 样本数差异 | max_err | psnr(dB) | 精度(%) | 备注 |";
const SEP = "| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |";

function emptyRow(n: number): string {
  return `| ${n} | https://samples.example/s${n}.aac |  |  |  |  |  |  |  |  |  |`;
}

function makeReport(count: number): ReportDocument {
  const rows = Array.from({ length: count }, (_, i) => emptyRow(i + 1));
  return parseReport(`${[HEADER, SEP, ...rows].join("\n")}\n`, "report.md");
}

function metricsLine(precision: string): string {
  return `Tao对比样本=8, Tao=100, FFmpeg=98, Tao/FFmpeg: max_err=0.25, psnr=40.00dB, 精度=${precision}%`;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const resume = { mode: "resume" as const, indices: null, includeSkipped: false, isHardSkipped: () => false };

describe("runWithConcurrency", () => {
  it("keeps result order and never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const out = await runWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, idx) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight -= 1;
      return idx * 10;
    });
    expect(out).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it("starts no new items after one rejects", async () => {
    const started: number[] = [];
    const pool = runWithConcurrency([0, 1, 2, 3], 2, async (item) => {
      started.push(item);
      if (item === 0) throw new Error("write failed");
      await sleep(20);
      return item;
    });
    await expect(pool).rejects.toThrow("write failed");
    await sleep(50);
    expect(started).toEqual([0, 1]);
  });

  it("returns an empty list for no items", async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe("runScheduled", () => {
  it("records every outcome and persists after each one", async () => {
    const report = makeReport(4);
    const delays: Record<string, number> = { s1: 40, s2: 5, s3: 20, s4: 1 };
    const runs: Record<string, ComparisonRun> = {
      s1: { exitCode: 0, output: metricsLine("100.00"), timedOut: false },
      s2: { exitCode: 101, output: metricsLine("92.5"), timedOut: false },
      s3: { exitCode: 124, output: "partial\n单样本测试超时: 5s", timedOut: true },
      s4: { exitCode: 1, output: "打开输入失败: 404", timedOut: false },
    };
    const snapshots: string[] = [];
    const seenTimeouts: number[] = [];

    const tally = await runScheduled({
      report,
      worklist: selectPending(report.rows, resume),
      jobs: 3,
      timeoutSec: 5,
      exemptions: [],
      compare: async (locator, timeoutSec) => {
        seenTimeouts.push(timeoutSec);
        const key = locator.replace(/^.*\/(s\d+)\.aac$/, "$1");
        await sleep(delays[key] ?? 0);
        const run = runs[key];
        if (!run) throw new Error(`unexpected sample ${locator}`);
        return run;
      },
      persist: async (doc) => {
        snapshots.push(renderReport(doc));
      },
      log: () => undefined,
    });

    expect(tally).toEqual({ processed: 4, success: 2, failure: 2 });
    expect(snapshots.length).toBe(4);
    expect(seenTimeouts).toEqual([5, 5, 5, 5]);

    const lines = renderReport(report).split("\n");
    expect(lines[2]).toBe("| 1 | https://samples.example/s1.aac | 成功 |  | 100 | 98 | 2 | 0.25 | 40.00 | 100.00 |  |");
    expect(lines[3]).toBe(
      "| 2 | https://samples.example/s2.aac | 成功 |  | 100 | 98 | 2 | 0.25 | 40.00 | 92.50 | 严格阈值未通过 |"
    );
    expect(lines[4]).toBe("| 3 | https://samples.example/s3.aac | 失败 | 单样本测试超时: 5s |  |  |  |  |  |  |  |");
    expect(lines[5]).toBe("| 4 | https://samples.example/s4.aac | 失败 | 打开输入失败: 404 |  |  |  |  |  |  |  |");
  });

  it("each persisted snapshot has one more recorded row than the last", async () => {
    const report = makeReport(3);
    const recorded: number[] = [];
    await runScheduled({
      report,
      worklist: report.rows,
      jobs: 3,
      timeoutSec: 5,
      exemptions: [],
      compare: async () => ({ exitCode: 0, output: metricsLine("100"), timedOut: false }),
      persist: async (doc) => {
        await sleep(5);
        recorded.push(doc.rows.filter((r) => r.status !== "pending").length);
      },
      log: () => undefined,
    });
    expect(recorded).toEqual([1, 2, 3]);
  });

  it("a resumed run skips rows recorded by an interrupted one", async () => {
    const report = makeReport(3);
    const first = report.rows[0];
    if (!first) throw new Error("no row");
    recordOutcome(first, { kind: "failure", reason: "打开输入失败: x" });

    const compared: string[] = [];
    await runScheduled({
      report,
      worklist: selectPending(report.rows, resume),
      jobs: 1,
      timeoutSec: 5,
      exemptions: [],
      compare: async (locator) => {
        compared.push(locator);
        return { exitCode: 0, output: metricsLine("100"), timedOut: false };
      },
      persist: async () => undefined,
      log: () => undefined,
    });
    expect(compared).toEqual(["https://samples.example/s2.aac", "https://samples.example/s3.aac"]);
    expect(first.status).toBe("failure");
  });

  it("applies tolerance rules before recording", async () => {
    const report = makeReport(1);
    const rules: ExemptionRule[] = [{ kind: "tolerance", basename: "s1.aac", reason: "dither" }];
    await runScheduled({
      report,
      worklist: report.rows,
      jobs: 1,
      timeoutSec: 5,
      exemptions: rules,
      compare: async () => ({ exitCode: 0, output: metricsLine("99.1"), timedOut: false }),
      persist: async () => undefined,
      log: () => undefined,
    });
    const row = report.rows[0];
    expect(row?.precision).toBe("100.00");
    expect(row?.remark).toBe("容差豁免: 实测精度 99.10% (dither)");
  });

  it("logs start and record lines", async () => {
    const report = makeReport(1);
    const lines: string[] = [];
    await runScheduled({
      report,
      worklist: report.rows,
      jobs: 1,
      timeoutSec: 5,
      exemptions: [],
      compare: async () => ({ exitCode: 1, output: "", timedOut: false }),
      persist: async () => undefined,
      log: (line) => lines.push(line),
    });
    expect(lines).toEqual(["start 1/1: https://samples.example/s1.aac", "recorded 1/1: 失败"]);
  });
});

describe("runScheduled when the report cannot be written", () => {
  it("rejects with the write error and stops comparing", async () => {
    const report = makeReport(3);
    const compared: string[] = [];
    const run = runScheduled({
      report,
      worklist: report.rows,
      jobs: 1,
      timeoutSec: 5,
      exemptions: [],
      compare: async (locator) => {
        compared.push(locator);
        return { exitCode: 0, output: metricsLine("100"), timedOut: false };
      },
      persist: async () => {
        throw new Error("EIO: i/o error, write");
      },
      log: () => undefined,
    });

    await expect(run).rejects.toThrow("EIO: i/o error, write");
    expect(compared).toEqual(["https://samples.example/s1.aac"]);
  });
});

describe("recordOutcome", () => {
  it("clears stale metrics when a row turns into a failure", () => {
    const report = makeReport(1);
    const row = report.rows[0];
    if (!row) throw new Error("no row");
    recordOutcome(row, {
      kind: "metrics",
      metrics: { decoderCount: 1, referenceCount: 1, delta: 0, maxErr: "0", psnr: "inf", precision: "100.00" },
      remark: "",
    });
    recordOutcome(row, { kind: "failure", reason: "解析失败" });
    expect(row.render()).toBe("| 1 | https://samples.example/s1.aac | 失败 | 解析失败 |  |  |  |  |  |  |  |");
  });
});
