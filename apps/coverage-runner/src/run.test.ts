import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseCliOptions } from "./cli";
import { writeReport, type ReportDocument } from "./reportStore";
import { run } from "./run";
import type { CompareFn } from "./scheduler";

const HEADER = "| 序号 | URL | 状态 | 失败原因 | Tao样本数 | FFmpeg样本数 | 样本数差异 | max_err | psnr(dB) | 精度(%) | 备注 |";
const SEP = "| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |";
const ROW_A = "| 1 | https://samples.example/ogg/a.ogg |  |  |  |  |  |  |  |  |  |";
const ROW_B = "| 2 | https://samples.example/ogg/b.ogg |  |  |  |  |  |  |  |  |  |";
const ROW_C = "| 3 | https://samples.example/ogg/c.ogg | 成功 |  | 10 | 10 | 0 | 0.1 | 50.00 | 100.00 |  |";
const REPORT = `# Ogg coverage\n\n${[HEADER, SEP, ROW_A, ROW_B, ROW_C].join("\n")}\n`;

const CONFIG = {
  profiles: {
    ogg: {
      report: "report.md",
      envVar: "OGG_COMPARE_INPUT",
      command: "unused",
      args: [],
      timeoutSec: 5,
      exemptions: [
        { kind: "hard_skip", index: 1, reason: "upstream bug" },
        { kind: "hard_skip", basename: "b.ogg", reason: "broken container" },
      ],
    },
  },
};

let dir = "";
let writes = 0;
let compared: string[] = [];

const countingPersist = async (doc: ReportDocument) => {
  writes += 1;
  await writeReport(doc);
};

const compare: CompareFn = async (locator) => {
  compared.push(locator);
  return {
    exitCode: 0,
    output: "Tao对比样本=4, Tao=50, FFmpeg=50, Tao/FFmpeg: max_err=0.01, psnr=60.00dB, 精度=100.00%",
    timedOut: false,
  };
};

function options(...args: string[]) {
  return parseCliOptions(["node", "coverage-runner", "--profile", "ogg", ...args], {}, dir);
}

const readReport = () => readFile(path.join(dir, "report.md"), "utf-8");

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "coverage-run-"));
  writes = 0;
  compared = [];
  await writeFile(path.join(dir, "coverage.config.json"), JSON.stringify(CONFIG), "utf-8");
  await writeFile(path.join(dir, "report.md"), REPORT, "utf-8");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("run", () => {
  it("persists the hard-skip pass even when no row runs", async () => {
    const tally = await run(options(), { compare, persist: countingPersist, log: () => undefined });

    expect(tally).toBeNull();
    expect(writes).toBe(1);
    expect(compared).toEqual([]);

    const lines = (await readReport()).split("\n");
    expect(lines[4]).toBe("| 1 | https://samples.example/ogg/a.ogg | 跳过 | upstream bug |  |  |  |  |  |  | 已跳过 |");
    expect(lines[5]).toBe("| 2 | https://samples.example/ogg/b.ogg | 跳过 | broken container |  |  |  |  |  |  | 已跳过 |");
    expect(lines[6]).toBe(ROW_C);
  });

  it("does not write again once the rules are applied", async () => {
    await run(options(), { compare, persist: countingPersist, log: () => undefined });
    const first = await readReport();

    await run(options(), { compare, persist: countingPersist, log: () => undefined });
    expect(writes).toBe(1);
    expect(await readReport()).toBe(first);
  });

  it("leaves the report unwritten with --include-skipped", async () => {
    const lines: string[] = [];
    await run(options("--include-skipped", "--dryRun"), {
      compare,
      persist: countingPersist,
      log: (line) => lines.push(line),
    });

    expect(writes).toBe(0);
    expect(compared).toEqual([]);
    expect(await readReport()).toBe(REPORT);
    expect(lines.filter((l) => l.startsWith("would run"))).toEqual([
      "would run 1: https://samples.example/ogg/a.ogg",
      "would run 2: https://samples.example/ogg/b.ogg",
    ]);
  });

  it("records selected rows through the injected comparison", async () => {
    const tally = await run(options("--retest-all", "--index", "3", "--jobs", "2"), {
      compare,
      persist: countingPersist,
      log: () => undefined,
    });

    expect(tally).toEqual({ processed: 1, success: 1, failure: 0 });
    expect(compared).toEqual(["https://samples.example/ogg/c.ogg"]);
    expect(writes).toBe(2);
    expect((await readReport()).split("\n")[6]).toBe(
      "| 3 | https://samples.example/ogg/c.ogg | 成功 |  | 50 | 50 | 0 | 0.01 | 60.00 | 100.00 |  |"
    );
  });

  it("prints tallies only with --summary", async () => {
    const lines: string[] = [];
    const tally = await run(options("--summary"), { compare, persist: countingPersist, log: (l) => lines.push(l) });

    expect(tally).toBeNull();
    expect(writes).toBe(0);
    expect(lines).toEqual([
      "Report summary (ogg):",
      "  total: 3",
      "  success: 1 (33.3%), full precision: 1",
      "  failure: 0",
      "  skipped: 0",
      "  pending: 2",
    ]);
  });
});
