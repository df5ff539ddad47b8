import os from "node:os";
import path from "node:path";
import { CliUsageError, makeArgvHelpers } from "cli-utils";
import type { RunMode } from "shared-types";
import { DEFAULT_CONFIG_PATH } from "./config";
import { MAX_TIMEOUT_SEC } from "./executor";

export const HELP_TEXT = `
Usage:
  coverage-runner --profile <name> [--retest-all | --retest-failed | --retest-imprecise]
                  [--index <n...>] [--jobs <n>] [--timeout <sec>] [--include-skipped]
                  [--config <path>] [--report <path>] [--repoRoot <path>] [--dryRun] [--summary]

Options:
  --profile             Codec profile from the config file (e.g. aac, vorbis, mp3, flac, h264)
  --config              Profiles config (default: coverage.config.json under repoRoot)
  --report              Report to update instead of the profile's report
  --repoRoot            Repo root (default: INIT_CWD or cwd)

Selection (default: only rows that were never tested):
  --retest-all          Re-test every row
  --retest-failed       Re-test rows whose status is failure
  --retest-imprecise    Re-test failed, untested and below-100% rows
  --index               Only these row positions (repeatable, space or comma separated)
  --include-skipped     Also consider rows that are skipped by default

Execution:
  --jobs, -j            Parallel comparisons (default: available parallelism)
  --timeout             Per-sample timeout in seconds (default: from the profile)
  --dryRun              List the rows that would run, run nothing
  --summary             Print report tallies and exit

  --help, -h            Show this help

Exit codes:
  0  finished (individual sample failures are recorded in the report)
  1  runtime error (missing report, bad table, bad config)
  2  bad arguments / usage

Examples:
  npm run coverage -- --profile aac
  npm run coverage -- --profile vorbis --retest-imprecise --jobs 4
  npm run coverage -- --profile aac --index 3 5 8 --retest-all
`.trim();

const ALLOWED_OPTIONS = new Set([
  "--profile",
  "--config",
  "--report",
  "--repoRoot",
  "--retest-all",
  "--retest-failed",
  "--retest-imprecise",
  "--index",
  "--include-skipped",
  "--jobs",
  "-j",
  "--timeout",
  "--dryRun",
  "--summary",
  "--help",
  "-h",
]);

export type CliOptions = {
  help: boolean;
  repoRoot: string;
  profile: string;
  configPath: string;
  reportPath: string | null;
  mode: RunMode;
  indices: number[] | null;
  includeSkipped: boolean;
  jobs: number;
  timeoutSec: number | null;
  dryRun: boolean;
  summaryOnly: boolean;
};

function resolveFromRoot(repoRoot: string, p: string): string {
  if (path.isAbsolute(p)) return p;
  return path.resolve(repoRoot, p);
}

function parseMode(hasFlag: (...names: string[]) => boolean): RunMode {
  const modes: RunMode[] = (["retest-all", "retest-failed", "retest-imprecise"] as const).filter((m) =>
    hasFlag(`--${m}`)
  );
  if (modes.length > 1) {
    throw new CliUsageError(`Options ${modes.map((m) => `--${m}`).join(", ")} are mutually exclusive\n\n${HELP_TEXT}`);
  }
  return modes[0] ?? "resume";
}

export function parseCliOptions(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): CliOptions {
  const { hasFlag, getArg, assertNoUnknownOptions, assertHasValue, parseIntFlag, parseIntList } = makeArgvHelpers(
    argv,
    HELP_TEXT
  );

  const repoRoot = path.resolve(cwd, getArg("--repoRoot") ?? env.INIT_CWD ?? cwd);
  const help = hasFlag("--help", "-h");
  if (help) {
    return {
      help,
      repoRoot,
      profile: "",
      configPath: resolveFromRoot(repoRoot, DEFAULT_CONFIG_PATH),
      reportPath: null,
      mode: "resume",
      indices: null,
      includeSkipped: false,
      jobs: 1,
      timeoutSec: null,
      dryRun: false,
      summaryOnly: false,
    };
  }

  assertNoUnknownOptions(ALLOWED_OPTIONS);
  assertHasValue("--profile", "--config", "--report", "--repoRoot", "--index", "--jobs", "-j", "--timeout");

  const profile = getArg("--profile");
  if (!profile) throw new CliUsageError(`Missing required option --profile\n\n${HELP_TEXT}`);

  const report = getArg("--report");
  const indices = parseIntList("--index");
  const timeout = getArg("--timeout");

  return {
    help,
    repoRoot,
    profile,
    configPath: resolveFromRoot(repoRoot, getArg("--config") ?? DEFAULT_CONFIG_PATH),
    reportPath: report ? resolveFromRoot(repoRoot, report) : null,
    mode: parseMode(hasFlag),
    indices: indices.length ? indices : null,
    includeSkipped: hasFlag("--include-skipped"),
    jobs: parseIntFlag(["--jobs", "-j"], os.availableParallelism(), 1),
    timeoutSec: timeout === null ? null : parseIntFlag("--timeout", 0, 1, MAX_TIMEOUT_SEC),
    dryRun: hasFlag("--dryRun"),
    summaryOnly: hasFlag("--summary"),
  };
}
