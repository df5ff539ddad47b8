// apps/coverage-runner/src/index.ts
import { HELP_TEXT, parseCliOptions } from "./cli";
import { hasExitCode } from "./errors";
import { killActiveComparisons } from "./executor";
import { run } from "./run";

async function main(): Promise<void> {
  const opts = parseCliOptions(process.argv);
  if (opts.help) {
    console.log(HELP_TEXT);
    return;
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      const killed = killActiveComparisons();
      console.error(`${signal}: stopped ${killed} running comparison(s); recorded rows are kept`);
      process.exit(signal === "SIGINT" ? 130 : 143);
    });
  }

  await run(opts);
}

main().catch((err: unknown) => {
  // comparisons still in flight are detached process groups; stop them before exiting
  const killed = killActiveComparisons();
  if (killed > 0) console.error(`stopped ${killed} running comparison(s)`);

  if (hasExitCode(err)) {
    const note = err instanceof Error ? err.message : String(err);
    console.error(note);
    process.exit(err.exitCode);
  }

  console.error(String(err instanceof Error ? err.stack : err));
  process.exit(1);
});
