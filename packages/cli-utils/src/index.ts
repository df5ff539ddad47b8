export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith("--") && a.includes("=")) {
      const idx = a.indexOf("=");
      const key = a.slice(0, idx);
      const val = a.slice(idx + 1);
      out.push(key);
      if (val.length) out.push(val);
    } else {
      out.push(a);
    }
  }
  return out;
}

function isOptionToken(a: string): boolean {
  return /^--?[A-Za-z]/.test(a);
}

/**
 * Helpers over `argv` as given by `process.argv` (the first two entries are the
 * runtime and the script and are never treated as options).
 */
export function makeArgvHelpers(argv: string[], helpText: string) {
  const args = normalizeArgv(argv).slice(2);

  function hasFlag(...names: string[]): boolean {
    return names.some((n) => args.includes(n));
  }

  function getArg(...names: string[]): string | null {
    for (const name of names) {
      const idx = args.indexOf(name);
      if (idx === -1) continue;
      const v = args[idx + 1];
      if (v === undefined || isOptionToken(v)) return null;
      return v;
    }
    return null;
  }

  /** Every value following every occurrence of the option, split on commas. */
  function getArgs(...names: string[]): string[] {
    const out: string[] = [];
    for (let i = 0; i < args.length; i++) {
      const a = args[i];
      if (a === undefined || !names.includes(a)) continue;
      for (let j = i + 1; j < args.length; j++) {
        const v = args[j];
        if (v === undefined || isOptionToken(v)) break;
        out.push(...v.split(",").map((s) => s.trim()).filter((s) => s.length > 0));
        i = j;
      }
    }
    return out;
  }

  function assertNoUnknownOptions(allowed: Set<string>): void {
    for (const a of args) {
      if (isOptionToken(a) && !allowed.has(a)) {
        throw new CliUsageError(`Unknown option: ${a}\n\n${helpText}`);
      }
    }
  }

  function assertHasValue(...names: string[]): void {
    for (const name of names) {
      const idx = args.indexOf(name);
      if (idx === -1) continue;
      const next = args[idx + 1];
      if (next === undefined || isOptionToken(next)) {
        throw new CliUsageError(`Missing value for ${name}\n\n${helpText}`);
      }
    }
  }

  function parseIntValue(name: string, raw: string): number {
    if (!/^[-+]?\d+$/.test(raw.trim())) {
      throw new CliUsageError(`Invalid integer for ${name}: ${raw}\n\n${helpText}`);
    }
    return Number.parseInt(raw, 10);
  }

  function parseIntFlag(
    names: string | string[],
    fallback: number,
    min = Number.MIN_SAFE_INTEGER,
    max = Number.MAX_SAFE_INTEGER
  ): number {
    const list = Array.isArray(names) ? names : [names];
    const raw = getArg(...list);
    if (raw === null) return fallback;
    const n = parseIntValue(list[0] ?? "", raw);
    if (n < min) {
      throw new CliUsageError(`${list[0] ?? "value"} must be >= ${min}, got ${n}\n\n${helpText}`);
    }
    if (n > max) {
      throw new CliUsageError(`${list[0] ?? "value"} must be <= ${max}, got ${n}\n\n${helpText}`);
    }
    return n;
  }

  function parseIntList(...names: string[]): number[] {
    return getArgs(...names).map((raw) => parseIntValue(names[0] ?? "", raw));
  }

  return { hasFlag, getArg, getArgs, assertNoUnknownOptions, assertHasValue, parseIntFlag, parseIntList };
}
