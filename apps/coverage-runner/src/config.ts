import { readFile } from "node:fs/promises";
import path from "node:path";
import Ajv from "ajv";
import type { CodecProfile, ExemptionRule } from "shared-types";
import { ConfigError } from "./errors";
import { MAX_TIMEOUT_SEC } from "./executor";
import { DEFAULT_FAILURE_KEYWORDS } from "./metrics";

export const DEFAULT_CONFIG_PATH = "coverage.config.json";
export const DEFAULT_COMMAND = "cargo";
export const DEFAULT_TIMEOUT_SEC = 60;

type ProfileEntry = {
  report: string;
  envVar: string;
  command?: string;
  args: string[];
  cwd?: string;
  timeoutSec?: number;
  failureKeywords?: string[];
  exemptions?: ExemptionRule[];
};

export type CoverageConfig = {
  profiles: Record<string, ProfileEntry>;
};

const exemptionSchema = {
  type: "object",
  additionalProperties: false,
  required: ["kind", "reason"],
  properties: {
    kind: { enum: ["hard_skip", "tolerance"] },
    index: { type: "integer", minimum: 1 },
    basename: { type: "string", minLength: 1 },
    reason: { type: "string" },
  },
  anyOf: [{ required: ["index"] }, { required: ["basename"] }],
  if: { properties: { kind: { const: "tolerance" } } },
  then: { required: ["basename"] },
};

const configSchema = {
  type: "object",
  required: ["profiles"],
  properties: {
    profiles: {
      type: "object",
      minProperties: 1,
      additionalProperties: {
        type: "object",
        additionalProperties: false,
        required: ["report", "envVar", "args"],
        properties: {
          report: { type: "string", minLength: 1 },
          envVar: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
          command: { type: "string", minLength: 1 },
          args: { type: "array", items: { type: "string" } },
          cwd: { type: "string" },
          timeoutSec: { type: "integer", minimum: 1, maximum: MAX_TIMEOUT_SEC },
          failureKeywords: { type: "array", items: { type: "string", minLength: 1 } },
          exemptions: { type: "array", items: exemptionSchema },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile<CoverageConfig>(configSchema);

export function parseConfig(raw: unknown, source: string): CoverageConfig {
  if (!validateConfig(raw)) {
    throw new ConfigError(`Invalid coverage config ${source}: ${ajv.errorsText(validateConfig.errors)}`);
  }
  return raw;
}

export async function loadConfig(configPath: string): Promise<CoverageConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read coverage config ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Coverage config ${configPath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfig(raw, configPath);
}

/** Profile with defaults applied and paths resolved against the repo root. */
export function resolveProfile(config: CoverageConfig, name: string, repoRoot: string): CodecProfile {
  const entry = config.profiles[name];
  if (!entry) {
    const known = Object.keys(config.profiles).sort().join(", ");
    throw new ConfigError(`Unknown profile: ${name} (known: ${known})`);
  }
  return {
    name,
    report: path.resolve(repoRoot, entry.report),
    envVar: entry.envVar,
    command: entry.command ?? DEFAULT_COMMAND,
    args: [...entry.args],
    cwd: path.resolve(repoRoot, entry.cwd ?? "."),
    timeoutSec: entry.timeoutSec ?? DEFAULT_TIMEOUT_SEC,
    failureKeywords: [...DEFAULT_FAILURE_KEYWORDS, ...(entry.failureKeywords ?? [])],
    exemptions: entry.exemptions ?? [],
  };
}
