import { isAbsolute, resolve } from "node:path";
import { z } from "zod";
import type { LogLevel } from "./logger.js";
import { assertValid } from "./validation/validate.js";

export interface GitIdentity {
  name: string;
  email: string;
}

export interface GuardianConfig {
  /** Working tree of the repository the pipeline operates on. */
  root: string;
  /** Where care-case records are written, relative to `root`. */
  generatedDir: string;
  /** Where proposal artifacts live, relative to `root`; also the scope enforced on incoming requests. */
  patchesDir: string;
  identity: GitIdentity;
  remote: string;
  labels: string[];
  logLevel: LogLevel;
  outputsFile?: string;
}

function relativeDir(fallback: string) {
  return z
    .string()
    .trim()
    .min(1)
    .default(fallback)
    .transform((value) => value.replace(/\\/g, "/").replace(/^\.\//, "").replace(/\/+$/, ""))
    .refine((value) => !isAbsolute(value) && !value.split("/").includes(".."), {
      message: "Must be a path inside the repository",
    });
}

const envSchema = z.object({
  GUARDIAN_ROOT: z.string().trim().optional(),
  GUARDIAN_GENERATED_DIR: relativeDir("generated"),
  GUARDIAN_PATCHES_DIR: relativeDir("guardian/patches"),
  GUARDIAN_BOT_NAME: z.string().trim().min(1).default("guardian-bot"),
  GUARDIAN_BOT_EMAIL: z.string().trim().email().default("guardian-bot@users.noreply.github.com"),
  GUARDIAN_REMOTE: z.string().trim().min(1).default("origin"),
  GUARDIAN_LABELS: z
    .string()
    .default("guardian,bot")
    .transform((value) =>
      Array.from(new Set(value.split(",").map((label) => label.trim()).filter((label) => label.length > 0))),
    ),
  GUARDIAN_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .default("info")
    .pipe(z.enum(["debug", "info", "warn", "error"])),
  GUARDIAN_OUTPUTS_FILE: z.string().trim().optional(),
  GITHUB_OUTPUT: z.string().trim().optional(),
});

/**
 * Reads the run configuration from environment variables. Components receive
 * the resulting value at construction instead of consulting the environment.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): GuardianConfig {
  const parsed = assertValid(env, envSchema, "Configuration");

  return {
    root: parsed.GUARDIAN_ROOT ? resolve(cwd, parsed.GUARDIAN_ROOT) : cwd,
    generatedDir: parsed.GUARDIAN_GENERATED_DIR,
    patchesDir: parsed.GUARDIAN_PATCHES_DIR,
    identity: { name: parsed.GUARDIAN_BOT_NAME, email: parsed.GUARDIAN_BOT_EMAIL },
    remote: parsed.GUARDIAN_REMOTE,
    labels: parsed.GUARDIAN_LABELS,
    logLevel: parsed.GUARDIAN_LOG_LEVEL,
    outputsFile: parsed.GUARDIAN_OUTPUTS_FILE || parsed.GITHUB_OUTPUT || undefined,
  };
}
