import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { loadConfig, type GuardianConfig } from "./config.js";
import { formatErrorReport, InputValidationError, StructuralValidationError } from "./errors.js";
import {
  changedSignalFiles,
  intakeSignalFiles,
  runOutputs,
  writeRunOutputs,
} from "./intake/intake.js";
import { careCaseIssueBody, careCaseIssueTitle } from "./issue/render.js";
import { setLogLevel } from "./logger.js";
import type { ProposalOutcome, ProposalRunReport } from "./proposal/controller.js";
import { runProposalValidation } from "./proposal/validator.js";
import { careCaseSchema } from "./schema/careCase.js";
import { start, SERVER_VERSION } from "./server.js";
import { createProposalController, createServices } from "./services.js";
import type { RepositoryBackend } from "./vcs/backend.js";
import { assertValid, ROOT_PATH } from "./validation/validate.js";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  cwd?: string;
  io?: CliIo;
  backend?: RepositoryBackend;
  now?: () => Date;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export const USAGE =
  `guardian-mcp v${SERVER_VERSION}\n\n` +
  `Usage: guardian-mcp <command> [options]\n\n` +
  `Commands:\n` +
  `  serve                  Run the MCP server on stdio (default)\n` +
  `  intake [files...]      Synthesize care-cases from signal files (default: changed files)\n` +
  `  propose                Open change requests for eligible care-cases\n` +
  `  validate               Validate an incoming guardian change request (BASE_SHA, HEAD_SHA, PR_HEAD_REF)\n` +
  `  issue --title <file>   Print the issue title for a care-case file\n` +
  `  issue --body <file>    Print the issue body for a care-case file\n\n` +
  `Options:\n` +
  `  --help, -h             Show this help message\n` +
  `  --version, -v          Print the current version`;

/** Extract a flag's value from args with bounds checking. */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index < 0 || index + 1 >= args.length) {
    return undefined;
  }
  return args[index + 1];
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requireEnv(env: Record<string, string | undefined>, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new UsageError(`Missing required env var: ${name}`);
  }
  return value;
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function summarizeProposalRun(report: ProposalRunReport): string {
  const count = (...statuses: ProposalOutcome["status"][]) =>
    report.outcomes.filter((outcome) => statuses.includes(outcome.status)).length;

  return (
    `Proposals: ${count("created")} created, ` +
    `${count("existing_change_request", "existing_branch", "no_changes")} already handled, ` +
    `${count("ineligible")} ineligible, ${count("failed")} failed`
  );
}

async function runIntake(args: string[], config: GuardianConfig, deps: CliDeps, io: CliIo): Promise<number> {
  const env = deps.env ?? process.env;
  const services = createServices(config, deps.backend);

  const files =
    args.length > 0
      ? args
      : await changedSignalFiles(services.backend, { before: env.GITHUB_BEFORE, after: env.GITHUB_SHA });

  if (files.length === 0) {
    await writeRunOutputs(config.outputsFile, { has_cases: "false", case_files: "" });
    io.stdout("No changed signal files detected.");
    return 0;
  }

  const result = await intakeSignalFiles(config.root, files, { store: services.store, now: deps.now });
  await writeRunOutputs(config.outputsFile, runOutputs(result));
  io.stdout(
    `Generated ${pluralize(result.cases.length, "care-case")}: ${result.cases.map((entry) => entry.location).join(", ")}`,
  );
  return 0;
}

async function runPropose(config: GuardianConfig, deps: CliDeps, io: CliIo): Promise<number> {
  const report = await createProposalController(createServices(config, deps.backend)).run();

  if (report.failures > 0 || report.aborted) {
    const failed = report.outcomes.flatMap((outcome) =>
      outcome.status === "failed" ? [`- ${outcome.caseId}: ${outcome.error}`] : [],
    );
    const aborted = report.aborted ? [`- run aborted: ${report.aborted}`] : [];
    io.stderr(["Guardian patch proposal failed:", ...failed, ...aborted].join("\n"));
    io.stderr(summarizeProposalRun(report));
    return 1;
  }

  io.stdout(summarizeProposalRun(report));
  return 0;
}

async function runValidate(config: GuardianConfig, deps: CliDeps, io: CliIo): Promise<number> {
  const env = deps.env ?? process.env;
  const base = requireEnv(env, "BASE_SHA");
  const head = requireEnv(env, "HEAD_SHA");
  const branch = requireEnv(env, "PR_HEAD_REF");

  const services = createServices(config, deps.backend);
  const result = await runProposalValidation(
    { base, head, branch },
    { backend: services.backend, root: config.root, patchesDir: config.patchesDir },
  );

  switch (result.status) {
    case "skipped":
      io.stdout(`Not a guardian PR branch (${branch}); skipping guardian validation.`);
      return 0;
    case "passed":
      io.stdout(`Guardian validation OK. Patch files: ${result.patchFiles.join(", ")}`);
      return 0;
    case "failed":
      throw new StructuralValidationError(result.violations);
  }
}

async function runIssue(args: string[], config: GuardianConfig, io: CliIo): Promise<number> {
  const titlePath = getFlagValue(args, "--title");
  const bodyPath = getFlagValue(args, "--body");
  const path = titlePath ?? bodyPath;
  if (!path || (titlePath && bodyPath)) {
    throw new UsageError("Provide exactly one of --title or --body");
  }

  const text = await readFile(isAbsolute(path) ? path : join(config.root, path), "utf8");
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputValidationError(`Care-Case (${path})`, [{ path: ROOT_PATH, message: `Invalid JSON: ${message}` }]);
  }
  const careCase = assertValid(document, careCaseSchema, `Care-Case (${path})`);

  io.stdout(titlePath ? careCaseIssueTitle(careCase) : careCaseIssueBody(careCase));
  return 0;
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;

  if (argv.includes("--version") || argv.includes("-v")) {
    io.stdout(`guardian-mcp v${SERVER_VERSION}`);
    return 0;
  }
  if (argv.includes("--help") || argv.includes("-h")) {
    io.stdout(USAGE);
    return 0;
  }

  const [command = "serve", ...args] = argv;

  try {
    const config = loadConfig(deps.env ?? process.env, deps.cwd ?? process.cwd());
    setLogLevel(config.logLevel);

    switch (command) {
      case "serve":
        await start({ services: createServices(config, deps.backend) });
        return 0;
      case "intake":
        return await runIntake(args, config, deps, io);
      case "propose":
        return await runPropose(config, deps, io);
      case "validate":
        return await runValidate(config, deps, io);
      case "issue":
        return await runIssue(args, config, io);
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    io.stderr(formatErrorReport(error));
    if (error instanceof UsageError) {
      io.stderr(`Run 'guardian-mcp --help' for usage.`);
    }
    return 1;
  }
}
