import { appendFile, readFile } from "node:fs/promises";
import { isAbsolute, join, relative, sep } from "node:path";
import { randomUUID } from "node:crypto";
import type { CaseStore } from "../data/caseStore.js";
import { InputValidationError } from "../errors.js";
import { componentLogger, type ComponentLogger } from "../logger.js";
import type { PolicyGate, RecommendedAction } from "../schema/careCase.js";
import { signalSchema } from "../schema/signal.js";
import { synthesizeCareCase } from "../triage/synthesizer.js";
import type { RepositoryBackend } from "../vcs/backend.js";
import { assertValid, ROOT_PATH } from "../validation/validate.js";

const ZERO_SHA = /^0+$/;
const EXAMPLE_SIGNAL = /^examples\/signal\.[^/]+\.json$/;

export interface GeneratedCase {
  signalId: string;
  caseId: string;
  location: string;
  policyGate: PolicyGate;
  recommendedAction: RecommendedAction;
}

export interface IntakeResult {
  cases: GeneratedCase[];
}

export interface IntakeDeps {
  store: CaseStore;
  now?: () => Date;
  logger?: ComponentLogger;
}

/** Keeps the changed paths that carry signal documents. */
export function discoverSignalFiles(changedFiles: string[]): string[] {
  return changedFiles.filter(
    (path) => EXAMPLE_SIGNAL.test(path) || (path.startsWith("signals/") && path.endsWith(".json")),
  );
}

export interface CommitRange {
  before?: string;
  after?: string;
}

/** The pushed range, or the last commit when the push has no usable "before". */
export function resolveCommitRange(range: CommitRange): { base: string; head: string } {
  if (range.before && range.after && !ZERO_SHA.test(range.before)) {
    return { base: range.before, head: range.after };
  }
  return { base: "HEAD~1", head: "HEAD" };
}

export async function changedSignalFiles(backend: RepositoryBackend, range: CommitRange): Promise<string[]> {
  const { base, head } = resolveCommitRange(range);
  return discoverSignalFiles(await backend.changedFiles(base, head));
}

/**
 * Validates and synthesizes every document before anything is written, so a
 * single malformed signal leaves the store untouched.
 */
export async function intakeSignals(
  documents: Array<{ label: string; document: unknown }>,
  deps: IntakeDeps,
): Promise<IntakeResult> {
  const log = deps.logger ?? componentLogger("intake");

  const careCases = documents.map(({ label, document }) => {
    const signal = assertValid(document, signalSchema, `Signal (${label})`);
    return { signal, careCase: synthesizeCareCase(signal, { now: deps.now }) };
  });

  const cases: GeneratedCase[] = [];
  for (const { signal, careCase } of careCases) {
    const location = await deps.store.persist(careCase);
    log.info("Generated care-case", { location, caseId: careCase.id, gate: careCase.policy_gate });
    cases.push({
      signalId: signal.id,
      caseId: careCase.id,
      location,
      policyGate: careCase.policy_gate,
      recommendedAction: careCase.recommended_action,
    });
  }
  return { cases };
}

export function toRepositoryPath(root: string, path: string): string {
  const absolute = isAbsolute(path) ? path : join(root, path);
  return relative(root, absolute).split(sep).join("/");
}

async function loadSignalDocument(root: string, path: string): Promise<unknown> {
  const label = `Signal (${toRepositoryPath(root, path)})`;
  const text = await readFile(isAbsolute(path) ? path : join(root, path), "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputValidationError(label, [{ path: ROOT_PATH, message: `Invalid JSON: ${message}` }]);
  }
}

export async function intakeSignalFiles(root: string, paths: string[], deps: IntakeDeps): Promise<IntakeResult> {
  const documents: Array<{ label: string; document: unknown }> = [];
  for (const path of paths) {
    documents.push({ label: toRepositoryPath(root, path), document: await loadSignalDocument(root, path) });
  }
  return intakeSignals(documents, deps);
}

export type RunOutputs = {
  has_cases: string;
  case_files: string;
};

export function runOutputs(result: IntakeResult): RunOutputs {
  return {
    has_cases: result.cases.length > 0 ? "true" : "false",
    case_files: result.cases.map((entry) => entry.location).join("\n"),
  };
}

export function formatRunOutputs(outputs: RunOutputs, delimiter: string = `guardian_${randomUUID()}`): string {
  return Object.entries(outputs)
    .map(([name, value]) => (value.includes("\n") ? `${name}<<${delimiter}\n${value}\n${delimiter}\n` : `${name}=${value}\n`))
    .join("");
}

/** Appends outputs for the invoking workflow; a no-op when no outputs file is configured. */
export async function writeRunOutputs(outputsFile: string | undefined, outputs: RunOutputs): Promise<void> {
  if (!outputsFile) {
    return;
  }
  await appendFile(outputsFile, formatRunOutputs(outputs), "utf8");
}
