import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { componentLogger } from "../logger.js";
import type { RepositoryBackend } from "../vcs/backend.js";
import { BRANCH_PREFIX, PATCH_EXTENSION, PATCH_SECTION_MARKERS, UNCHECKED_ITEM } from "./artifact.js";

const UUID_SHAPE = "[0-9a-fA-F-]{36}";
const BRANCH_PATTERN = new RegExp(`^${escapeRegExp(BRANCH_PREFIX)}${UUID_SHAPE}$`);

export type ProposalValidationResult =
  | { status: "skipped"; branch: string }
  | { status: "passed"; branch: string; patchFiles: string[] }
  | { status: "failed"; branch: string; violations: string[] };

export interface PatchFile {
  path: string;
  caseId: string;
}

export interface ValidateProposalInput {
  branch: string;
  changedFiles: string[];
  patchesDir: string;
  /** Returns the file content, or an empty string when it is missing or unreadable. */
  readFile: (path: string) => Promise<string>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isGuardianBranch(branch: string): boolean {
  return branch.startsWith(BRANCH_PREFIX);
}

export function hasValidBranchFormat(branch: string): boolean {
  return BRANCH_PATTERN.test(branch);
}

export function findPatchFiles(files: string[], patchesDir: string): PatchFile[] {
  const pattern = new RegExp(`^${escapeRegExp(patchesDir)}/(${UUID_SHAPE})\\.${PATCH_EXTENSION}$`);
  const patchFiles: PatchFile[] = [];
  for (const path of files) {
    const match = pattern.exec(path);
    if (match) {
      patchFiles.push({ path, caseId: match[1] });
    }
  }
  return patchFiles;
}

export function validatePatchContent(path: string, caseId: string, content: string): string[] {
  if (!content) {
    return [`${path}: file missing or unreadable`];
  }

  const violations: string[] = [];
  for (const marker of Object.values(PATCH_SECTION_MARKERS)) {
    if (!content.includes(marker)) {
      violations.push(`${path}: missing section marker: ${marker}`);
    }
  }
  if (!content.toLowerCase().includes(caseId.toLowerCase())) {
    violations.push(`${path}: does not mention case id ${caseId}`);
  }
  if (!content.includes(UNCHECKED_ITEM)) {
    violations.push(`${path}: verification checklist has no checkboxes ('${UNCHECKED_ITEM} ...')`);
  }
  return violations;
}

/**
 * Receiving-side gate for guardian-authored change requests. Every problem is
 * collected before deciding, so one run reports the complete list.
 */
export async function validateProposal(input: ValidateProposalInput): Promise<ProposalValidationResult> {
  const { branch, changedFiles, patchesDir } = input;

  if (!isGuardianBranch(branch)) {
    return { status: "skipped", branch };
  }

  if (!hasValidBranchFormat(branch)) {
    return {
      status: "failed",
      branch,
      violations: [`Guardian PR branch must match '${BRANCH_PREFIX}<case_uuid>'. Got: ${branch}`],
    };
  }

  const violations: string[] = [];

  const offenders = changedFiles.filter((path) => !path.startsWith(`${patchesDir}/`));
  if (offenders.length > 0) {
    violations.push(`Guardian PR must only modify files under ${patchesDir}/. Offenders: ${offenders.join(", ")}`);
  }

  const patchFiles = findPatchFiles(changedFiles, patchesDir);
  if (patchFiles.length === 0) {
    violations.push(
      `Guardian PR must include at least one patch file under ${patchesDir}/<case_id>.${PATCH_EXTENSION}`,
    );
  }

  for (const patchFile of patchFiles) {
    const content = await input.readFile(patchFile.path);
    violations.push(...validatePatchContent(patchFile.path, patchFile.caseId, content));
  }

  if (violations.length > 0) {
    return { status: "failed", branch, violations };
  }
  return { status: "passed", branch, patchFiles: patchFiles.map((patchFile) => patchFile.path) };
}

export interface ProposalRunParameters {
  base: string;
  head: string;
  branch: string;
}

export interface ProposalValidationDeps {
  backend: RepositoryBackend;
  /** Checked-out head of the change request. */
  root: string;
  patchesDir: string;
}

export function workspaceReader(root: string): (path: string) => Promise<string> {
  return async (path) => {
    try {
      return await readFile(join(root, ...path.split("/")), "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ENOENT" || code === "EISDIR") {
        return "";
      }
      throw error;
    }
  };
}

export async function runProposalValidation(
  params: ProposalRunParameters,
  deps: ProposalValidationDeps,
): Promise<ProposalValidationResult> {
  const log = componentLogger("validator");

  if (!isGuardianBranch(params.branch)) {
    log.info("Not a guardian PR branch; skipping guardian validation", { branch: params.branch });
    return { status: "skipped", branch: params.branch };
  }

  const changedFiles = hasValidBranchFormat(params.branch)
    ? await deps.backend.changedFiles(params.base, params.head)
    : [];

  const result = await validateProposal({
    branch: params.branch,
    changedFiles,
    patchesDir: deps.patchesDir,
    readFile: workspaceReader(deps.root),
  });

  if (result.status === "failed") {
    log.error("Guardian validation failed", { branch: params.branch, violations: result.violations });
  } else if (result.status === "passed") {
    log.info("Guardian validation OK", { branch: params.branch, patchFiles: result.patchFiles });
  }
  return result;
}
