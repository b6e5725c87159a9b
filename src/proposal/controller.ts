import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { GitIdentity } from "../config.js";
import type { CaseStore, StoredCareCase } from "../data/caseStore.js";
import { componentLogger, type ComponentLogger } from "../logger.js";
import type { CareCase } from "../schema/careCase.js";
import type { RepositoryBackend } from "../vcs/backend.js";
import {
  branchForCase,
  changeRequestTitle,
  commitMessage,
  patchPathForCase,
  renderChangeRequestBody,
  renderPatchProposal,
  renderReviewerChecklist,
} from "./artifact.js";

export type AnnotationResult =
  | { status: "applied" }
  | { status: "failed"; errors: string[] }
  | { status: "skipped"; reason: string };

interface OutcomeBase {
  caseId: string;
  location: string;
}

export type ProposalOutcome =
  | (OutcomeBase & { status: "ineligible"; reason: string })
  | (OutcomeBase & { status: "existing_change_request"; branch: string })
  | (OutcomeBase & { status: "existing_branch"; branch: string })
  | (OutcomeBase & { status: "no_changes"; branch: string; patchPath: string })
  | (OutcomeBase & {
      status: "created";
      branch: string;
      patchPath: string;
      url?: string;
      annotation: AnnotationResult;
    })
  | (OutcomeBase & { status: "failed"; branch: string; error: string });

export type ProposalStatus = ProposalOutcome["status"];

export interface ProposalRunReport {
  baseBranch?: string;
  outcomes: ProposalOutcome[];
  createdAny: boolean;
  failures: number;
  /** Set when the default branch could not be restored; later cases were not attempted. */
  aborted?: string;
}

interface CaseResult {
  outcome: ProposalOutcome;
  abortReason?: string;
}

/** Returns why a case may not be proposed automatically, or undefined when it may. */
export function ineligibilityReason(careCase: CareCase): string | undefined {
  if (careCase.policy_gate !== "green") {
    return `policy gate is ${careCase.policy_gate}`;
  }
  if (careCase.recommended_action !== "propose_patch") {
    return `recommended action is ${careCase.recommended_action}`;
  }
  if (careCase.proposed_transition?.reversibility !== "reversible") {
    return "no reversible proposed transition";
  }
  return undefined;
}

export function isEligibleForProposal(careCase: CareCase): boolean {
  return ineligibilityReason(careCase) === undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ProposalControllerOptions {
  backend: RepositoryBackend;
  store: CaseStore;
  /** Working tree the artifact is written into. */
  root: string;
  patchesDir: string;
  identity: GitIdentity;
  labels: string[];
  logger?: ComponentLogger;
}

/**
 * Turns every eligible care-case into at most one branch and change request.
 * Existence of either is checked first, and anything already present is left
 * untouched, so re-running over the same cases changes nothing.
 */
export class ProposalController {
  private readonly backend: RepositoryBackend;
  private readonly store: CaseStore;
  private readonly root: string;
  private readonly patchesDir: string;
  private readonly identity: GitIdentity;
  private readonly labels: string[];
  private readonly logger: ComponentLogger;

  constructor(options: ProposalControllerOptions) {
    this.backend = options.backend;
    this.store = options.store;
    this.root = options.root;
    this.patchesDir = options.patchesDir;
    this.identity = options.identity;
    this.labels = options.labels;
    this.logger = options.logger ?? componentLogger("proposal");
  }

  async run(): Promise<ProposalRunReport> {
    const records = await this.store.list();
    if (records.length === 0) {
      this.logger.info("No generated care-cases found.");
      return { outcomes: [], createdAny: false, failures: 0 };
    }

    const context = await this.backend.repositoryContext();
    this.logger.info("Repository context", {
      repository: context.repository ?? "unavailable",
      actor: context.actor ?? "unknown",
    });
    const baseBranch = await this.backend.defaultBranch();

    const outcomes: ProposalOutcome[] = [];
    let aborted: string | undefined;
    for (const record of records) {
      const { outcome, abortReason } = await this.processCase(record, baseBranch);
      outcomes.push(outcome);
      if (abortReason) {
        aborted = abortReason;
        break;
      }
    }

    const createdAny = outcomes.some((outcome) => outcome.status === "created");
    const failures = outcomes.filter((outcome) => outcome.status === "failed").length;
    if (!createdAny) {
      this.logger.info("No eligible care-cases for patch proposals.");
    }

    const report: ProposalRunReport = { baseBranch, outcomes, createdAny, failures };
    if (aborted) {
      report.aborted = aborted;
    }
    return report;
  }

  private async processCase(record: StoredCareCase, baseBranch: string): Promise<CaseResult> {
    const { careCase, location } = record;
    const caseId = careCase.id;

    const reason = ineligibilityReason(careCase);
    if (reason) {
      this.logger.debug("Skipping ineligible care-case", { caseId, reason });
      return { outcome: { caseId, location, status: "ineligible", reason } };
    }

    const branch = branchForCase(caseId);

    try {
      if (await this.backend.changeRequestExists(branch)) {
        this.logger.info("Change request already exists, skipping", { caseId, branch });
        return { outcome: { caseId, location, status: "existing_change_request", branch } };
      }
      if (await this.backend.remoteBranchExists(branch)) {
        this.logger.info("Remote branch exists, skipping", { caseId, branch });
        return { outcome: { caseId, location, status: "existing_branch", branch } };
      }
    } catch (error) {
      return { outcome: this.failed(record, branch, error) };
    }

    let outcome: ProposalOutcome;
    try {
      await this.backend.createBranch(branch, baseBranch);
      outcome = await this.propose(record, branch, baseBranch);
    } catch (error) {
      outcome = this.failed(record, branch, error);
    }

    // Every case starts from a clean default branch; without one the run stops after this case.
    try {
      await this.backend.resetTo(baseBranch);
    } catch (error) {
      const abortReason = `could not restore ${baseBranch}: ${errorMessage(error)}`;
      this.logger.error("Aborting proposal run", { caseId, branch, error: abortReason });
      return { outcome, abortReason };
    }
    return { outcome };
  }

  private async propose(record: StoredCareCase, branch: string, baseBranch: string): Promise<ProposalOutcome> {
    const { careCase, location } = record;
    const caseId = careCase.id;
    const patchPath = patchPathForCase(this.patchesDir, caseId);

    await this.writeArtifact(patchPath, renderPatchProposal(careCase));

    if (!(await this.backend.stageFile(patchPath))) {
      this.logger.info("No changes for care-case, skipping commit and change request", { caseId, patchPath });
      return { caseId, location, status: "no_changes", branch, patchPath };
    }

    await this.backend.commit(commitMessage(caseId), this.identity, [patchPath]);
    await this.backend.push(branch);
    const openedUrl = await this.backend.openChangeRequest({
      title: changeRequestTitle(careCase),
      body: renderChangeRequestBody(careCase),
      base: baseBranch,
      head: branch,
    });

    const { url, annotation } = await this.annotate(caseId, branch, openedUrl);
    this.logger.info("Opened change request", { caseId, branch, url, annotation: annotation.status });

    return { caseId, location, status: "created", branch, patchPath, url, annotation };
  }

  /** Labels and the reviewer checklist. Failures are reported, never rethrown. */
  private async annotate(
    caseId: string,
    branch: string,
    openedUrl: string | undefined,
  ): Promise<{ url?: string; annotation: AnnotationResult }> {
    let url = openedUrl;
    if (!url) {
      try {
        url = await this.backend.findChangeRequestUrl(branch);
      } catch (error) {
        this.logger.warn("Could not look up change request URL", { caseId, branch, error: errorMessage(error) });
        return { annotation: { status: "failed", errors: [`lookup: ${errorMessage(error)}`] } };
      }
    }

    if (!url) {
      this.logger.warn("Could not resolve change request URL; skipping labels and comment", { caseId, branch });
      return { annotation: { status: "skipped", reason: `no change request URL for ${branch}` } };
    }

    const errors: string[] = [];
    try {
      await this.backend.addLabels(url, this.labels);
    } catch (error) {
      errors.push(`labels: ${errorMessage(error)}`);
    }
    try {
      await this.backend.comment(url, renderReviewerChecklist(this.patchesDir));
    } catch (error) {
      errors.push(`comment: ${errorMessage(error)}`);
    }

    if (errors.length > 0) {
      this.logger.warn("Change request annotation failed", { caseId, url, errors });
      return { url, annotation: { status: "failed", errors } };
    }
    return { url, annotation: { status: "applied" } };
  }

  private async writeArtifact(patchPath: string, content: string): Promise<void> {
    const filePath = join(this.root, ...patchPath.split("/"));
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf8");
  }

  private failed(record: StoredCareCase, branch: string, error: unknown): ProposalOutcome {
    const message = errorMessage(error);
    this.logger.error("Failed to propose patch", { caseId: record.careCase.id, branch, error: message });
    return { caseId: record.careCase.id, location: record.location, status: "failed", branch, error: message };
  }
}
