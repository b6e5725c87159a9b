export { loadConfig, type GitIdentity, type GuardianConfig } from "./config.js";
export { CaseStore, type StoredCareCase } from "./data/caseStore.js";
export {
  ExternalCallFailure,
  formatErrorReport,
  GuardianError,
  IdentityError,
  InputValidationError,
  StructuralValidationError,
  type Violation,
} from "./errors.js";
export {
  changedSignalFiles,
  discoverSignalFiles,
  intakeSignalFiles,
  intakeSignals,
  type IntakeResult,
} from "./intake/intake.js";
export { careCaseIssueBody, careCaseIssueTitle } from "./issue/render.js";
export {
  branchForCase,
  patchPathForCase,
  PATCH_SECTION_MARKERS,
  renderChangeRequestBody,
  renderPatchProposal,
} from "./proposal/artifact.js";
export {
  isEligibleForProposal,
  ProposalController,
  type ProposalOutcome,
  type ProposalRunReport,
} from "./proposal/controller.js";
export {
  runProposalValidation,
  validateProposal,
  type ProposalValidationResult,
} from "./proposal/validator.js";
export { careCaseSchema, type CareCase, type PolicyGate, type RecommendedAction } from "./schema/careCase.js";
export { signalSchema, type Signal } from "./schema/signal.js";
export { buildServer, start } from "./server.js";
export { createServices, type GuardianServices } from "./services.js";
export {
  deriveCaseId,
  deriveConstraints,
  gateFromTension,
  recommendAction,
  synthesizeCareCase,
} from "./triage/synthesizer.js";
export type { RepositoryBackend } from "./vcs/backend.js";
export { GitCliBackend } from "./vcs/gitCliBackend.js";
export { assertValid, validateDocument } from "./validation/validate.js";
