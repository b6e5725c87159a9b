export interface Violation {
  path: string;
  message: string;
}

export type GuardianErrorCode =
  | "INPUT_VALIDATION"
  | "IDENTITY"
  | "EXTERNAL_CALL"
  | "STRUCTURAL_VALIDATION";

export class GuardianError extends Error {
  readonly code: GuardianErrorCode;

  constructor(message: string, code: GuardianErrorCode) {
    super(message);
    this.name = "GuardianError";
    this.code = code;
  }
}

/** A signal, care-case record or configuration value failed its schema. */
export class InputValidationError extends GuardianError {
  readonly violations: Violation[];

  constructor(label: string, violations: Violation[]) {
    super(`${label} validation failed`, "INPUT_VALIDATION");
    this.name = "InputValidationError";
    this.violations = violations;
  }
}

/**
 * A freshly synthesized care-case does not satisfy its own schema.
 * Only a defect in the synthesizer can produce this.
 */
export class IdentityError extends GuardianError {
  readonly violations: Violation[];

  constructor(caseId: string, violations: Violation[]) {
    super(`Synthesized care-case ${caseId} failed validation`, "IDENTITY");
    this.name = "IdentityError";
    this.violations = violations;
  }
}

export interface ExternalCallDetails {
  command: string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export class ExternalCallFailure extends GuardianError {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(details: ExternalCallDetails) {
    super(
      `Command failed (${details.command.join(" ")}):\n${details.stdout}\n${details.stderr}`.trimEnd(),
      "EXTERNAL_CALL",
    );
    this.name = "ExternalCallFailure";
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

/** An incoming guardian change request breaks its naming, scope or content contract. */
export class StructuralValidationError extends GuardianError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super("Guardian validation failed", "STRUCTURAL_VALIDATION");
    this.name = "StructuralValidationError";
    this.violations = violations;
  }
}

export function formatViolation(violation: Violation): string {
  return `${violation.path}: ${violation.message}`;
}

/** Renders the itemized report printed on every hard failure path. */
export function formatErrorReport(error: unknown): string {
  if (error instanceof InputValidationError || error instanceof IdentityError) {
    return [`${error.message}:`, ...error.violations.map((v) => `- ${formatViolation(v)}`)].join("\n");
  }
  if (error instanceof StructuralValidationError) {
    return [`${error.message}:`, ...error.violations.map((v) => `- ${v}`)].join("\n");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
