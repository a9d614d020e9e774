import { OutcomeStage } from "../types/outcomes";

export type OutcomeErrorCode =
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "STAGE_CONFLICT"
  | "CLASSIFICATION_DEGRADED";

/**
 * Base class for failures the outcome services report to their callers.
 * `code` is stable and safe to switch on; messages are for humans.
 */
export class OutcomeError extends Error {
  constructor(
    public readonly code: OutcomeErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "OutcomeError";
    Object.setPrototypeOf(this, OutcomeError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class NotFoundError extends OutcomeError {
  constructor(
    public readonly entity: string,
    public readonly entityId: string
  ) {
    super("NOT_FOUND", `${entity} ${entityId} not found`, { entity, entityId });
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InvalidTransitionError extends OutcomeError {
  constructor(
    public readonly leadId: string,
    public readonly currentStage: OutcomeStage | null,
    public readonly requestedStage: OutcomeStage,
    public readonly allowedStages: OutcomeStage[],
    /** Set when the caller only accepts the move from these stages */
    public readonly requiredFrom: readonly OutcomeStage[] | null = null
  ) {
    super(
      "INVALID_TRANSITION",
      currentStage === null
        ? `Lead ${leadId} has no outcome stage yet. Email must be sent first.`
        : requiredFrom
          ? `Lead ${leadId} is in ${currentStage}; transition to ${requestedStage} ` +
            `requires one of: ${requiredFrom.join(", ")}`
          : `Invalid transition from ${currentStage} to ${requestedStage}. ` +
            `Valid transitions: ${allowedStages.join(", ") || "none (terminal stage)"}`,
      { leadId, currentStage, requestedStage, allowedStages, requiredFrom }
    );
    this.name = "InvalidTransitionError";
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * The lead's stage changed between the read that validated a transition and
 * the write that applies it.
 */
export class StageConflictError extends OutcomeError {
  constructor(
    public readonly leadId: string,
    public readonly expectedStage: OutcomeStage | null,
    public readonly actualStage: OutcomeStage | null
  ) {
    super(
      "STAGE_CONFLICT",
      `Lead ${leadId} moved from ${expectedStage ?? "no stage"} to ${actualStage ?? "no stage"} concurrently`,
      { leadId, expectedStage, actualStage }
    );
    this.name = "StageConflictError";
    Object.setPrototypeOf(this, StageConflictError.prototype);
  }
}

/**
 * LLM classification failed and the rule engine answered instead.
 * Logged, never thrown past the classifier.
 */
export class ClassificationDegradedError extends OutcomeError {
  constructor(public readonly reason: string) {
    super("CLASSIFICATION_DEGRADED", `LLM classification failed: ${reason}`, { reason });
    this.name = "ClassificationDegradedError";
    Object.setPrototypeOf(this, ClassificationDegradedError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
