import type { ZodError } from "zod";

// ---------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------

export type SchedulingErrorCode =
  | "NOT_FOUND"
  | "SLOT_UNAVAILABLE"
  | "VALIDATION_ERROR"
  | "COLLABORATOR_FAILURE";

export type Collaborator = "text-generation" | "email" | "pdf" | "admin" | "insurance";

export class SchedulingError extends Error {
  readonly code: SchedulingErrorCode;

  constructor(code: SchedulingErrorCode, message: string) {
    super(message);
    this.name = "SchedulingError";
    this.code = code;
    Object.setPrototypeOf(this, SchedulingError.prototype);
  }
}

export class NotFoundError extends SchedulingError {
  readonly entity: string;
  readonly entityId: string;

  constructor(entity: string, entityId: string) {
    super("NOT_FOUND", `${entity} ${entityId} not found`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.entityId = entityId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class SlotUnavailableError extends SchedulingError {
  readonly doctorId: string;
  readonly slotId: string;

  constructor(doctorId: string, slotId: string) {
    super("SLOT_UNAVAILABLE", `Slot ${slotId} for ${doctorId} is already taken`);
    this.name = "SlotUnavailableError";
    this.doctorId = doctorId;
    this.slotId = slotId;
    Object.setPrototypeOf(this, SlotUnavailableError.prototype);
  }
}

export class ValidationError extends SchedulingError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZod(label: string, error: ZodError): ValidationError {
    const issues = error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return new ValidationError(`Invalid ${label}: ${issues}`);
  }
}

export class CollaboratorFailureError extends SchedulingError {
  readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, message: string) {
    super("COLLABORATOR_FAILURE", `${collaborator}: ${message}`);
    this.name = "CollaboratorFailureError";
    this.collaborator = collaborator;
    Object.setPrototypeOf(this, CollaboratorFailureError.prototype);
  }
}

export function isSchedulingError(error: unknown): error is SchedulingError {
  return error instanceof SchedulingError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error occurred";
}
