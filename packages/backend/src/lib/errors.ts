import type { ZodError } from 'zod';
import type { EntityKind, FieldError } from '../types/index.js';

export class NotFoundError extends Error {
  public statusCode = 404;
  public code = 'not_found';

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public code = 'validation_error';
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class WorkflowError extends Error {
  public statusCode = 422;
  public code = 'workflow_error';
  public currentStatus?: string;
  public attemptedStatus?: string;

  constructor(message: string, currentStatus?: string, attemptedStatus?: string) {
    super(message);
    this.name = 'WorkflowError';
    this.currentStatus = currentStatus;
    this.attemptedStatus = attemptedStatus;
  }
}

export class ConflictError extends Error {
  public statusCode = 409;
  public code = 'conflict';
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConflictError';
    this.details = details;
  }
}

export class UnauthorizedError extends Error {
  public statusCode = 401;
  public code = 'unauthorized';

  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

// ============================================================================
// Lifecycle errors
// ============================================================================

/** Attempted state change is not an edge of the configured transition graph. */
export class IllegalTransitionError extends WorkflowError {
  public code = 'illegal_transition';
  public entityKind: EntityKind;

  constructor(entityKind: EntityKind, currentStatus: string, attemptedStatus: string) {
    super(
      `Illegal ${entityKind} transition from '${currentStatus}' to '${attemptedStatus}'`,
      currentStatus,
      attemptedStatus,
    );
    this.name = 'IllegalTransitionError';
    this.entityKind = entityKind;
  }
}

/** Tactical or strategic validation failed; carries field-level detail. */
export class ValidationFailedError extends ValidationError {
  public code = 'validation_failed';
  public errors: FieldError[];

  constructor(message: string, errors: FieldError[] = []) {
    super(message, { errors });
    this.name = 'ValidationFailedError';
    this.errors = errors;
  }
}

export class OrderTypeNotFoundError extends NotFoundError {
  public code = 'order_type_not_found';

  constructor(type: string) {
    super('Order type', type);
    this.name = 'OrderTypeNotFoundError';
  }
}

// ============================================================================
// Lease errors
// ============================================================================

export class LeaseNotHeldError extends ConflictError {
  public code = 'lease_not_held';

  constructor(itemId: string, holderId: string) {
    super(`Item '${itemId}' is not leased by '${holderId}'`, { itemId, holderId });
    this.name = 'LeaseNotHeldError';
  }
}

export class LeaseExpiredError extends ConflictError {
  public code = 'lease_expired';

  constructor(itemId: string) {
    super(`Lease on item '${itemId}' has expired`, { itemId });
    this.name = 'LeaseExpiredError';
  }
}

export class ConcurrencyLimitExceededError extends ConflictError {
  public code = 'concurrency_limit_exceeded';

  constructor(scope: 'holder' | 'type', subject: string, limit: number) {
    super(`Concurrent lease limit of ${limit} reached for ${scope} '${subject}'`, {
      scope,
      subject,
      limit,
    });
    this.name = 'ConcurrencyLimitExceededError';
  }
}

export class NoItemsAvailableError extends ConflictError {
  public code = 'no_items_available';

  constructor(orderId?: string) {
    super(orderId ? `No items available for order '${orderId}'` : 'No items available', {
      orderId: orderId ?? null,
    });
    this.name = 'NoItemsAvailableError';
  }
}

// ============================================================================
// Idempotency errors
// ============================================================================

export class IdempotencyMismatchError extends ConflictError {
  public code = 'idempotency_mismatch';

  constructor(scope: string) {
    super(`Idempotency key was already used for a different request in scope '${scope}'`, {
      scope,
    });
    this.name = 'IdempotencyMismatchError';
  }
}

export class IdempotencyInFlightError extends ConflictError {
  public code = 'idempotency_in_flight';

  constructor(scope: string) {
    super(`A request with this idempotency key is still being processed in scope '${scope}'`, {
      scope,
    });
    this.name = 'IdempotencyInFlightError';
  }
}

export class IdempotencyKeyRequiredError extends Error {
  public statusCode = 428;
  public code = 'idempotency_key_required';
  public header: string;

  constructor(header: string) {
    super(`Header '${header}' is required for this operation`);
    this.name = 'IdempotencyKeyRequiredError';
    this.header = header;
  }
}

// ============================================================================
// Partial submission errors
// ============================================================================

export class PartRejectedError extends ValidationError {
  public statusCode = 422;
  public code = 'part_rejected';
  public reason: string;
  public errors: FieldError[];

  constructor(reason: string, message: string, errors: FieldError[] = []) {
    super(message, { reason, errors });
    this.name = 'PartRejectedError';
    this.reason = reason;
    this.errors = errors;
  }
}

export class AssemblyIncompleteError extends ValidationError {
  public statusCode = 422;
  public code = 'assembly_incomplete';
  public missing: string[];

  constructor(missing: string[]) {
    super(`Missing validated parts: ${missing.join(', ')}`, { missing });
    this.name = 'AssemblyIncompleteError';
    this.missing = missing;
  }
}

// ============================================================================
// Apply errors
// ============================================================================

/** The order type's apply step raised; the order has been moved to failed. */
export class ApplyFailureError extends Error {
  public statusCode = 502;
  public code = 'apply_failed';
  public orderId: string;

  constructor(orderId: string, message: string, options?: { cause?: unknown }) {
    super(`Apply failed for order '${orderId}': ${message}`, options);
    this.name = 'ApplyFailureError';
    this.orderId = orderId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function fieldErrorsFromZod(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
