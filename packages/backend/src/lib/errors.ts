import type { ExecutionReport } from '../engine/redistribution/types.js';

export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string | number) {
    super(id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class ConflictError extends Error {
  public statusCode = 409;

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * A snapshot that breaks `0 <= bookCount <= capacity`, `capacity > 0`,
 * integrality or id uniqueness. Raised before any planning work starts.
 */
export class InvalidCapacityError extends Error {
  public statusCode = 400;
  public libraryId?: number;

  constructor(message: string, libraryId?: number) {
    super(message);
    this.name = 'InvalidCapacityError';
    this.libraryId = libraryId;
  }
}

export class CapacityExceededError extends Error {
  public statusCode = 422;
  public libraryId: number;
  public overflow: number;

  constructor(libraryId: number, overflow: number) {
    super(`Library ${libraryId} cannot take the intake: ${overflow} book(s) over capacity`);
    this.name = 'CapacityExceededError';
    this.libraryId = libraryId;
    this.overflow = overflow;
  }
}

/**
 * The store failed while a plan was being applied. `report` holds every
 * transfer that completed before the failure.
 */
export class PlanExecutionError extends Error {
  public statusCode = 500;
  public report: ExecutionReport;

  constructor(message: string, report: ExecutionReport, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanExecutionError';
    this.report = report;
  }
}
