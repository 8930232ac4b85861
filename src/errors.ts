/**
 * Error taxonomy shared by the prompt store, the dataset pipeline and the
 * HTTP layer. Single-entity operations throw these; batch operations catch
 * per-item failures and report counts instead.
 */

export class ValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[] | string) {
    const list = Array.isArray(errors) ? errors : [errors];
    super(list.join('; '));
    this.name = 'ValidationError';
    this.errors = list;
  }
}

export class NotFoundError extends Error {
  readonly resource: string;
  readonly identifier: string;

  constructor(resource: string, identifier: string) {
    super(`${resource} '${identifier}' not found`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.identifier = identifier;
  }
}

export class MissingVariablesError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing variables: ${missing.join(', ')}`);
    this.name = 'MissingVariablesError';
    this.missing = missing;
  }
}

export class InvalidStateTransitionError extends Error {
  readonly entity: string;
  readonly from: string;
  readonly event: string;

  constructor(entity: string, from: string, event: string) {
    super(`Cannot ${event} ${entity} in state '${from}'`);
    this.name = 'InvalidStateTransitionError';
    this.entity = entity;
    this.from = from;
    this.event = event;
  }
}

/**
 * Raised inside the evaluator runner when a single evaluator fails on a
 * single run item. Logged and counted; never propagated out of a batch.
 */
export class EvaluatorExecutionError extends Error {
  readonly evaluatorType: string;
  readonly runItemId: string;

  constructor(evaluatorType: string, runItemId: string, cause: unknown) {
    super(`Evaluator '${evaluatorType}' failed on run item ${runItemId}: ${errorMessage(cause)}`, { cause });
    this.name = 'EvaluatorExecutionError';
    this.evaluatorType = evaluatorType;
    this.runItemId = runItemId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}
