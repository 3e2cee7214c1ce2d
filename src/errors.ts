import type { TaskStatus } from './types.js';

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed or out-of-range generation parameters. No task is created. */
export class InvalidRequestError extends Error {
  readonly code = 'invalid_request';

  constructor(readonly issues: ValidationIssue[]) {
    super(issues.length > 0 ? `Invalid request: ${issues.map(formatIssue).join('; ')}` : 'Invalid request');
    this.name = 'InvalidRequestError';
  }
}

/** The outstanding-task ceiling is reached. Callers retry later. */
export class BusyError extends Error {
  readonly code = 'busy';

  constructor(readonly outstanding: number, readonly limit: number) {
    super(`Generation queue is full (${outstanding}/${limit} tasks outstanding), try again later`);
    this.name = 'BusyError';
  }
}

export class TaskNotFoundError extends Error {
  readonly code = 'task_not_found';

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class IllegalTransitionError extends Error {
  readonly code = 'illegal_transition';

  constructor(readonly taskId: string, readonly from: TaskStatus, readonly to: TaskStatus) {
    super(`Illegal transition for task ${taskId}: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Raised by speech engines; `device` is the device that was attempted. */
export class SynthesisError extends Error {
  readonly code = 'synthesis_failed';

  constructor(message: string, readonly device?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}

export class DeadlineExceededError extends Error {
  readonly code = 'deadline_exceeded';

  constructor(readonly timeoutMs: number) {
    super(`Generation timed out after ${(timeoutMs / 1000).toFixed(1)}s`);
    this.name = 'DeadlineExceededError';
  }
}

export class TaskCancelledError extends Error {
  readonly code = 'cancelled';

  constructor(reason = 'Cancelled by request') {
    super(reason);
    this.name = 'TaskCancelledError';
  }
}

function formatIssue(issue: ValidationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export function messageFromCause(cause: unknown): string {
  if (cause instanceof Error && cause.message.trim().length > 0) return cause.message;
  if (typeof cause === 'string' && cause.trim().length > 0) return cause;
  return String(cause);
}
