// =========================================================
// ERRORS — FAILURE TAXONOMY
// =========================================================

import { ErrorKind, Failure } from '../types';

/**
 * A collaborator call that did not settle within its deadline
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Caller or state bug, e.g. an illegal lifecycle transition
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function failure(kind: ErrorKind, error: string): Failure {
  return { success: false, kind, error };
}
