/**
 * Error taxonomy. Per-worker failures never surface as these; they are
 * confidence-0 responses. Only structural faults are thrown.
 */

import type { Aggregate, WorkerKind } from './types.js';

export class NotRegisteredError extends Error {
  constructor(public kind: string) {
    super(`Worker kind not registered: ${kind}`);
    this.name = 'NotRegisteredError';
  }
}

export class InitFailedError extends Error {
  constructor(
    public kind: WorkerKind,
    reason: string,
  ) {
    super(`Worker ${kind} failed to initialize: ${reason}`);
    this.name = 'InitFailedError';
  }
}

export class AcquireTimeoutError extends Error {
  constructor(
    public kind: WorkerKind,
    public timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting to acquire ${kind}`);
    this.name = 'AcquireTimeoutError';
  }
}

export class OperationTimeoutError extends Error {
  constructor(
    public label: string,
    public timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export class BusStoppedError extends Error {
  constructor(operation: string) {
    super(`Message bus is not running (${operation})`);
    this.name = 'BusStoppedError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Fatal to one conversation. The partial context stays attached for inspection.
 */
export class PhaseAbortedError extends Error {
  constructor(
    public conversationId: string,
    public phase: string,
    reason: string,
    public aggregate: Aggregate,
  ) {
    super(`Debate ${conversationId} aborted in ${phase}: ${reason}`);
    this.name = 'PhaseAbortedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
