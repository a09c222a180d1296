// Error taxonomy for the tip bot
// Expected outcomes (duplicate, unmatched, declined) are result values; these
// classes cover the failures.

import axios from 'axios';
import { ActionState } from '../models/action';

export class TransientUpstreamError extends Error {
  constructor(
    message: string,
    public status?: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'TransientUpstreamError';
  }
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

// Ledger errors abort the single action being processed, never the batch
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class DuplicateMessageError extends LedgerError {
  constructor(public sourceMessageId: string) {
    super(`Action already recorded for message ${sourceMessageId}`);
    this.name = 'DuplicateMessageError';
  }
}

export class InvalidStateTransitionError extends LedgerError {
  constructor(
    public actionId: number,
    public from: ActionState | null,
    public to: ActionState
  ) {
    super(
      from === null
        ? `Action ${actionId} not found (transition to ${to})`
        : `Action ${actionId} cannot move from ${from} to ${to}`
    );
    this.name = 'InvalidStateTransitionError';
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(
    public username: string,
    public balance: bigint,
    public requested: bigint
  ) {
    super(`Balance of ${username} (${balance}) does not cover ${requested}`);
    this.name = 'InsufficientBalanceError';
  }
}

export class StorageError extends LedgerError {
  constructor(
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const TRANSIENT_STATUSES = [408, 429, 500, 502, 503, 504, 520, 521, 522, 524];

const TRANSIENT_CODES = [
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ERR_NETWORK'
];

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.includes(status);
}

export function isTransientError(error: unknown): error is TransientUpstreamError {
  return error instanceof TransientUpstreamError;
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/**
 * Map an HTTP client failure onto the taxonomy: rate limits, 5xx, timeouts
 * and connection failures become TransientUpstreamError.
 */
export function toUpstreamError(error: unknown, context: string): Error {
  if (error instanceof TransientUpstreamError || error instanceof UpstreamError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      return new TransientUpstreamError(`${context}: ${error.code || error.message}`, undefined, error);
    }
    if (isTransientStatus(status)) {
      return new TransientUpstreamError(`${context}: HTTP ${status}`, status, error);
    }
    return new UpstreamError(`${context}: HTTP ${status} ${error.message}`, status);
  }

  if (error instanceof Error) {
    const code = errorCode(error);
    if (code && TRANSIENT_CODES.includes(code)) {
      return new TransientUpstreamError(`${context}: ${code}`, undefined, error);
    }
    return error;
  }

  return new Error(`${context}: ${String(error)}`);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
