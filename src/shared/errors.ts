import type { AdStatus } from './types.js';

export type BotErrorCode =
  | 'AUTHORIZATION'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'STORE';

/**
 * Base class for every failure that is scoped to a single interaction.
 * Handlers translate these into a short reply; none of them stop the process.
 */
export class BotError extends Error {
  public readonly code: BotErrorCode;

  constructor(message: string, code: BotErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BotError';
    this.code = code;
  }
}

export class AuthorizationError extends BotError {
  public readonly actorId: number;

  constructor(actorId: number, required: 'admin' | 'superadmin') {
    super(`User ${actorId} lacks ${required} rights`, 'AUTHORIZATION');
    this.name = 'AuthorizationError';
    this.actorId = actorId;
  }
}

export class ValidationError extends BotError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Validation failed for ${field}: ${message}`, 'VALIDATION');
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class NotFoundError extends BotError {
  public readonly resource: 'ad' | 'user';
  public readonly identifier: number;

  constructor(resource: 'ad' | 'user', identifier: number) {
    super(`${resource} not found: ${identifier}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.resource = resource;
    this.identifier = identifier;
  }
}

export class InvalidTransitionError extends BotError {
  public readonly from: AdStatus;
  public readonly to: AdStatus;

  constructor(from: AdStatus, to: AdStatus) {
    super(`Invalid ad transition: ${from} → ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class StoreError extends BotError {
  constructor(operation: string, cause: unknown) {
    super(`Store operation ${operation} failed: ${describeError(cause)}`, 'STORE', { cause });
    this.name = 'StoreError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
