/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - Typed subclasses for each failure the triage run distinguishes
 * - safeExecute: Returns result objects instead of throwing
 */

import type { AppLogger } from './observability/index.js';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** The mailbox could not be reached or used. Fatal for the run. */
export class ConnectionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MAILBOX_CONNECTION', false, context);
    this.name = 'ConnectionError';
  }
}

/** A remote model call failed after its retries were spent. */
export class ServiceCallError extends AppError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'SERVICE_CALL', true, status === undefined ? undefined : { status });
    this.name = 'ServiceCallError';
  }
}

/** The remote call succeeded but its payload had the wrong shape. */
export class MalformedServiceResponseError extends AppError {
  constructor(message: string) {
    super(message, 'MALFORMED_RESPONSE', true);
    this.name = 'MalformedServiceResponseError';
  }
}

/** An outbound reply could not be delivered. */
export class DeliveryError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DELIVERY', true, context);
    this.name = 'DeliveryError';
  }
}

export class ConfigError extends AppError {
  constructor(public readonly problems: string[]) {
    super(`Configuration validation failed:\n  - ${problems.join('\n  - ')}`, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** Operator input ended while a decision was pending. */
export class InputClosedError extends AppError {
  constructor() {
    super('Operator input closed before a decision was made', 'INPUT_CLOSED');
    this.name = 'InputClosedError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string,
  log: AppLogger
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    log.error('operation_failed', { operation: context, error: errorMessage(error) });
    return {
      success: false,
      error: errorMessage(error),
    };
  }
}
