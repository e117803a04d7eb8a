/**
 * Engine error taxonomy
 *
 * Every public operation either returns a complete result or throws exactly one
 * EngineError. Validation failures from zod are folded into INVALID_INPUT.
 */

import { ZodError } from 'zod';

export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NO_CONVERGENCE = 'NO_CONVERGENCE',
  DOMAIN_ERROR = 'DOMAIN_ERROR'
}

export type ErrorDetails = Record<string, unknown>;

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = 'EngineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function invalidInput(message: string, details?: ErrorDetails): EngineError {
  return new EngineError(message, ErrorCode.INVALID_INPUT, details);
}

export function domainError(message: string, details?: ErrorDetails): EngineError {
  return new EngineError(message, ErrorCode.DOMAIN_ERROR, details);
}

export function noConvergence(message: string, details?: ErrorDetails): EngineError {
  return new EngineError(message, ErrorCode.NO_CONVERGENCE, details);
}

/**
 * Maps zod issues to a field -> messages table
 */
function mapZodError(error: ZodError): { message: string; fields: Record<string, string[]> } {
  const fields: Record<string, string[]> = {};

  error.issues.forEach(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    if (!fields[path]) {
      fields[path] = [];
    }

    let message = issue.message;
    switch (issue.code) {
      case 'invalid_type':
        message = `Expected ${issue.expected}, received ${issue.received}`;
        break;
      case 'too_small':
        if (issue.type === 'number') {
          message = issue.inclusive
            ? `Must be at least ${issue.minimum}`
            : `Must be greater than ${issue.minimum}`;
        }
        break;
      case 'too_big':
        if (issue.type === 'number') {
          message = issue.inclusive
            ? `Must be at most ${issue.maximum}`
            : `Must be less than ${issue.maximum}`;
        }
        break;
    }

    fields[path].push(message);
  });

  const paths = Object.keys(fields);
  const message = paths.length === 1
    ? `${paths[0]}: ${fields[paths[0]][0]}`
    : `${paths.length} invalid fields: ${paths.join(', ')}`;

  return { message, fields };
}

/**
 * Normalizes anything thrown inside an operation into an EngineError
 */
export function toEngineError(error: unknown): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  if (error instanceof ZodError) {
    const mapped = mapZodError(error);
    return invalidInput(mapped.message, { fields: mapped.fields });
  }
  if (error instanceof RangeError) {
    return domainError(error.message);
  }
  if (error instanceof Error) {
    return new EngineError(error.message, ErrorCode.DOMAIN_ERROR, { cause: error.name });
  }
  return new EngineError(String(error), ErrorCode.DOMAIN_ERROR);
}

export function isEngineError(error: unknown, code?: ErrorCode): error is EngineError {
  return error instanceof EngineError && (code === undefined || error.code === code);
}
