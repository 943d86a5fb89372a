import type { ErrorCode } from './contracts';

export interface PlacementErrorOptions {
  /** Path the error is about (the existing duplicate for AlreadyExists). */
  path?: string;
  cause?: unknown;
}

export class PlacementError extends Error {
  readonly code: ErrorCode;
  readonly path?: string;

  constructor(code: ErrorCode, message: string, options: PlacementErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PlacementError';
    this.code = code;
    this.path = options.path;
  }
}

/**
 * Reads the errno code ("ENOENT", "EXDEV", ...) off a Node error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps any thrown value onto the placement error taxonomy.
 * PlacementErrors pass through untouched.
 */
export function toPlacementError(error: unknown, fallback: ErrorCode = 'IOFailure'): PlacementError {
  if (error instanceof PlacementError) {
    return error;
  }

  let code: ErrorCode;
  switch (errnoCode(error)) {
    case 'ENOENT':
      code = 'NotFound';
      break;
    case 'EACCES':
    case 'EPERM':
      code = 'PermissionDenied';
      break;
    case 'EEXIST':
      code = 'AlreadyExists';
      break;
    default:
      code = fallback;
  }

  return new PlacementError(code, errorMessage(error), { cause: error });
}
