/**
 * @fileoverview Result type for explicit error handling
 *
 * Used where a caller wants to branch on failure instead of catching, such as
 * loading an optional configuration file.
 */

import * as fs from 'node:fs';
import { IOError, toError } from './errors.js';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Unwrap a Result, throwing if error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

// ============================================================================
// SAFE FILE OPERATIONS
// ============================================================================

/**
 * Read a UTF-8 file. A missing file is reported as `null` rather than an error.
 */
export function readFileIfExists(filePath: string): Result<string | null, IOError> {
  try {
    return Ok(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    const err = e as NodeJS.ErrnoException;
    // ENOENT = nothing there yet, which callers treat as "use defaults"
    if (err.code === 'ENOENT') {
      return Ok(null);
    }
    return Err(new IOError('read', filePath, toError(e)));
  }
}
