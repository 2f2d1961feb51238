import { isCancel } from 'axios';

/**
 * True for errors raised because an AbortSignal fired, whether they come from
 * Node itself (AbortError) or from an axios request (CanceledError).
 */
export function isAbortError(error: unknown): boolean {
  if (isCancel(error)) {
    return true;
  }
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
