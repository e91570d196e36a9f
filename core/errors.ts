/**
 * Error types shared by the engine.
 *
 * Editing commands never throw: they report through status messages.
 * Only the construction helpers (opening the initial file, validating
 * geometry) raise an EditorFatalError, which the host turns into a
 * terminal restore followed by process exit.
 */

export class EditorFatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EditorFatalError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
