/**
 * Error types raised by the lorebinder core
 */

export class LorebinderError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'LorebinderError';
    this.code = code;
  }
}

/**
 * Raised when two values for the same key cannot be combined because one is a
 * list and the other a mapping. Signals inconsistent upstream data.
 */
export class StructureMismatchError extends LorebinderError {
  readonly path: string[];

  constructor(path: string[], leftKind: string, rightKind: string) {
    super(
      'STRUCTURE_MISMATCH',
      `Cannot merge ${leftKind} with ${rightKind} at ${path.length > 0 ? path.join(' > ') : '<root>'}`
    );
    this.name = 'StructureMismatchError';
    this.path = path;
  }
}

export function isLorebinderError(err: unknown): err is LorebinderError {
  return err instanceof LorebinderError;
}
