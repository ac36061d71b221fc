export type BoxErrorCode =
  | 'invalid-table'
  | 'non-bijective-table'
  | 'invalid-permutation'
  | 'invalid-input-length';

export class BoxCodedError extends Error {
  public readonly code: BoxErrorCode;

  constructor(message: string, code: BoxErrorCode, error?: unknown) {
    super(message, error !== undefined ? { cause: error } : undefined);
    this.name = 'BoxCodedError';
    this.code = code;
  }
}

export function isBoxCodedError(error: unknown, code?: BoxErrorCode): error is BoxCodedError {
  return error instanceof BoxCodedError && (code == null || error.code === code);
}
