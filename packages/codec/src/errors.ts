/**
 * Raised for values that cannot be serialized and for text that cannot be
 * decoded. Callers of the signing engine see it unchanged.
 */
export class CodecError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CodecError';
  }
}
