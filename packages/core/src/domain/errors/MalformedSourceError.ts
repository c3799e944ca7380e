/** The source bytes are not a JSON array (or stream) of objects. */
export class MalformedSourceError extends Error {
  /** Absolute byte offset in the source where the problem was found. */
  readonly offset: number;

  constructor(message: string, offset: number, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedSourceError';
    this.offset = offset;
  }
}
