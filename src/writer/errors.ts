// The only failure that fails a whole run

export class FeedWriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FeedWriteError";
  }
}
