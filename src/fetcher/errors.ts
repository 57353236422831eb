// Story API failures: end pagination, never discard pages already read

export class StoryFetchError extends Error {
  constructor(
    message: string,
    public readonly page: number,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "StoryFetchError";
  }
}
