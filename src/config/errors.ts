// Raised at startup when the environment cannot be turned into a valid config

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly keys: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
