export class RecordNotFound extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordNotFound";
  }
}

export class ConfigError extends Error {
  constructor(message = "Invalid configuration") {
    super(message);
    this.name = "ConfigError";
  }
}
