export class RecognitionConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecognitionConfigError";
  }
}

export class InvalidPatternConfigError extends RecognitionConfigError {
  constructor(
    public readonly pattern: string,
    reason: string
  ) {
    super(`Invalid plate template "${pattern}": ${reason}`);
    this.name = "InvalidPatternConfigError";
  }
}

export class InvalidThresholdError extends RecognitionConfigError {
  constructor(
    public readonly setting: string,
    public readonly value: unknown,
    reason = "must be a number between 0 and 100"
  ) {
    super(`Invalid ${setting} ${JSON.stringify(value)}: ${reason}`);
    this.name = "InvalidThresholdError";
  }
}
