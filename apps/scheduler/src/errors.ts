export class DeferqError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTimestampError extends DeferqError {}

export class InvalidJobError extends DeferqError {}

export class InvalidIntervalError extends DeferqError {}

/** A stored delayed item could not be decoded into a job. */
export class InvalidPayloadError extends DeferqError {
  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
  }
}
