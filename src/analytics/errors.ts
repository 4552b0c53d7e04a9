/** Base class for every error raised by the analytics engine. */
export class AnalyticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A reconciled field is absent from one of the two metric sets. */
export class MissingFieldError extends AnalyticsError {
  constructor(
    readonly field: string,
    readonly source: string
  ) {
    super(`Field "${field}" is missing from ${source}`);
  }
}

/** Rates were requested over an empty (or negative) timespan. */
export class UndefinedRateError extends AnalyticsError {
  constructor(readonly timespanSeconds: number) {
    super(`Cannot derive rates over a timespan of ${timespanSeconds}s`);
  }
}

export class InvalidPaletteError extends AnalyticsError {
  constructor(readonly levels: number) {
    super(`Palette needs an integer number of levels >= 2, got ${levels}`);
  }
}

export class InvalidColorError extends AnalyticsError {
  constructor(readonly color: string) {
    super(`Not a hex colour: "${color}"`);
  }
}

/** An external payload matched none of the shapes we know how to read. */
export class PayloadShapeError extends AnalyticsError {
  constructor(
    readonly payload: string,
    detail: string
  ) {
    super(`Unrecognised ${payload} payload: ${detail}`);
  }
}
