/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when a setting is missing, malformed or inconsistent
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly key?: string,
    cause?: Error,
  ) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Source index outside the three sources of an observation
 */
export class InvalidIndexError extends AppError {
  constructor(public readonly index: number) {
    super(`Invalid source index ${index}`, "INVALID_INDEX");
  }
}

/**
 * Opportunity id outside the ledger range
 */
export class InvalidIdError extends AppError {
  constructor(
    public readonly id: number,
    public readonly count: number,
  ) {
    super(`Invalid opportunity id ${id} (ledger holds ${count})`, "INVALID_ID");
  }
}

/**
 * Second acceptance attempt at a logical height that already has a record
 */
export class DuplicateHeightError extends AppError {
  constructor(public readonly height: number) {
    super(
      `Opportunity already recorded at height ${height}`,
      "DUPLICATE_HEIGHT",
    );
  }
}

export class InsufficientHistoryError extends AppError {
  constructor(
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Need ${required} observations, got ${available}`,
      "INSUFFICIENT_HISTORY",
    );
  }
}

/**
 * Observation that does not have the expected shape (source count, height)
 */
export class InvalidObservationError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_OBSERVATION");
  }
}

export class InvalidPriceError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_PRICE");
  }
}

export class InvalidReserveError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_RESERVE");
  }
}

export class OpportunityAlreadyExecutedError extends AppError {
  constructor(public readonly id: number) {
    super(`Opportunity ${id} is already marked executed`, "ALREADY_EXECUTED");
  }
}

/**
 * State snapshot whose contents do not have the persisted shape
 */
export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
  }
}
