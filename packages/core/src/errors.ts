/**
 * Error Types
 *
 * The only recoverable failures the library produces. Everything else is a
 * caller contract that goes unchecked unless `checks.preconditions` is on.
 */

/**
 * Base class for contract violations detected at run time.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly contractType: "precondition" | "invariant"
  ) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Thrown in checked mode when a caller breaks a precondition.
 */
export class PreconditionError extends ContractError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when data would break a type's invariant (an embedded terminator).
 */
export class InvariantError extends ContractError {
  constructor(message: string) {
    super(message, "invariant");
    this.name = "InvariantError";
  }
}

/** Thrown by bounds-checked accessors. */
export class OutOfRangeError extends Error {
  constructor(
    readonly position: number,
    readonly size: number,
    message: string = `position ${position} is out of range for size ${size}`
  ) {
    super(message);
    this.name = "OutOfRangeError";
  }
}

/** Thrown when an operation is given a size it cannot work with. */
export class InvalidSizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSizeError";
  }
}
