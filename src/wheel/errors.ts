export class ParseError extends Error {
  constructor(
    message: string,
    public token: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public values: readonly number[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function parseError(token: string): ParseError {
  return new ParseError(
    `Could not read "${token}" as a number. Enter distances in mm separated by commas, e.g. 2, 3, 5, 8.`,
    token
  );
}

export function validationError(message: string, values: readonly number[] = []): ValidationError {
  return new ValidationError(message, values);
}

/** Errors caused by the caller's input, as opposed to failures while generating. */
export function isInputError(error: unknown): error is ParseError | ValidationError {
  return error instanceof ParseError || error instanceof ValidationError;
}
