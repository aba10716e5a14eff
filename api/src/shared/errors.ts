export class InvalidArgumentError extends Error {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

export function isInvalidArgumentError(
  error: unknown
): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}
