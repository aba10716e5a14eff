export class Success<S, F> {
  readonly value: S;

  constructor(value: S) {
    this.value = value;
  }

  isSuccess(): this is Success<S, F> {
    return true;
  }

  isFailure(): this is Failure<S, F> {
    return false;
  }

  getValue(): S {
    return this.value;
  }
}

export class Failure<S, F> {
  readonly error: F;

  constructor(error: F) {
    this.error = error;
  }

  isSuccess(): this is Success<S, F> {
    return false;
  }

  isFailure(): this is Failure<S, F> {
    return true;
  }

  getError(): F {
    return this.error;
  }
}

export type Either<S, F> = Success<S, F> | Failure<S, F>;

export const success = <S, F = never>(value: S): Either<S, F> =>
  new Success<S, F>(value);

export const failure = <F, S = never>(error: F): Either<S, F> =>
  new Failure<S, F>(error);
