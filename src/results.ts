/** A result that's tagged as a success. */
export type Success<T> = {
  readonly ok: true;
  readonly val: T;
};

/** A result that's tagged as a failure and has an error message. */
export type Failure = {
  readonly ok: false;
  readonly message: string;
  /** For a predicate that threw, the value it was called with. */
  readonly actual?: unknown;
};

export function success(): Success<undefined>;
export function success<T>(val: T): Success<T>;
export function success<T>(val?: T): Success<T | undefined> {
  return { ok: true, val };
}

export function failure(message: string, actual?: unknown): Failure {
  return { ok: false, message, actual };
}

/**
 * Returns the text to report for something that was thrown, including the
 * stack trace when there is one.
 */
export function errorText(caught: unknown): string {
  if (caught instanceof Error) {
    return caught.stack ?? `${caught.name}: ${caught.message}`;
  }
  return String(caught);
}

/**
 * Calls a predicate, converting anything it throws into a Failure.
 */
export function evaluate<T>(
  predicate: (val: T) => boolean,
  val: T,
): Success<boolean> | Failure {
  try {
    return success(predicate(val));
  } catch (e) {
    return failure(errorText(e), val);
  }
}
