export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

export const mapError = <T, E1, E2>(
  result: Result<T, E1>,
  fn: (error: E1) => E2
): Result<T, E2> => {
  if (result.success) return result;
  return err(fn(result.error));
};

/**
 * Returns the data of a successful result, or throws the error.
 * Meant for tests and scripts where a failure is a bug.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
  if (result.success) return result.data;
  throw new Error(`Called unwrap on an error result: ${JSON.stringify(result.error)}`);
};
