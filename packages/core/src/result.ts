/**
 * Side-effect taps for neverthrow chains: `result.map(tap(...))` observes a success,
 * `result.mapErr(onFailure(...))` observes a failure. Neither changes the value.
 */
export function tap<T>(fn: (value: T) => void): (value: T) => T {
  return (value) => {
    fn(value);
    return value;
  };
}

export function onFailure<E>(fn: (error: E) => void): (error: E) => E {
  return (error) => {
    fn(error);
    return error;
  };
}
