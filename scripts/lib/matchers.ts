/**
 * A matcher inspects an input and either produces a result or declines with `undefined`.
 */
export type Matcher<I, O> = (input: I) => O | undefined;

/**
 * Try matchers in order; the first one that produces a result wins.
 */
export function firstMatch<I, O>(input: I, matchers: ReadonlyArray<Matcher<I, O>>): O | undefined {
  for (const matcher of matchers) {
    const result = matcher(input);
    if (result !== undefined) {
      return result;
    }
  }
  return undefined;
}

/**
 * Matcher that captures group 1 of a regular expression.
 */
export function captureGroup(pattern: RegExp): Matcher<string, string> {
  return (input) => {
    const match = pattern.exec(input);
    return match?.[1];
  };
}

/**
 * Matcher that always answers with the same value; useful as the last entry of a chain.
 */
export function constant<O>(value: O): Matcher<unknown, O> {
  return () => value;
}
