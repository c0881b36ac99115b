import { Result } from 'neverthrow';

/** `JSON.parse` as a Result; the error is the parser's message. */
export const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => (e instanceof Error ? e.message : String(e))
);
