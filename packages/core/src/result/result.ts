import { orderedEntries, orderedRecord } from "../record/ordered.js";

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

/**
 * Map every item through `fn`, stopping at the first failure.
 * No partial array is ever returned.
 */
export const collectArray = <T, U, E>(
  items: readonly T[],
  fn: (item: T, index: number) => Result<U, E>
): Result<U[], E> => {
  const collected: U[] = [];
  for (let i = 0; i < items.length; i++) {
    const result = fn(items[i], i);
    if (!result.success) return result;
    collected.push(result.data);
  }
  return ok(collected);
};

/**
 * Map every value of a record through `fn`, keeping the record's authored key
 * order. Stops at the first failure.
 */
export const collectRecord = <T, U, E>(
  record: Readonly<Record<string, T>>,
  fn: (value: T, key: string) => Result<U, E>
): Result<Record<string, U>, E> => {
  const collected: [string, U][] = [];
  for (const [key, value] of orderedEntries(record)) {
    const result = fn(value, key);
    if (!result.success) return result;
    collected.push([key, result.data]);
  }
  return ok(orderedRecord(collected));
};

/**
 * Apply `fn` to a value that may be absent. An absent value succeeds as undefined.
 */
export const mapOptional = <T, U, E>(
  value: T | undefined,
  fn: (value: T) => Result<U, E>
): Result<U | undefined, E> => {
  if (value === undefined) return ok(undefined);
  return fn(value);
};
