/**
 * Records that remember the order their keys were written in.
 *
 * Plain objects enumerate integer-like keys first, in ascending order, so
 * `{ "2": a, "1": b }` lists "1" before "2". Records built by `orderedRecord`
 * keep the order of the entries they were built from; `orderedKeys` and
 * `orderedEntries` read it back and fall back to `Object.keys` for any other
 * object.
 */
const keyOrders = new WeakMap<object, readonly string[]>();

export const orderedRecord = <T>(
  entries: readonly (readonly [string, T])[]
): Record<string, T> => {
  // fromEntries defines properties, so a "__proto__" key is kept as data
  const record = Object.fromEntries(entries);
  keyOrders.set(
    record,
    entries.map(([key]) => key)
  );
  return record;
};

export const orderedKeys = (record: object): string[] => {
  const order = keyOrders.get(record);
  return order === undefined ? Object.keys(record) : [...order];
};

export const orderedEntries = <T>(
  record: Readonly<Record<string, T>>
): [string, T][] => orderedKeys(record).map((key) => [key, record[key]]);
