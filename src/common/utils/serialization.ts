export type Scalar = string | number | boolean | null;

export type JsonView = Record<string, Scalar>;

function toScalar(value: unknown): Scalar {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Flattens a record of scalars and bigints into something JSON.stringify accepts.
 * Amounts are wei and come out as decimal strings; absent optionals become null.
 */
export function toJsonView(record: object): JsonView {
  const view: JsonView = {};
  for (const [key, value] of Object.entries(record)) {
    view[key] = toScalar(value);
  }
  return view;
}
