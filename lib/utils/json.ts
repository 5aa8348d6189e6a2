/** Read one property of an untrusted JSON value. Non-objects yield undefined. */
export function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined
  const field: unknown = Reflect.get(value, key)
  return field
}
