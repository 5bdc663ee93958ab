/**
 * Data Copying
 *
 * Default copy strategy for graph payloads. Objects are rebuilt property by
 * property on their original prototype, so class instances keep their
 * methods. Functions and symbols are shared rather than copied. Shared
 * references and cycles keep their shape in the copy.
 */

export function copyData<T>(value: T): T {
  return copyValue(value, new WeakMap())
}

function copyValue<T>(value: T, seen: WeakMap<object, PropertyDescriptor>): T {
  if (typeof value !== "object" || value === null) return value

  const known = seen.get(value)
  if (known) return known.value

  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    const bytes = structuredClone(value)
    seen.set(value, { value: bytes })
    return bytes
  }

  const shell = emptyLike(value)
  const copy: T = Object.setPrototypeOf(shell, Object.getPrototypeOf(value))
  seen.set(value, { value: copy })

  if (value instanceof Map && shell instanceof Map) {
    for (const [key, entry] of value) shell.set(copyValue(key, seen), copyValue(entry, seen))
  } else if (value instanceof Set && shell instanceof Set) {
    for (const entry of value) shell.add(copyValue(entry, seen))
  }

  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key)
    if (!descriptor) continue
    if ("value" in descriptor) descriptor.value = copyValue(descriptor.value, seen)
    Object.defineProperty(shell, key, descriptor)
  }
  return copy
}

/**
 * Fresh container with the same internal slots as `value`.
 */
function emptyLike(value: object): object {
  if (Array.isArray(value)) return []
  if (value instanceof Date) return new Date(value.getTime())
  if (value instanceof RegExp) return new RegExp(value.source, value.flags)
  if (value instanceof Map) return new Map()
  if (value instanceof Set) return new Set()
  return {}
}
