// CHANGE: introduce the JSON value tree consumed by decoders
// WHY: decoders read an already-parsed tree and never mutate it
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: jsonKind(x) ∈ JsonKind
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type JsonArray = ReadonlyArray<Json>

export type JsonKind = "null" | "boolean" | "number" | "string" | "array" | "object"

export const isJsonArray = (value: Json): value is JsonArray => Array.isArray(value)

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const jsonKind = (value: Json): JsonKind => {
  if (value === null) {
    return "null"
  }
  if (isJsonArray(value)) {
    return "array"
  }
  if (isJsonObject(value)) {
    return "object"
  }
  if (typeof value === "boolean") {
    return "boolean"
  }
  if (typeof value === "number") {
    return "number"
  }
  return "string"
}

/**
 * Look up an own key of a JSON object.
 *
 * Duplicate keys never reach this point: the parser that built the tree
 * already kept one of them (`JSON.parse` keeps the last).
 *
 * @pure true
 * @invariant inherited properties are never returned
 */
export const lookupKey = (object: JsonObject, key: string): Json | undefined =>
  Object.hasOwn(object, key) ? object[key] : undefined

/**
 * Render a JSON snapshot for error messages.
 *
 * @param value - Snapshot to print.
 * @param indent - Spaces per nesting level, 0 for compact output.
 * @returns JSON text.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderJson = (value: Json, indent = 0): string =>
  indent > 0 ? JSON.stringify(value, null, indent) : JSON.stringify(value)
