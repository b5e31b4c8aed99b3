import type { Frames } from "./context.js"
import { rootFrame } from "./context.js"
import type { Json, JsonArray, JsonKind, JsonObject } from "./json.js"
import { renderJson } from "./json.js"

// CHANGE: unify the failure algebra of decoding
// WHY: every expected failure is a value carrying its cause and its context frames
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ DecodeError: e._tag is stable and exhaustively matchable ∧ e.frames ≠ ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; frames are never mutated after construction
// COMPLEXITY: O(1)/O(1)

interface ErrorBase {
  readonly cause: string
  readonly frames: Frames
}

export interface TypeMismatch extends ErrorBase {
  readonly _tag: "TypeMismatch"
  readonly expected: JsonKind | "int"
}
export interface NotAnObject extends ErrorBase {
  readonly _tag: "NotAnObject"
}
export interface NotAnArray extends ErrorBase {
  readonly _tag: "NotAnArray"
}
export interface MissingKey extends ErrorBase {
  readonly _tag: "MissingKey"
  readonly key: string
}
export interface ConversionFailed extends ErrorBase {
  readonly _tag: "ConversionFailed"
}
export interface ArrayExhausted extends ErrorBase {
  readonly _tag: "ArrayExhausted"
  readonly expected: number
  readonly found: number
}
export interface UnparsedTrailingElements extends ErrorBase {
  readonly _tag: "UnparsedTrailingElements"
  readonly remaining: JsonArray
}
export interface NoAlternative extends ErrorBase {
  readonly _tag: "NoAlternative"
  readonly errors: ReadonlyArray<DecodeError>
}

export type DecodeError =
  | TypeMismatch
  | NotAnObject
  | NotAnArray
  | MissingKey
  | ConversionFailed
  | ArrayExhausted
  | UnparsedTrailingElements
  | NoAlternative

export type DecodeErrorTag = DecodeError["_tag"]

export type JsonSyntaxError = { readonly _tag: "JsonSyntaxError"; readonly message: string }

export const typeMismatch = (expected: JsonKind | "int", value: Json): TypeMismatch => ({
  _tag: "TypeMismatch",
  expected,
  cause: `expected ${expected}, got ${renderJson(value)}`,
  frames: [rootFrame(value)]
})

export const notAnObject = (value: Json): NotAnObject => ({
  _tag: "NotAnObject",
  cause: "expected object",
  frames: [rootFrame(value)]
})

export const notAnArray = (value: Json): NotAnArray => ({
  _tag: "NotAnArray",
  cause: "expected array",
  frames: [rootFrame(value)]
})

export const missingKey = (key: string, object: JsonObject): MissingKey => ({
  _tag: "MissingKey",
  key,
  cause: `missing key [${key}]`,
  frames: [rootFrame(object, { key })]
})

export const conversionFailed = (message: string, raw: Json): ConversionFailed => ({
  _tag: "ConversionFailed",
  cause: message,
  frames: [rootFrame(raw)]
})

export const arrayExhausted = (position: number, elements: JsonArray): ArrayExhausted => ({
  _tag: "ArrayExhausted",
  expected: position + 1,
  found: elements.length,
  cause: `expected at least ${position + 1} elements, found ${elements.length}`,
  frames: [rootFrame(elements, { index: position })]
})

export const unparsedTrailingElements = (
  elements: JsonArray,
  position: number
): UnparsedTrailingElements => ({
  _tag: "UnparsedTrailingElements",
  remaining: elements.slice(position),
  cause: "array_as_tuple has unparsed elements",
  frames: [rootFrame(elements)]
})

export const noAlternative = (value: Json, errors: ReadonlyArray<DecodeError>): NoAlternative => ({
  _tag: "NoAlternative",
  errors,
  cause: "no alternative matched",
  frames: [rootFrame(value)]
})

export const jsonSyntaxError = (message: string): JsonSyntaxError => ({
  _tag: "JsonSyntaxError",
  message
})

export type CliError = { readonly _tag: "CliError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFileError = { readonly _tag: "ParseError"; readonly file: string; readonly error: string }
export type DecodeFileError = {
  readonly _tag: "DecodeFileError"
  readonly file: string
  readonly error: DecodeError
}

export type AppError = CliError | ConfigError | FileError | ParseFileError | DecodeFileError

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFileError = (file: string, error: string): ParseFileError => ({
  _tag: "ParseError",
  file,
  error
})

export const decodeFileError = (file: string, error: DecodeError): DecodeFileError => ({
  _tag: "DecodeFileError",
  file,
  error
})
