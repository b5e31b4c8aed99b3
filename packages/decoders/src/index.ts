export type { Json, JsonArray, JsonKind, JsonObject } from "./core/json.js"
export { isJsonArray, isJsonObject, jsonKind, renderJson } from "./core/json.js"

export type { ContextFrame, FrameAnnotation, Frames } from "./core/context.js"
export { innermostFrame, maxDepth, outermostFrame, prependFrame, rootFrame } from "./core/context.js"

export type {
  ArrayExhausted,
  ConversionFailed,
  DecodeError,
  DecodeErrorTag,
  JsonSyntaxError,
  MissingKey,
  NoAlternative,
  NotAnArray,
  NotAnObject,
  TypeMismatch,
  UnparsedTrailingElements
} from "./core/errors.js"

export type { Conversion, Decoder, DecoderType } from "./core/decoder.js"
export {
  array,
  decode,
  dict,
  expectBool,
  expectInt,
  expectJson,
  expectNull,
  expectNumber,
  expectString,
  fail,
  fromThrowing,
  lazy,
  literals,
  make,
  map,
  nullable,
  oneOf,
  succeed,
  thenConvert
} from "./core/decoder.js"

export { at, field, optionalField } from "./core/field.js"

export type { RecordBuilder } from "./core/record.js"
export { record } from "./core/record.js"

export type { ArrayCursor, TupleBuilder, TupleDecoder, TupleStep } from "./core/tuple.js"
export { shiftElement, tuple, tupleOf } from "./core/tuple.js"

export { DecodeFault, decodeEffect, decodeOrThrow, decodeString } from "./core/boundary.js"

export type { RenderOptions } from "./core/report.js"
export { defaultRenderOptions, formatDecodeError, formatFrameHeader, renderJsonError } from "./core/report.js"

export { decodeFile, readJsonFile } from "./shell/json-file.js"
