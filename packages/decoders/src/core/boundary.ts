import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import type { DecodeError, JsonSyntaxError } from "./errors.js"
import { jsonSyntaxError } from "./errors.js"
import type { Json } from "./json.js"

// CHANGE: expose decoding to callers that hold text, run effects, or expect exceptions
// WHY: the engine only returns values; raising is a choice of the calling side
// SOURCE: n/a
// FORMAT THEOREM: ∀d, v: decodeOrThrow(d, v) throws DecodeFault(e) ⇔ decode(d, v) = Left(e)
// PURITY: CORE
// EFFECT: Effect<A, DecodeError> for decodeEffect
// INVARIANT: the structured error reaches every boundary unchanged
// COMPLEXITY: O(n)

export class DecodeFault extends Data.TaggedError("DecodeFault")<{
  readonly error: DecodeError
  readonly message: string
}> {}

const parseText = (text: string): Either.Either<Json, JsonSyntaxError> =>
  Either.try({
    try: (): Json => JSON.parse(text),
    catch: (error) => jsonSyntaxError(error instanceof Error ? error.message : String(error))
  })

/**
 * Parse JSON text and decode it.
 *
 * Duplicate object keys are resolved by `JSON.parse`: the last occurrence wins.
 *
 * @param decoder - Decoder to run.
 * @param text - Raw JSON text.
 * @returns Either with the value, a JsonSyntaxError, or a DecodeError.
 *
 * @pure true
 */
export const decodeString = <A>(
  decoder: Decoder<A>,
  text: string
): Either.Either<A, DecodeError | JsonSyntaxError> =>
  Either.flatMap(parseText(text), (json) => decoder.run(json))

export const decodeEffect = <A>(decoder: Decoder<A>, value: Json): Effect.Effect<A, DecodeError> =>
  Effect.suspend(() => Either.match(decoder.run(value), {
    onLeft: (error) => Effect.fail(error),
    onRight: (decoded) => Effect.succeed(decoded)
  }))

/**
 * Decode and throw a `DecodeFault` on failure.
 *
 * @throws DecodeFault carrying the structured DecodeError.
 * @pure false
 */
export const decodeOrThrow = <A>(decoder: Decoder<A>, value: Json): A => {
  const decoded = decoder.run(value)
  if (Either.isLeft(decoded)) {
    throw new DecodeFault({ error: decoded.left, message: decoded.left.cause })
  }
  return decoded.right
}
