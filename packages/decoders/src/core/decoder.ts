import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Option from "effect/Option"
import { fromEntries } from "effect/Record"

import { prependFrame } from "./context.js"
import type { DecodeError } from "./errors.js"
import { conversionFailed, noAlternative, notAnArray, notAnObject, typeMismatch } from "./errors.js"
import type { Json } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"

// CHANGE: define the decoder value and its primitive and conversion decoders
// WHY: scalar leaves of the tree are type-checked here and fed to user conversions
// SOURCE: n/a
// FORMAT THEOREM: ∀d, v: decode(d, v) = decode(d, v) (no hidden state)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a conversion never runs on a value its base decoder rejected
// COMPLEXITY: O(n) where n = size of the decoded subtree

export interface Decoder<A> {
  readonly _tag: "Decoder"
  readonly run: (value: Json) => Either.Either<A, DecodeError>
}

export type DecoderType<D> = D extends Decoder<infer A> ? A : never

/** A user conversion: total or failing with a message, never throwing. */
export type Conversion<A, B> = (value: A) => Either.Either<B, string>

export const make = <A>(run: (value: Json) => Either.Either<A, DecodeError>): Decoder<A> => ({
  _tag: "Decoder",
  run
})

/**
 * Run a decoder against a parsed JSON value.
 *
 * @param decoder - Decoder to run.
 * @param value - Parsed JSON tree.
 * @returns Either with the decoded value or a DecodeError with its context frames.
 *
 * @pure true
 * @invariant value is never mutated
 * @complexity O(n)
 */
export const decode = <A>(decoder: Decoder<A>, value: Json): Either.Either<A, DecodeError> =>
  decoder.run(value)

export const succeed = <A>(value: A): Decoder<A> => make(() => Either.right(value))

export const fail = (message: string): Decoder<never> => make((value) => Either.left(conversionFailed(message, value)))

export const expectNumber: Decoder<number> = make((value) =>
  typeof value === "number" ? Either.right(value) : Either.left(typeMismatch("number", value))
)

export const expectInt: Decoder<number> = make((value) =>
  typeof value === "number" && Number.isInteger(value)
    ? Either.right(value)
    : Either.left(typeMismatch("int", value))
)

export const expectString: Decoder<string> = make((value) =>
  typeof value === "string" ? Either.right(value) : Either.left(typeMismatch("string", value))
)

export const expectBool: Decoder<boolean> = make((value) =>
  typeof value === "boolean" ? Either.right(value) : Either.left(typeMismatch("boolean", value))
)

export const expectNull: Decoder<null> = make((value) =>
  value === null ? Either.right(null) : Either.left(typeMismatch("null", value))
)

export const expectJson: Decoder<Json> = make((value) => Either.right(value))

export const map: {
  <A, B>(f: (value: A) => B): (self: Decoder<A>) => Decoder<B>
  <A, B>(self: Decoder<A>, f: (value: A) => B): Decoder<B>
} = dual(
  2,
  <A, B>(self: Decoder<A>, f: (value: A) => B): Decoder<B> => make((value) => Either.map(self.run(value), f))
)

/**
 * Decode with `self`, then feed the raw result to a user conversion.
 *
 * A failing conversion yields `ConversionFailed` whose only frame holds the
 * raw value the conversion received; enclosing combinators wrap it like any
 * other failure.
 *
 * @pure true
 * @invariant base failures are returned unchanged
 */
export const thenConvert: {
  <A, B>(f: Conversion<A, B>): (self: Decoder<A>) => Decoder<B>
  <A, B>(self: Decoder<A>, f: Conversion<A, B>): Decoder<B>
} = dual(
  2,
  <A, B>(self: Decoder<A>, f: Conversion<A, B>): Decoder<B> =>
    make((value) => {
      const base = self.run(value)
      if (Either.isLeft(base)) {
        return Either.left(base.left)
      }
      return Either.mapLeft(f(base.right), (message) => conversionFailed(message, value))
    })
)

const describeThrown = (thrown: unknown): string => thrown instanceof Error ? thrown.message : String(thrown)

/**
 * Adapt a conversion that signals failure by throwing.
 *
 * @param f - Legacy conversion.
 * @returns Conversion returning Left with the thrown message.
 *
 * @pure true
 */
export const fromThrowing = <A, B>(f: (value: A) => B): Conversion<A, B> => (value) =>
  Either.try({
    try: () => f(value),
    catch: describeThrown
  })

export const literals = <const L extends string>(
  allowed: ReadonlyArray<L>,
  describe: (value: string) => string = (value) => `unexpected value: ${value}`
): Decoder<L> => {
  const isAllowed = (value: string): value is L => allowed.some((candidate) => candidate === value)
  return thenConvert(
    expectString,
    (value) => isAllowed(value) ? Either.right(value) : Either.left(describe(value))
  )
}

export const nullable = <A>(decoder: Decoder<A>): Decoder<Option.Option<A>> =>
  make((value) => value === null ? Either.right(Option.none()) : Either.map(decoder.run(value), Option.some))

export const array = <A>(decoder: Decoder<A>): Decoder<ReadonlyArray<A>> =>
  make((value) => {
    if (!isJsonArray(value)) {
      return Either.left(notAnArray(value))
    }
    const result: Array<A> = []
    for (const [index, element] of value.entries()) {
      const decoded = decoder.run(element)
      if (Either.isLeft(decoded)) {
        return Either.left(prependFrame(decoded.left, value, { index }))
      }
      result.push(decoded.right)
    }
    return Either.right(result)
  })

export const dict = <A>(decoder: Decoder<A>): Decoder<Readonly<Record<string, A>>> =>
  make((value) => {
    if (!isJsonObject(value)) {
      return Either.left(notAnObject(value))
    }
    // entries are defined, not assigned: a "__proto__" key stays an own entry
    const entries: Array<readonly [string, A]> = []
    for (const [key, entry] of Object.entries(value)) {
      const decoded = decoder.run(entry)
      if (Either.isLeft(decoded)) {
        return Either.left(prependFrame(decoded.left, value, { key }))
      }
      entries.push([key, decoded.right])
    }
    return Either.right(fromEntries(entries))
  })

export const oneOf = <A>(...decoders: ReadonlyArray<Decoder<A>>): Decoder<A> =>
  make((value) => {
    const errors: Array<DecodeError> = []
    for (const decoder of decoders) {
      const decoded = decoder.run(value)
      if (Either.isRight(decoded)) {
        return decoded
      }
      errors.push(decoded.left)
    }
    return Either.left(noAlternative(value, errors))
  })

export const lazy = <A>(thunk: () => Decoder<A>): Decoder<A> => make((value) => thunk().run(value))
