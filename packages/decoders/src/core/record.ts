import * as Either from "effect/Either"
import { singleton } from "effect/Record"

import type { Decoder } from "./decoder.js"
import { make } from "./decoder.js"
import type { DecodeError } from "./errors.js"
import { field as fieldOf } from "./field.js"
import type { Json } from "./json.js"

// CHANGE: merge independently declared field decoders into one constructed value
// WHY: records are declared as named sub-decoders, then combined by a total constructor
// SOURCE: n/a
// FORMAT THEOREM: ∀b, v: finish(b, c)(v) = Left(e) → e = first failing decoder's error in declaration order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoders run in declaration order and evaluation stops at the first failure
// COMPLEXITY: O(k) decoder runs where k = number of declared fields

export interface RecordBuilder<A> {
  readonly _tag: "RecordBuilder"
  readonly names: ReadonlyArray<string>
  /** Adds a named decoder run against the whole input value. */
  readonly field: <K extends string, B>(name: K, decoder: Decoder<B>) => RecordBuilder<A & Record<K, B>>
  /** Shorthand for `.field(name, field(name, inner))`. */
  readonly key: <K extends string, B>(name: K, inner: Decoder<B>) => RecordBuilder<A & Record<K, B>>
  readonly finish: <R>(construct: (values: A) => R) => Decoder<R>
  readonly done: () => Decoder<A>
}

const makeBuilder = <A>(
  names: ReadonlyArray<string>,
  run: (value: Json) => Either.Either<A, DecodeError>
): RecordBuilder<A> => {
  const append = <K extends string, B>(name: K, decoder: Decoder<B>) =>
    makeBuilder([...names, name], (value) =>
      Either.flatMap(run(value), (values) =>
        Either.map(decoder.run(value), (decoded) => ({ ...values, ...singleton(name, decoded) }))))
  return {
    _tag: "RecordBuilder",
    names,
    field: append,
    key: (name, inner) => append(name, fieldOf(name, inner)),
    finish: (construct) => make((value) => Either.map(run(value), construct)),
    done: () => make(run)
  }
}

/**
 * Start an empty record declaration.
 *
 * @returns Builder accumulating `(name, decoder)` pairs.
 *
 * @pure true
 * @invariant an empty builder succeeds on any input with `{}`
 */
export const record = (): RecordBuilder<Record<never, never>> => makeBuilder([], () => Either.right({}))
