import * as Either from "effect/Either"

import { prependFrame } from "./context.js"
import type { Decoder } from "./decoder.js"
import { make } from "./decoder.js"
import type { DecodeError } from "./errors.js"
import { arrayExhausted, notAnArray, unparsedTrailingElements } from "./errors.js"
import type { JsonArray } from "./json.js"
import { isJsonArray } from "./json.js"

// CHANGE: decode arrays positionally with a cursor, shift steps and a leftover policy
// WHY: heterogeneous arrays are tuples whose elements are consumed in order
// SOURCE: n/a
// FORMAT THEOREM: ∀t, xs: tuple(t)(xs) = Right(v) → position = |xs| ∨ t.dropsRest
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 0 ≤ cursor.position ≤ |elements| and position never decreases within one call
// COMPLEXITY: O(k) where k = number of shift steps

export interface ArrayCursor {
  readonly elements: JsonArray
  readonly position: number
}

export interface TupleStep<A> {
  readonly value: A
  readonly cursor: ArrayCursor
}

export interface TupleDecoder<A> {
  readonly _tag: "TupleDecoder"
  readonly dropsRest: boolean
  readonly run: (cursor: ArrayCursor) => Either.Either<TupleStep<A>, DecodeError>
}

export interface TupleBuilder<A extends ReadonlyArray<unknown>> {
  readonly _tag: "TupleBuilder"
  readonly shift: <B>(decoder: Decoder<B>) => TupleBuilder<readonly [...A, B]>
  readonly dropRest: () => TupleBuilder<A>
  readonly finish: <R>(construct: (...values: A) => R) => TupleDecoder<R>
  readonly done: () => TupleDecoder<A>
}

/**
 * Consume the element under the cursor.
 *
 * @pure true
 * @invariant on success the returned cursor is one position further
 */
export const shiftElement = <B>(
  cursor: ArrayCursor,
  decoder: Decoder<B>
): Either.Either<TupleStep<B>, DecodeError> => {
  const { elements, position } = cursor
  const element = elements[position]
  if (position >= elements.length || element === undefined) {
    return Either.left(arrayExhausted(position, elements))
  }
  return Either.match(decoder.run(element), {
    onLeft: (error) => Either.left(prependFrame(error, element, { index: position })),
    onRight: (value) => Either.right({ value, cursor: { elements, position: position + 1 } })
  })
}

const makeTupleBuilder = <A extends ReadonlyArray<unknown>>(
  dropsRest: boolean,
  run: (cursor: ArrayCursor) => Either.Either<TupleStep<A>, DecodeError>
): TupleBuilder<A> => ({
  _tag: "TupleBuilder",
  shift: <B>(decoder: Decoder<B>) =>
    makeTupleBuilder<readonly [...A, B]>(dropsRest, (cursor) =>
      Either.flatMap(run(cursor), (previous) =>
        Either.map(shiftElement(previous.cursor, decoder), (next) => ({
          value: [...previous.value, next.value] as const,
          cursor: next.cursor
        })))),
  dropRest: () => makeTupleBuilder(true, run),
  finish: (construct) => ({
    _tag: "TupleDecoder",
    dropsRest,
    run: (cursor) =>
      Either.map(run(cursor), (step) => ({ value: construct(...step.value), cursor: step.cursor }))
  }),
  done: () => ({ _tag: "TupleDecoder", dropsRest, run })
})

/**
 * Start an empty positional declaration.
 *
 * @returns Builder whose `shift` steps run in declaration order on one cursor.
 *
 * @pure true
 */
export const tupleOf = (): TupleBuilder<readonly []> =>
  makeTupleBuilder(false, (cursor) => Either.right({ value: [] as const, cursor }))

/**
 * Decode an array by running a positional declaration over a fresh cursor.
 *
 * @param inner - Tuple declaration built with `tupleOf`.
 * @returns Decoder failing with NotAnArray, the first shift failure, or
 * UnparsedTrailingElements when elements remain and `dropRest` was not declared.
 *
 * @pure true
 * @invariant the cursor never escapes this call
 * @complexity O(k)
 */
export const tuple = <A>(inner: TupleDecoder<A>): Decoder<A> =>
  make((value) => {
    if (!isJsonArray(value)) {
      return Either.left(notAnArray(value))
    }
    return Either.flatMap(inner.run({ elements: value, position: 0 }), (step) =>
      !inner.dropsRest && step.cursor.position < value.length
        ? Either.left(unparsedTrailingElements(value, step.cursor.position))
        : Either.right(step.value))
  })
