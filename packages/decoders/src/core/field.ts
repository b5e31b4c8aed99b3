import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { prependFrame } from "./context.js"
import type { Decoder } from "./decoder.js"
import { make } from "./decoder.js"
import { missingKey, notAnObject } from "./errors.js"
import { isJsonObject, lookupKey } from "./json.js"

// CHANGE: look up object keys and attach the key frame to inner failures
// WHY: object traversal is where most context frames come from
// SOURCE: n/a
// FORMAT THEOREM: ∀k, d, o: field(k, d)(o) = Left(e) ∧ k ∈ o → last(e.frames) = { key: k, value: o }
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: inner frames keep their order; the key frame goes on the outer end
// COMPLEXITY: O(1) lookup + cost of inner

/**
 * Decode the value stored under `key` of the current object.
 *
 * @param key - Object key to look up.
 * @param inner - Decoder for the value under the key.
 * @returns Decoder failing with NotAnObject, MissingKey or the wrapped inner error.
 *
 * @pure true
 * @invariant a MissingKey error has exactly one frame, annotated with `key`
 * @complexity O(1) + inner
 */
export const field = <A>(key: string, inner: Decoder<A>): Decoder<A> =>
  make((value) => {
    if (!isJsonObject(value)) {
      return Either.left(notAnObject(value))
    }
    const entry = lookupKey(value, key)
    if (entry === undefined) {
      return Either.left(missingKey(key, value))
    }
    return Either.mapLeft(inner.run(entry), (error) => prependFrame(error, value, { key }))
  })

/**
 * Like `field`, but an absent key or an explicit `null` decodes to `None`.
 *
 * @pure true
 */
export const optionalField = <A>(key: string, inner: Decoder<A>): Decoder<Option.Option<A>> =>
  make((value) => {
    if (!isJsonObject(value)) {
      return Either.left(notAnObject(value))
    }
    const entry = lookupKey(value, key)
    if (entry === undefined || entry === null) {
      return Either.right(Option.none())
    }
    return Either.match(inner.run(entry), {
      onLeft: (error) => Either.left(prependFrame(error, value, { key })),
      onRight: (decoded) => Either.right(Option.some(decoded))
    })
  })

export const at = <A>(path: ReadonlyArray<string>, inner: Decoder<A>): Decoder<A> =>
  path.reduceRight((decoder, key) => field(key, decoder), inner)
