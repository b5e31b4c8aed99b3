import * as Either from "effect/Either"

export const rightOf = <A, E>(either: Either.Either<A, E>): A =>
  Either.getOrThrowWith(either, (error) => new Error(`expected Right, got Left: ${JSON.stringify(error)}`))

export const leftOf = <A, E>(either: Either.Either<A, E>): E =>
  Either.getOrThrowWith(Either.flip(either), (value) => new Error(`expected Left, got Right: ${JSON.stringify(value)}`))
