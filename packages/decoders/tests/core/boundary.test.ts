import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { animalDecoder } from "../../src/app/shapes.js"
import { DecodeFault, decodeEffect, decodeOrThrow, decodeString } from "../../src/core/boundary.js"
import { expectInt } from "../../src/core/decoder.js"
import { leftOf, rightOf } from "./helpers.js"

describe("decodeString", () => {
  it.effect("parses then decodes", () =>
    Effect.sync(() => {
      const animal = rightOf(
        decodeString(animalDecoder, `{"weight":42.31,"age":2,"species":"Capybara","name":"John Smith"}`)
      )
      expect(animal.species).toBe("Capybara")
    }))

  it.effect("reports malformed text as JsonSyntaxError", () =>
    Effect.sync(() => {
      expect(leftOf(decodeString(expectInt, `{"age":`))._tag).toBe("JsonSyntaxError")
    }))
})

describe("decodeEffect", () => {
  it.effect("succeeds with the decoded value", () =>
    Effect.gen(function*(_) {
      const value = yield* _(decodeEffect(expectInt, 7))
      expect(value).toBe(7)
    }))

  it.effect("fails with the structured error", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(Effect.either(decodeEffect(expectInt, "7")))
      expect(Either.isLeft(outcome)).toBe(true)
      if (Either.isLeft(outcome)) {
        expect(outcome.left._tag).toBe("TypeMismatch")
        expect(outcome.left.frames).toEqual([{ depth: 0, value: "7" }])
      }
    }))
})

describe("decodeOrThrow", () => {
  it.effect("returns the value on success", () =>
    Effect.sync(() => {
      expect(decodeOrThrow(expectInt, 3)).toBe(3)
    }))

  it.effect("throws a DecodeFault carrying the error", () =>
    Effect.sync(() => {
      const thrown = Either.try({ try: () => decodeOrThrow(expectInt, null), catch: (error) => error })
      expect(Either.isLeft(thrown)).toBe(true)
      if (Either.isLeft(thrown)) {
        const fault = thrown.left
        expect(fault).toBeInstanceOf(DecodeFault)
        if (fault instanceof DecodeFault) {
          expect(fault._tag).toBe("DecodeFault")
          expect(fault.error.cause).toBe("expected int, got null")
          expect(fault.error.frames).toEqual([{ depth: 0, value: null }])
        }
      }
    }))
})
