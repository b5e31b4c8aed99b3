import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decode, expectBool, expectInt, expectString } from "../../src/core/decoder.js"
import { field } from "../../src/core/field.js"
import { shiftElement, tuple, tupleOf } from "../../src/core/tuple.js"
import { leftOf, rightOf } from "./helpers.js"

const strict = tuple(
  tupleOf()
    .shift(expectInt)
    .shift(expectString)
    .shift(expectBool)
    .done()
)

const lenient = tuple(
  tupleOf()
    .shift(expectInt)
    .shift(expectString)
    .shift(expectBool)
    .dropRest()
    .done()
)

describe("tuple", () => {
  it.effect("decodes an exactly matching array", () =>
    Effect.sync(() => {
      expect(rightOf(decode(strict, [100, "hello", true]))).toEqual([100, "hello", true])
    }))

  it.effect("rejects leftover elements and reports them", () =>
    Effect.sync(() => {
      const input = [100, "hello", true, "extra value!"]
      const error = leftOf(decode(strict, input))
      expect(error._tag).toBe("UnparsedTrailingElements")
      expect(error.cause).toBe("array_as_tuple has unparsed elements")
      expect(error.frames).toEqual([{ depth: 0, value: input }])
      if (error._tag === "UnparsedTrailingElements") {
        expect(error.remaining).toEqual(["extra value!"])
      }
    }))

  it.effect("accepts leftover elements after dropRest", () =>
    Effect.sync(() => {
      expect(rightOf(decode(lenient, [100, "hello", true, "extra value!"]))).toEqual([100, "hello", true])
    }))

  it.effect("dropRest may appear anywhere in the declaration", () =>
    Effect.sync(() => {
      const decoder = tuple(tupleOf().dropRest().shift(expectInt).done())
      expect(rightOf(decode(decoder, [1, 2, 3]))).toEqual([1])
    }))

  it.effect("fails with ArrayExhausted at the index equal to the array length", () =>
    Effect.sync(() => {
      const input = [100, "hello"]
      const error = leftOf(decode(strict, input))
      expect(error._tag).toBe("ArrayExhausted")
      expect(error.cause).toBe("expected at least 3 elements, found 2")
      expect(error.frames).toEqual([{ depth: 0, index: 2, value: input }])
    }))

  it.effect("wraps element failures with the element's index", () =>
    Effect.sync(() => {
      const error = leftOf(decode(strict, [100, 5, true]))
      expect(error.cause).toBe("expected string, got 5")
      expect(error.frames).toEqual([
        { depth: 0, value: 5 },
        { depth: 1, index: 1, value: 5 }
      ])
    }))

  it.effect("stops at the first failing shift", () =>
    Effect.sync(() => {
      const error = leftOf(decode(strict, ["a", 5, "b"]))
      expect(error.cause).toBe(`expected int, got "a"`)
    }))

  it.effect("fails with NotAnArray outside arrays", () =>
    Effect.sync(() => {
      const error = leftOf(decode(strict, { 0: 100 }))
      expect(error._tag).toBe("NotAnArray")
      expect(error.cause).toBe("expected array")
    }))

  it.effect("passes shifted values to the constructor in order", () =>
    Effect.sync(() => {
      const point = tuple(
        tupleOf()
          .shift(expectInt)
          .shift(expectInt)
          .finish((x, y) => ({ x, y }))
      )
      expect(rightOf(decode(point, [3, 4]))).toEqual({ x: 3, y: 4 })
    }))

  it.effect("composes under field", () =>
    Effect.sync(() => {
      const input = { point: [3] }
      const decoder = field("point", tuple(tupleOf().shift(expectInt).shift(expectInt).done()))
      const error = leftOf(decode(decoder, input))
      expect(error.frames).toEqual([
        { depth: 0, index: 1, value: [3] },
        { depth: 1, key: "point", value: input }
      ])
    }))

  it.effect("an empty declaration accepts only the empty array", () =>
    Effect.sync(() => {
      const empty = tuple(tupleOf().done())
      expect(rightOf(decode(empty, []))).toEqual([])
      expect(leftOf(decode(empty, [1]))._tag).toBe("UnparsedTrailingElements")
    }))
})

describe("shiftElement", () => {
  it.effect("advances the cursor by one", () =>
    Effect.sync(() => {
      const step = rightOf(shiftElement({ elements: [1, 2], position: 0 }, expectInt))
      expect(step.value).toBe(1)
      expect(step.cursor.position).toBe(1)
    }))

  it.effect("never moves past the end", () =>
    Effect.sync(() => {
      const error = leftOf(shiftElement({ elements: [1, 2], position: 2 }, expectInt))
      expect(error._tag).toBe("ArrayExhausted")
    }))
})
