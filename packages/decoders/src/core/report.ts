import { Match } from "effect"

import type { ContextFrame } from "./context.js"
import type { DecodeError } from "./errors.js"
import type { Json } from "./json.js"
import { renderJson } from "./json.js"

// CHANGE: render decode errors for humans and for tooling
// WHY: the frame sequence and cause are the data; text is derived from them
// SOURCE: n/a
// FORMAT THEOREM: ∀e: lines(render(e)) lists e.frames innermost first, then e.cause
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the last line of the human rendering is the cause
// COMPLEXITY: O(n) where n = total snapshot size

export interface RenderOptions {
  /** Spaces per nesting level in snapshots; 0 prints compact JSON. */
  readonly indent: number
  /** Longest snapshot printed before it is cut with `...`. */
  readonly maxSnapshotLength: number | undefined
}

export const defaultRenderOptions: RenderOptions = {
  indent: 0,
  maxSnapshotLength: undefined
}

const renderSnapshot = (value: Json, options: RenderOptions): string => {
  const text = renderJson(value, options.indent)
  const limit = options.maxSnapshotLength
  return limit !== undefined && text.length > limit ? `${text.slice(0, limit)}...` : text
}

export const formatFrameHeader = (frame: ContextFrame): string => {
  const key = frame.key === undefined ? "" : ` at key [${frame.key}]`
  const index = frame.index === undefined ? "" : ` at index [${frame.index}]`
  return `json context [${frame.depth}]${key}${index}`
}

const formatDetails = (error: DecodeError, options: RenderOptions): ReadonlyArray<string> =>
  Match.value(error).pipe(
    Match.tag("UnparsedTrailingElements", (value) => [
      `unparsed elements: ${renderSnapshot(value.remaining, options)}`
    ]),
    Match.tag("NoAlternative", (value) =>
      value.errors.map((alternative, index) => `alternative ${index + 1}: ${alternative.cause}`)),
    Match.orElse(() => [])
  )

/**
 * Render a decode error as multi-line text.
 *
 * @param error - Structured decode error.
 * @param options - Snapshot rendering options.
 * @returns One header and one snapshot line per frame, innermost first,
 * then any payload lines, then the cause.
 *
 * @pure true
 * @invariant output ends with error.cause
 * @complexity O(n)
 */
export const formatDecodeError = (
  error: DecodeError,
  options: RenderOptions = defaultRenderOptions
): string => {
  const frameLines = error.frames.flatMap((frame) => [
    formatFrameHeader(frame),
    renderSnapshot(frame.value, options)
  ])
  return [...frameLines, ...formatDetails(error, options), error.cause].join("\n")
}

/**
 * Render a decode error as JSON text.
 *
 * @pure true
 * @invariant output parses back to an object with `tag`, `cause` and `frames`
 */
export const renderJsonError = (error: DecodeError): string =>
  JSON.stringify(
    {
      tag: error._tag,
      cause: error.cause,
      frames: error.frames,
      ...(error._tag === "UnparsedTrailingElements" ? { remaining: error.remaining } : {})
    },
    null,
    2
  )
