import type { Json } from "./json.js"

// CHANGE: record the traversal path of a failed decode as context frames
// WHY: a failure must say where in the tree it happened, not only what went wrong
// SOURCE: n/a
// FORMAT THEOREM: ∀e, f: prependFrame(e, f).frames = e.frames ++ [f'] ∧ f'.depth = max(depth(e)) + 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: frames are ordered innermost → outermost and depth grows by 1 per step outward
// COMPLEXITY: O(n)/O(n) where n = number of frames

export interface ContextFrame {
  readonly depth: number
  readonly key?: string
  readonly index?: number
  readonly value: Json
}

export type FrameAnnotation = {
  readonly key?: string
  readonly index?: number
}

export type Frames = readonly [ContextFrame, ...ReadonlyArray<ContextFrame>]

interface WithFrames {
  readonly frames: Frames
}

const annotate = (depth: number, value: Json, annotation: FrameAnnotation): ContextFrame => ({
  depth,
  value,
  ...(annotation.key === undefined ? {} : { key: annotation.key }),
  ...(annotation.index === undefined ? {} : { index: annotation.index })
})

/**
 * Build the frame at the failure site.
 *
 * @param value - JSON snapshot where the failure was detected.
 * @param annotation - Optional key or array index the frame points at.
 *
 * @pure true
 * @invariant result.depth = 0
 */
export const rootFrame = (value: Json, annotation: FrameAnnotation = {}): ContextFrame =>
  annotate(0, value, annotation)

export const maxDepth = (frames: Frames): number =>
  frames.reduce((max, frame) => (frame.depth > max ? frame.depth : max), 0)

/**
 * Attach an enclosing frame to an error on its outer end.
 *
 * The error is not touched; a new value with one extra frame is returned,
 * keeping every other property (tag, cause, payload) as it was.
 *
 * @param error - Error raised by an inner decoder.
 * @param value - JSON snapshot owned by the enclosing combinator.
 * @param annotation - Key or index under which the inner value was found.
 *
 * @pure true
 * @invariant result.frames.length = error.frames.length + 1
 * @complexity O(n)
 */
export const prependFrame = <E extends WithFrames>(
  error: E,
  value: Json,
  annotation: FrameAnnotation = {}
): E => {
  const frame = annotate(maxDepth(error.frames) + 1, value, annotation)
  const frames: Frames = [...error.frames, frame]
  return { ...error, frames }
}

export const innermostFrame = (frames: Frames): ContextFrame => frames[0]

export const outermostFrame = (frames: Frames): ContextFrame => frames[frames.length - 1] ?? frames[0]
