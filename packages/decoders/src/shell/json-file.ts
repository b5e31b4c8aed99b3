import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { Decoder } from "../core/decoder.js"
import type { AppError } from "../core/errors.js"
import { decodeFileError, fileError, parseFileError } from "../core/errors.js"
import type { Json } from "../core/json.js"

// CHANGE: read JSON documents from disk and run decoders on them
// WHY: isolate filesystem IO from the pure decoding engine
// SOURCE: n/a
// FORMAT THEOREM: ∀p, d: decodeFile(d, p) = Right(a) → decode(d, parse(read(p))) = Right(a)
// PURITY: SHELL
// EFFECT: Effect<A, AppError, FileSystem>
// INVARIANT: the parsed tree is validated against the Json shape and never copied
// COMPLEXITY: O(n)

export const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const JsonTextSchema = Schema.parseJson()

const isJson = Schema.is(JsonSchema)

/**
 * Parse JSON text and hand the tree over as parsed.
 *
 * The tree is checked against `JsonSchema` but never rebuilt, so own keys
 * such as `"__proto__"` reach decoders exactly as `JSON.parse` left them.
 *
 * @pure true
 * @invariant parseJsonText(f, t) agrees with JSON.parse(t) on every key
 */
export const parseJsonText = (file: string, raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonTextSchema)(raw),
    Effect.mapError((error) => parseFileError(file, TreeFormatter.formatErrorSync(error))),
    Effect.filterOrFail(isJson, () => parseFileError(file, "expected a JSON value"))
  )

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`read ${raw.length} characters from ${path}`))
    return yield* _(parseJsonText(path, raw))
  })

/**
 * Read a JSON file and decode it.
 *
 * @param decoder - Decoder to run on the parsed tree.
 * @param path - File to read.
 * @returns Effect with the decoded value; decode failures become DecodeFileError.
 *
 * @pure false
 * @effect FileSystem
 */
export const decodeFile = <A>(
  decoder: Decoder<A>,
  path: string
): Effect.Effect<A, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const json = yield* _(readJsonFile(path))
    const decoded = decoder.run(json)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(decodeFileError(path, decoded.left)))
    }
    return decoded.right
  })
