import {
  array,
  type Decoder,
  expectBool,
  expectInt,
  expectNumber,
  expectString,
  fromThrowing,
  thenConvert
} from "../core/decoder.js"
import { record } from "../core/record.js"
import { tuple, tupleOf } from "../core/tuple.js"

// CHANGE: bundle example shapes for the json-decode command
// WHY: the command needs concrete decoders to run against user files
// SOURCE: n/a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: shape names are unique
// COMPLEXITY: O(1)/O(1)

export type Species = "Capybara" | "Dog" | "Cat"

export interface Animal {
  readonly weight: number
  readonly age: number
  readonly species: Species
  readonly name: string
}

export interface Reading {
  readonly id: number
  readonly label: string
  readonly active: boolean
}

const speciesNames: ReadonlyArray<Species> = ["Capybara", "Dog", "Cat"]

/** Throws on names outside the known species. */
export const parseSpecies = (raw: string): Species => {
  const species = speciesNames.find((name) => name === raw)
  if (species === undefined) {
    throw new Error(`unknown species: ${raw}`)
  }
  return species
}

export const speciesDecoder: Decoder<Species> = thenConvert(expectString, fromThrowing(parseSpecies))

export const animalDecoder: Decoder<Animal> = record()
  .key("weight", expectNumber)
  .key("age", expectInt)
  .key("species", speciesDecoder)
  .key("name", expectString)
  .finish(({ age, name, species, weight }) => ({ weight, age, species, name }))

export const readingDecoder: Decoder<Reading> = tuple(
  tupleOf()
    .shift(expectInt)
    .shift(expectString)
    .shift(expectBool)
    .finish((id, label, active) => ({ id, label, active }))
)

export const shapes: Readonly<Record<string, Decoder<unknown>>> = {
  animal: animalDecoder,
  animals: array(animalDecoder),
  reading: readingDecoder,
  readings: array(readingDecoder)
}

export const shapeNames = (): ReadonlyArray<string> => Object.keys(shapes)
