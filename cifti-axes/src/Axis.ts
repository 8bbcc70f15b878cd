// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { BrainModel } from "./BrainModel.js"
import { UnsupportedIndexError } from "./errors.js"
import type { Label } from "./Label.js"
import type { MatrixIndicesMap } from "./mapping.js"
import type { Parcels } from "./Parcels.js"
import type { Scalar } from "./Scalar.js"
import type { Series } from "./Series.js"
import type { SliceRange } from "./utils/slice.js"
import { normalizeIndex, sliceIndices } from "./utils/slice.js"

/**
 * Returned by `concat` when the two axes are of different kinds, so the
 * caller can fall back to another way of combining them.
 */
export const NOT_SUPPORTED: unique symbol = Symbol("cifti-axes.notSupported")
export type NotSupported = typeof NOT_SUPPORTED

/** Select a single row/column. Negative indices count from the end. */
export interface IndexSelector {
  readonly kind: "index"
  readonly index: number
}

/** Select a regular range of rows/columns. */
export interface RangeSelector extends Readonly<SliceRange> {
  readonly kind: "range"
}

/**
 * Select arbitrary rows/columns in the given order. Not available on
 * Series, whose result has to stay regularly spaced.
 */
export interface IndicesSelector {
  readonly kind: "indices"
  readonly indices: readonly number[]
}

/** Select a parcel by its name. Parcels only. */
export interface NameSelector {
  readonly kind: "name"
  readonly name: string
}

export type AxisSelector =
  | IndexSelector
  | RangeSelector
  | IndicesSelector
  | NameSelector

export function byIndex(index: number): IndexSelector {
  return { kind: "index", index }
}

/**
 * @example
 * ```typescript
 * axis.index(byRange()) // full copy
 * axis.index(byRange(undefined, undefined, -1)) // reversed
 * ```
 */
export function byRange(
  start?: number,
  stop?: number,
  step?: number,
): RangeSelector {
  return { kind: "range", start, stop, step }
}

export function byIndices(indices: readonly number[]): IndicesSelector {
  return { kind: "indices", indices }
}

export function byName(name: string): NameSelector {
  return { kind: "name", name }
}

/** Discriminant of the five axis variants. */
export type AxisKind = "brainModel" | "parcels" | "series" | "scalar" | "label"

/**
 * Contract shared by every description of the rows or columns of a CIFTI
 * matrix.
 *
 * @typeParam Self - The implementing axis type
 * @typeParam Element - Description of a single row/column
 * @typeParam Lookup - Result of a name lookup (Parcels only)
 */
export interface Axis<Self, Element, Lookup = never> {
  readonly kind: AxisKind
  /** Number of rows/columns described */
  readonly length: number
  /**
   * Whether `other` is the same kind of axis with the same content.
   * Never throws.
   */
  equals(other: unknown): boolean
  /**
   * Append `other` to this axis.
   *
   * @returns A new axis, or NOT_SUPPORTED when `other` is a different kind
   */
  concat(other: CiftiAxis): Self | NotSupported
  getElement(index: number): Element
  slice(start?: number, stop?: number, step?: number): Self
  index(selector: AxisSelector): Element | Self | Lookup
  /**
   * Describe this axis as a header matrix indices map.
   *
   * @param dim - Zero-based matrix dimension described by the axis
   */
  toMapping(dim: number): MatrixIndicesMap
}

/**
 * Any of the five axis variants.
 */
export type CiftiAxis = BrainModel | Parcels | Series | Scalar | Label

/**
 * Positions picked by a range or index-list selector on an array-backed
 * axis.
 */
export function selectedIndices(
  selector: RangeSelector | IndicesSelector,
  length: number,
): number[] {
  if (selector.kind === "range") return sliceIndices(selector, length)
  return selector.indices.map((i) => normalizeIndex(i, length))
}

export function unsupportedNameSelector(kind: AxisKind): UnsupportedIndexError {
  return new UnsupportedIndexError(
    `Can not index a ${kind} axis by name (only parcels can)`,
  )
}
