// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { StructureName } from "./structures.js"

/**
 * Voxel indices [i, j, k] into the volume in which greyordinate voxels
 * are defined. Surface elements carry the sentinel [-1, -1, -1].
 */
export type VoxelIndex = readonly [number, number, number]

/**
 * Shape [nx, ny, nz] of the volume in which the voxels are defined.
 */
export type VolumeShape = readonly [number, number, number]

/**
 * A 4x4 voxel-index to millimetre transform.
 *
 * Stored column-major as a flat 16-element array, matching the gl-matrix
 * `mat4` layout. Use {@link affineToRows} to read it back as rows.
 */
export type Affine = Float64Array

/**
 * Accepted affine inputs: either 4 rows of 4 numbers (row-major, as the
 * header stores it) or a flat 16-element column-major array such as a
 * gl-matrix `mat4`.
 */
export type AffineInput = ArrayLike<number> | ReadonlyArray<ArrayLike<number>>

/** Red, green, blue and alpha, each in [0, 1]. */
export type Rgba = readonly [number, number, number, number]

/**
 * One entry of a label lookup table.
 */
export interface LabelEntry {
  /** Name of the label */
  readonly label: string
  /** Display colour and transparency */
  readonly rgba: Rgba
}

/**
 * Lookup table of a single label map: integer value to label name and
 * colour.
 */
export type LabelTable = ReadonlyMap<number, LabelEntry>

/**
 * Accepted label table inputs. Plain objects are keyed by the string form
 * of the integer value.
 */
export type LabelTableInput =
  | ReadonlyMap<number, LabelEntry>
  | Readonly<Record<number, LabelEntry>>

/** Free-form key/value metadata attached to a named map. */
export type Metadata = Readonly<Record<string, string>>

/** Units a series axis can be expressed in. */
export type SeriesUnit = "SECOND" | "HERTZ" | "METER" | "RADIAN"

/**
 * Total number of vertices for each surface structure.
 */
export type VertexCounts = ReadonlyMap<StructureName, number>

/**
 * Accepted vertex count inputs; keys are canonicalized on construction.
 */
export type VertexCountsInput =
  | ReadonlyMap<string, number>
  | Readonly<Record<string, number>>

/**
 * A mask over a surface (rank 1) or volume (rank 3), stored in C order
 * (last index varies fastest).
 */
export interface NdMask {
  /** Flattened mask values; non-zero / true entries are included */
  data: ArrayLike<number | boolean>
  /** Dimensions of the mask */
  shape: readonly number[]
}
