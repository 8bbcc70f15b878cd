// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import {
  IncompatibleGeometryError,
  InconsistentVertexCountError,
  ShapeMismatchError,
} from "../errors.js"
import type { VolumeDescriptor } from "../mapping.js"
import type { StructureName } from "../structures.js"
import { canonicalizeStructureName } from "../structures.js"
import type {
  Affine,
  AffineInput,
  VertexCounts,
  VertexCountsInput,
  VolumeShape,
} from "../types.js"
import {
  affinesClose,
  affinesEqual,
  affineToMillimetres,
  affineToRows,
  createAffine,
  createVolumeShape,
  MILLIMETRE_EXPONENT,
  volumeShapesEqual,
} from "./affine.js"

/**
 * The volume in which the voxels of an axis are defined.
 */
export interface VolumeGeometry {
  readonly affine: Affine
  readonly volumeShape: VolumeShape
}

/**
 * Validate the affine and volume shape of an axis.
 *
 * @param required - Whether the axis has volumetric elements. Geometry of
 *   an axis without any is dropped.
 * @throws IncompatibleGeometryError if geometry is required but the affine
 *   or volume shape is missing
 * @throws ShapeMismatchError if the affine is not 4x4 or the shape not 3
 *   non-negative integers
 */
export function createGeometry(
  affine: AffineInput | undefined,
  volumeShape: ArrayLike<number> | undefined,
  required: boolean,
): VolumeGeometry | undefined {
  if (!required) return undefined
  if (affine === undefined || volumeShape === undefined) {
    throw new IncompatibleGeometryError(
      "Volumetric elements require both an affine and a volume shape",
    )
  }
  return Object.freeze({
    affine: createAffine(affine),
    volumeShape: createVolumeShape(volumeShape),
  })
}

/**
 * Combine the geometry of two axes or brain models.
 *
 * @param what - Description of the combined objects used in errors
 * @throws IncompatibleGeometryError if both carry a volume and the affines
 *   or shapes differ
 */
export function mergeGeometry(
  a: VolumeGeometry | undefined,
  b: VolumeGeometry | undefined,
  what: string,
): VolumeGeometry | undefined {
  if (a === undefined) return b
  if (
    b !== undefined &&
    (!affinesEqual(a.affine, b.affine) ||
      !volumeShapesEqual(a.volumeShape, b.volumeShape))
  ) {
    throw new IncompatibleGeometryError(
      `Trying to combine ${what} defined in a different brain volume`,
    )
  }
  return a
}

/**
 * Equality of geometry as used by `equals`: affines within tolerance and
 * identical shapes, or both absent.
 */
export function geometriesClose(
  a: VolumeGeometry | undefined,
  b: VolumeGeometry | undefined,
): boolean {
  if (a === undefined || b === undefined) return a === b
  return (
    affinesClose(a.affine, b.affine) &&
    volumeShapesEqual(a.volumeShape, b.volumeShape)
  )
}

function isCountMap(
  input: VertexCountsInput,
): input is ReadonlyMap<string, number> {
  return input instanceof Map
}

/**
 * Copy vertex counts, canonicalizing structure names and keeping only the
 * structures in `keep`.
 *
 * @throws ShapeMismatchError if a count is not a non-negative integer
 */
export function copyVertexCounts(
  input: VertexCountsInput | undefined,
  keep: ReadonlySet<StructureName>,
): Map<StructureName, number> {
  const entries: [string, number][] =
    input === undefined
      ? []
      : isCountMap(input)
        ? [...input.entries()]
        : Object.entries(input)
  const counts = new Map<StructureName, number>()
  for (const [key, count] of entries) {
    if (!Number.isInteger(count) || count < 0) {
      throw new ShapeMismatchError(
        `Number of vertices of ${key} should be a non-negative integer, not ${count}`,
      )
    }
    const name = canonicalizeStructureName(key)
    if (keep.has(name)) counts.set(name, count)
  }
  return counts
}

/**
 * Record the vertex count of a surface structure.
 *
 * @throws InconsistentVertexCountError if a different count was recorded
 *   before
 */
export function addVertexCount(
  counts: Map<StructureName, number>,
  name: StructureName,
  count: number,
  what: string,
): void {
  const previous = counts.get(name)
  if (previous !== undefined && previous !== count) {
    throw new InconsistentVertexCountError(
      `Trying to combine ${what} with inconsistent number of vertices for ${name} (${previous} and ${count})`,
    )
  }
  counts.set(name, count)
}

/**
 * Union of two vertex count maps.
 *
 * @throws InconsistentVertexCountError if a structure has two counts
 */
export function mergeVertexCounts(
  a: VertexCounts,
  b: VertexCounts,
  what: string,
): Map<StructureName, number> {
  const merged = new Map(a)
  for (const [name, count] of b) addVertexCount(merged, name, count, what)
  return merged
}

/**
 * Read the volume element of a header, rescaling the transform to
 * millimetres.
 */
export function readVolume(volume: VolumeDescriptor): VolumeGeometry {
  const transform = volume.transformationMatrixVoxelIndicesIJKtoXYZ
  const affine = createAffine(transform.matrix)
  if (transform.meterExponent !== MILLIMETRE_EXPONENT) {
    console.warn(
      `[cifti-axes] Rescaling voxel-to-world transform from 10^${transform.meterExponent} m to millimetres`,
    )
  }
  return Object.freeze({
    affine: affineToMillimetres(affine, transform.meterExponent),
    volumeShape: createVolumeShape(volume.volumeDimensions),
  })
}

/**
 * Write geometry as a header volume element, in millimetres.
 */
export function writeVolume(geometry: VolumeGeometry): VolumeDescriptor {
  const [nx, ny, nz] = geometry.volumeShape
  return {
    volumeDimensions: [nx, ny, nz],
    transformationMatrixVoxelIndicesIJKtoXYZ: {
      meterExponent: MILLIMETRE_EXPONENT,
      matrix: affineToRows(geometry.affine),
    },
  }
}
