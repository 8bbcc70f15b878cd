// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { mat4 } from "gl-matrix"

import { ShapeMismatchError } from "../errors.js"
import type { Affine, AffineInput, VolumeShape } from "../types.js"

/**
 * Largest absolute element difference for two affines to compare equal.
 */
export const AFFINE_TOLERANCE = 1e-8

/**
 * Unit of the header's voxel-to-world transform: 10^-3 metre.
 */
export const MILLIMETRE_EXPONENT = -3

function isRowMatrix(
  input: AffineInput,
): input is ReadonlyArray<ArrayLike<number>> {
  return Array.isArray(input) && input.length > 0 && typeof input[0] !== "number"
}

/**
 * Create an affine from either 4 rows (row-major, the header layout) or a
 * flat column-major array (gl-matrix `mat4` layout).
 *
 * The result is always a fresh Float64Array so the caller's input is never
 * aliased.
 *
 * @param input - The 4x4 transform
 * @returns Column-major 4x4 affine
 * @throws ShapeMismatchError if the input is not 4x4
 */
export function createAffine(input: AffineInput): Affine {
  const affine = new Float64Array(16)
  if (isRowMatrix(input)) {
    if (input.length !== 4 || input.some((row) => row.length !== 4)) {
      throw new ShapeMismatchError(
        "Affine transformation should be a 4x4 array",
      )
    }
    // Rows laid out flat are the transpose of the column-major layout
    const rowMajor = new Float64Array(16)
    input.forEach((row, r) => rowMajor.set(Array.from(row), r * 4))
    mat4.transpose(affine, rowMajor)
  } else {
    if (input.length !== 16) {
      throw new ShapeMismatchError(
        `Affine transformation should have 16 elements, not ${input.length}`,
      )
    }
    affine.set(Array.from(input))
  }
  return affine
}

/**
 * Identity voxel-to-world transform.
 */
export function identityAffine(): Affine {
  const affine = new Float64Array(16)
  mat4.identity(affine)
  return affine
}

/**
 * Convert an affine to the 4 rows written in a header.
 *
 * @param affine - Column-major 4x4 affine
 * @returns Row-major 4x4 nested array
 */
export function affineToRows(affine: Affine): number[][] {
  const rows: number[][] = []
  for (let r = 0; r < 4; r++) {
    rows.push([affine[r], affine[4 + r], affine[8 + r], affine[12 + r]])
  }
  return rows
}

/**
 * Rescale a transform expressed in 10^`meterExponent` metres to
 * millimetres.
 *
 * Only the first three rows carry lengths; the homogeneous row is kept.
 *
 * @param affine - Column-major 4x4 affine
 * @param meterExponent - Power of ten of the transform's unit in metres
 * @returns New affine in millimetres
 */
export function affineToMillimetres(
  affine: Affine,
  meterExponent: number,
): Affine {
  if (meterExponent === MILLIMETRE_EXPONENT) return createAffine(affine)
  const factor = 10 ** (meterExponent - MILLIMETRE_EXPONENT)
  const scaling = new Float64Array(16)
  mat4.fromScaling(scaling, [factor, factor, factor])
  const scaled = new Float64Array(16)
  mat4.multiply(scaled, scaling, affine)
  return scaled
}

/**
 * Whether two affines agree within {@link AFFINE_TOLERANCE}.
 */
export function affinesClose(
  a: Affine,
  b: Affine,
  tolerance: number = AFFINE_TOLERANCE,
): boolean {
  for (let i = 0; i < 16; i++) {
    if (!(Math.abs(a[i] - b[i]) < tolerance)) return false
  }
  return true
}

/**
 * Whether two affines are element-wise identical.
 */
export function affinesEqual(a: Affine, b: Affine): boolean {
  for (let i = 0; i < 16; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Validate and copy a volume shape.
 *
 * @throws ShapeMismatchError unless the shape holds three non-negative
 *   integers
 */
export function createVolumeShape(input: ArrayLike<number>): VolumeShape {
  if (input.length !== 3) {
    throw new ShapeMismatchError(
      `Volume shape should have 3 elements, not ${input.length}`,
    )
  }
  const shape = Array.from(input)
  if (!shape.every((v) => Number.isInteger(v) && v >= 0)) {
    throw new ShapeMismatchError(
      `All elements of the volume shape should be non-negative integers, got [${shape.join(", ")}]`,
    )
  }
  return Object.freeze([shape[0], shape[1], shape[2]] as const)
}

/**
 * Whether two volume shapes are identical.
 */
export function volumeShapesEqual(a: VolumeShape, b: VolumeShape): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2]
}
