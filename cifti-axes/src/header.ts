// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Conversion between axes and the matrix indices maps of a CIFTI-2
 * header.
 */

import type { CiftiAxis } from "./Axis.js"
import { NOT_SUPPORTED } from "./Axis.js"
import { BrainModel } from "./BrainModel.js"
import { IncompatibleAxesError, ShapeMismatchError } from "./errors.js"
import { Label } from "./Label.js"
import type { CiftiHeader, MatrixIndicesMap } from "./mapping.js"
import { Parcels } from "./Parcels.js"
import { Scalar } from "./Scalar.js"
import { Series } from "./Series.js"

/**
 * Create the axis described by a matrix indices map.
 */
export function fromMapping(mim: MatrixIndicesMap): CiftiAxis {
  switch (mim.indicesMapToDataType) {
    case "CIFTI_INDEX_TYPE_BRAIN_MODELS":
      return BrainModel.fromMapping(mim)
    case "CIFTI_INDEX_TYPE_PARCELS":
      return Parcels.fromMapping(mim)
    case "CIFTI_INDEX_TYPE_SERIES":
      return Series.fromMapping(mim)
    case "CIFTI_INDEX_TYPE_SCALARS":
      return Scalar.fromMapping(mim)
    case "CIFTI_INDEX_TYPE_LABELS":
      return Label.fromMapping(mim)
  }
}

/**
 * Build a header from one axis per matrix dimension.
 *
 * The same axis object passed for several dimensions is written as a
 * single matrix indices map applying to all of them. Axes that are equal
 * but distinct objects get separate maps.
 */
export function toHeader(axes: Iterable<CiftiAxis>): CiftiHeader {
  const maps = new Map<CiftiAxis, MatrixIndicesMap>()
  let dim = 0
  for (const axis of axes) {
    const existing = maps.get(axis)
    if (existing) {
      existing.appliesToMatrixDimension.push(dim)
    } else {
      maps.set(axis, axis.toMapping(dim))
    }
    dim++
  }
  return { version: "2", matrix: { matrixIndicesMaps: [...maps.values()] } }
}

/**
 * Create one axis per matrix dimension from a header.
 *
 * Dimensions that share a matrix indices map share the same axis object.
 *
 * @throws ShapeMismatchError if a dimension is described by no map or by
 *   several maps
 */
export function axesFromHeader(header: CiftiHeader): CiftiAxis[] {
  const byDim = new Map<number, CiftiAxis>()
  for (const mim of header.matrix.matrixIndicesMaps) {
    const axis = fromMapping(mim)
    for (const dim of mim.appliesToMatrixDimension) {
      if (byDim.has(dim)) {
        throw new ShapeMismatchError(
          `Matrix dimension ${dim} is described by more than one matrix indices map`,
        )
      }
      byDim.set(dim, axis)
    }
  }
  const axes: CiftiAxis[] = []
  for (let dim = 0; dim < byDim.size; dim++) {
    const axis = byDim.get(dim)
    if (axis === undefined) {
      throw new ShapeMismatchError(
        `Matrix dimension ${dim} is not described by any matrix indices map`,
      )
    }
    axes.push(axis)
  }
  return axes
}

/**
 * Concatenate axes of the same kind, in order.
 *
 * @throws IncompatibleAxesError if the kinds of the axes differ
 */
export function concatAxes(first: CiftiAxis, ...rest: CiftiAxis[]): CiftiAxis {
  let result = first
  for (const axis of rest) {
    const combined = result.concat(axis)
    if (combined === NOT_SUPPORTED) {
      throw new IncompatibleAxesError(
        `Cannot concatenate ${result.kind} axis with ${axis.kind} axis`,
      )
    }
    result = combined
  }
  return result
}
