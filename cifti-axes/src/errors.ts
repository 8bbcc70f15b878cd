// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Identifies the kind of failure raised while building, combining or
 * indexing an axis.
 */
export type CiftiAxisErrorCode =
  | "ShapeMismatch" // array lengths disagree at construction
  | "UndefinedIndices" // surface element without vertex, or voxel element without voxel
  | "InvalidStructureName"
  | "InvalidMaskRank"
  | "IncompatibleGeometry" // affine / volume shape conflict
  | "InconsistentVertexCount"
  | "ParcelNotFound"
  | "AmbiguousParcelName"
  | "IndexOutOfRange"
  | "UnsupportedIndex"
  | "IncompatibleAxes" // series step or unit mismatch, or unsupported concatenation
  | "InvalidUnit"
  | "InvalidLabelColor"

/**
 * Base class for every error thrown by this package.
 *
 * All failures are local and synchronous: the input has to be fixed and
 * the whole operation retried.
 */
export class CiftiAxisError extends Error {
  readonly code: CiftiAxisErrorCode

  constructor(code: CiftiAxisErrorCode, message: string) {
    super(message)
    this.name = "CiftiAxisError"
    this.code = code
  }
}

/** Array-shaped inputs of an axis disagree in length or dimensionality. */
export class ShapeMismatchError extends CiftiAxisError {
  constructor(message: string) {
    super("ShapeMismatch", message)
    this.name = "ShapeMismatchError"
  }
}

/** Surface elements need a vertex index, volumetric elements a voxel index. */
export class UndefinedIndicesError extends CiftiAxisError {
  constructor(message: string) {
    super("UndefinedIndices", message)
    this.name = "UndefinedIndicesError"
  }
}

export class InvalidStructureNameError extends CiftiAxisError {
  /** The input that could not be resolved */
  readonly input: string

  constructor(input: string, proposed: string) {
    super(
      "InvalidStructureName",
      `${input} was interpreted as ${proposed}, which is not a valid CIFTI brain structure`,
    )
    this.name = "InvalidStructureNameError"
    this.input = input
  }
}

export class InvalidMaskRankError extends CiftiAxisError {
  constructor(rank: number) {
    super(
      "InvalidMaskRank",
      `Mask should be either 1-dimensional (for surfaces) or 3-dimensional (for volumes), not ${rank}-dimensional`,
    )
    this.name = "InvalidMaskRankError"
  }
}

/** Two axes or brain models were defined in different volumes. */
export class IncompatibleGeometryError extends CiftiAxisError {
  constructor(message: string) {
    super("IncompatibleGeometry", message)
    this.name = "IncompatibleGeometryError"
  }
}

export class InconsistentVertexCountError extends CiftiAxisError {
  constructor(message: string) {
    super("InconsistentVertexCount", message)
    this.name = "InconsistentVertexCountError"
  }
}

export class ParcelNotFoundError extends CiftiAxisError {
  constructor(name: string) {
    super("ParcelNotFound", `Parcel ${name} not found`)
    this.name = "ParcelNotFoundError"
  }
}

export class AmbiguousParcelNameError extends CiftiAxisError {
  constructor(name: string, count: number) {
    super("AmbiguousParcelName", `Found ${count} parcels with name ${name}`)
    this.name = "AmbiguousParcelNameError"
  }
}

export class IndexOutOfRangeError extends CiftiAxisError {
  constructor(index: number, length: number) {
    super(
      "IndexOutOfRange",
      `Index ${index} is out of range for axis with length ${length}`,
    )
    this.name = "IndexOutOfRangeError"
  }
}

export class UnsupportedIndexError extends CiftiAxisError {
  constructor(message: string) {
    super("UnsupportedIndex", message)
    this.name = "UnsupportedIndexError"
  }
}

export class IncompatibleAxesError extends CiftiAxisError {
  constructor(message: string) {
    super("IncompatibleAxes", message)
    this.name = "IncompatibleAxesError"
  }
}

export class InvalidUnitError extends CiftiAxisError {
  constructor(unit: string) {
    super(
      "InvalidUnit",
      `Series unit should be one of SECOND, HERTZ, METER or RADIAN, not ${unit}`,
    )
    this.name = "InvalidUnitError"
  }
}

export class InvalidLabelColorError extends CiftiAxisError {
  constructor(message: string) {
    super("InvalidLabelColor", message)
    this.name = "InvalidLabelColorError"
  }
}

/**
 * Check whether a thrown value is a {@link CiftiAxisError}, optionally of a
 * specific code.
 *
 * @example
 * ```typescript
 * try {
 *   parcels.index(byName("frontal"))
 * } catch (err) {
 *   if (isCiftiAxisError(err, "ParcelNotFound")) return undefined
 *   throw err
 * }
 * ```
 */
export function isCiftiAxisError(
  error: unknown,
  code?: CiftiAxisErrorCode,
): error is CiftiAxisError {
  return (
    error instanceof CiftiAxisError && (code === undefined || error.code === code)
  )
}
