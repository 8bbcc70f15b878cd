// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * cifti-axes
 *
 * Typed descriptions of the rows and columns of CIFTI-2 matrices.
 *
 * @example
 * ```typescript
 * import { BrainModel, Series, byName, toHeader } from "cifti-axes";
 *
 * const cortex = BrainModel.fromSurface([0, 1, 2, 5], 32492, {
 *   name: "CortexLeft",
 * });
 * const time = new Series(0, 0.72, 1200);
 *
 * // One axis per matrix dimension (a dtseries: time x brain models)
 * const header = toHeader([time, cortex]);
 *
 * for (const { name, start, stop } of cortex.iterStructures()) {
 *   console.log(name, start, stop);
 * }
 * ```
 */

// Axes
export { BrainModel } from "./BrainModel.js"
export { Parcels } from "./Parcels.js"
export { Series, parseSeriesUnit } from "./Series.js"
export { Scalar } from "./Scalar.js"
export { Label, createLabelTable } from "./Label.js"

export type {
  BrainModelOptions,
  BrainModelElement,
  FromSurfaceOptions,
  FromMaskOptions,
  StructureRun,
} from "./BrainModel.js"
export type {
  ParcelsOptions,
  ParcelElement,
  ParcelContents,
  ParcelVertices,
  ParcelVerticesInput,
} from "./Parcels.js"
export type { ScalarElement } from "./Scalar.js"
export type { LabelElement } from "./Label.js"

// Selectors and the shared axis contract
export {
  NOT_SUPPORTED,
  byIndex,
  byRange,
  byIndices,
  byName,
} from "./Axis.js"
export type {
  Axis,
  AxisKind,
  AxisSelector,
  CiftiAxis,
  IndexSelector,
  RangeSelector,
  IndicesSelector,
  NameSelector,
  NotSupported,
} from "./Axis.js"

// Header conversion
export { fromMapping, toHeader, axesFromHeader, concatAxes } from "./header.js"
export type {
  IndexType,
  ModelType,
  TransformationMatrix,
  VolumeDescriptor,
  BrainModelEntry,
  SurfaceEntry,
  VertexList,
  ParcelEntry,
  LabelTableEntry,
  NamedMap,
  BrainModelsMap,
  ParcelsMap,
  SeriesMap,
  ScalarsMap,
  LabelsMap,
  MatrixIndicesMap,
  CiftiMatrix,
  CiftiHeader,
} from "./mapping.js"

// Brain structures
export {
  CIFTI_BRAIN_STRUCTURES,
  DEFAULT_STRUCTURE_CACHE_SIZE,
  StructureNameResolver,
  canonicalizeStructureName,
  isStructureName,
} from "./structures.js"
export type {
  StructureName,
  StructureNameInput,
  StructureNameResolverOptions,
  Orientation,
} from "./structures.js"

// Affine utilities
export {
  AFFINE_TOLERANCE,
  MILLIMETRE_EXPONENT,
  createAffine,
  identityAffine,
  affineToRows,
  affinesClose,
} from "./utils/affine.js"
export type { SliceRange } from "./utils/slice.js"

// Types
export type {
  VoxelIndex,
  VolumeShape,
  Affine,
  AffineInput,
  Rgba,
  LabelEntry,
  LabelTable,
  LabelTableInput,
  Metadata,
  SeriesUnit,
  VertexCounts,
  VertexCountsInput,
  NdMask,
} from "./types.js"

// Errors
export {
  CiftiAxisError,
  ShapeMismatchError,
  UndefinedIndicesError,
  InvalidStructureNameError,
  InvalidMaskRankError,
  IncompatibleGeometryError,
  InconsistentVertexCountError,
  ParcelNotFoundError,
  AmbiguousParcelNameError,
  IndexOutOfRangeError,
  UnsupportedIndexError,
  IncompatibleAxesError,
  InvalidUnitError,
  InvalidLabelColorError,
  isCiftiAxisError,
} from "./errors.js"
export type { CiftiAxisErrorCode } from "./errors.js"
