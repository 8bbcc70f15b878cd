// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Data shapes of the CIFTI-2 header elements read and written by the axes.
 *
 * These mirror the CIFTI-2 XML elements and attributes (in camelCase).
 * Serializing them to and from XML is left to a header reader/writer.
 */

import type { StructureName } from "./structures.js"
import type { Metadata, SeriesUnit, VoxelIndex } from "./types.js"

/** Tag declaring which kind of axis a matrix indices map describes. */
export type IndexType =
  | "CIFTI_INDEX_TYPE_BRAIN_MODELS"
  | "CIFTI_INDEX_TYPE_PARCELS"
  | "CIFTI_INDEX_TYPE_SERIES"
  | "CIFTI_INDEX_TYPE_SCALARS"
  | "CIFTI_INDEX_TYPE_LABELS"

export type ModelType = "CIFTI_MODEL_TYPE_SURFACE" | "CIFTI_MODEL_TYPE_VOXELS"

/**
 * Voxel-index to world transform. `matrix` holds 4 rows of 4 numbers in
 * units of 10^`meterExponent` metres.
 */
export interface TransformationMatrix {
  meterExponent: number
  matrix: number[][]
}

/**
 * The volume in which voxel indices are defined.
 */
export interface VolumeDescriptor {
  volumeDimensions: [number, number, number]
  transformationMatrixVoxelIndicesIJKtoXYZ: TransformationMatrix
}

/**
 * One contiguous block of a brain models map, covering a single structure.
 */
export interface BrainModelEntry {
  /** First row/column covered by this block */
  indexOffset: number
  /** Number of rows/columns covered by this block */
  indexCount: number
  modelType: ModelType
  brainStructure: StructureName
  /** Total number of vertices of the surface (surface blocks only) */
  surfaceNumberOfVertices?: number
  /** Voxel indices (voxel blocks only) */
  voxelIndicesIJK?: VoxelIndex[]
  /** Vertex indices (surface blocks only) */
  vertexIndices?: number[]
}

/** Vertex count of a surface referenced by parcels. */
export interface SurfaceEntry {
  brainStructure: StructureName
  surfaceNumberOfVertices: number
}

/** Vertices of a single surface structure belonging to a parcel. */
export interface VertexList {
  brainStructure: StructureName
  indices: number[]
}

export interface ParcelEntry {
  name: string
  voxelIndicesIJK: VoxelIndex[]
  vertices: VertexList[]
}

export interface LabelTableEntry {
  key: number
  label: string
  red: number
  green: number
  blue: number
  alpha: number
}

export interface NamedMap {
  mapName: string
  /** Omitted when the map carries no metadata */
  metadata?: Metadata
  /** Present on label maps only */
  labelTable?: LabelTableEntry[]
}

interface MatrixIndicesMapBase {
  /** Zero-based matrix dimensions described by this map */
  appliesToMatrixDimension: number[]
}

export interface BrainModelsMap extends MatrixIndicesMapBase {
  indicesMapToDataType: "CIFTI_INDEX_TYPE_BRAIN_MODELS"
  volume?: VolumeDescriptor
  brainModels: BrainModelEntry[]
}

export interface ParcelsMap extends MatrixIndicesMapBase {
  indicesMapToDataType: "CIFTI_INDEX_TYPE_PARCELS"
  volume?: VolumeDescriptor
  surfaces: SurfaceEntry[]
  parcels: ParcelEntry[]
}

export interface SeriesMap extends MatrixIndicesMapBase {
  indicesMapToDataType: "CIFTI_INDEX_TYPE_SERIES"
  seriesStart: number
  seriesStep: number
  /** Power of ten applied to start and step */
  seriesExponent: number
  seriesUnit: SeriesUnit
  numberOfSeriesPoints: number
}

export interface ScalarsMap extends MatrixIndicesMapBase {
  indicesMapToDataType: "CIFTI_INDEX_TYPE_SCALARS"
  namedMaps: NamedMap[]
}

export interface LabelsMap extends MatrixIndicesMapBase {
  indicesMapToDataType: "CIFTI_INDEX_TYPE_LABELS"
  namedMaps: NamedMap[]
}

/**
 * Header description of the rows or columns of a CIFTI matrix, tagged by
 * `indicesMapToDataType`.
 */
export type MatrixIndicesMap =
  | BrainModelsMap
  | ParcelsMap
  | SeriesMap
  | ScalarsMap
  | LabelsMap

export interface CiftiMatrix {
  metadata?: Metadata
  matrixIndicesMaps: MatrixIndicesMap[]
}

export interface CiftiHeader {
  version: "2"
  matrix: CiftiMatrix
}
