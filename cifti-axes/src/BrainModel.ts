// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type {
  Axis,
  AxisSelector,
  CiftiAxis,
  IndexSelector,
  IndicesSelector,
  NotSupported,
  RangeSelector,
} from "./Axis.js"
import {
  NOT_SUPPORTED,
  selectedIndices,
  unsupportedNameSelector,
} from "./Axis.js"
import {
  IncompatibleGeometryError,
  InconsistentVertexCountError,
  InvalidMaskRankError,
  ShapeMismatchError,
  UndefinedIndicesError,
} from "./errors.js"
import type { BrainModelEntry, BrainModelsMap } from "./mapping.js"
import type { StructureName, StructureNameInput } from "./structures.js"
import { canonicalizeStructureName } from "./structures.js"
import type {
  Affine,
  AffineInput,
  NdMask,
  VertexCounts,
  VertexCountsInput,
  VolumeShape,
  VoxelIndex,
} from "./types.js"
import { createAffine, identityAffine } from "./utils/affine.js"
import {
  arraysEqual,
  mapsEqual,
  voxelsEqual,
} from "./utils/equality.js"
import type { VolumeGeometry } from "./utils/geometry.js"
import {
  addVertexCount,
  copyVertexCounts,
  createGeometry,
  geometriesClose,
  mergeGeometry,
  mergeVertexCounts,
  readVolume,
  writeVolume,
} from "./utils/geometry.js"
import { normalizeIndex, sliceIndices, take } from "./utils/slice.js"

const SURFACE_VOXEL: VoxelIndex = Object.freeze([-1, -1, -1] as const)

/**
 * Options for creating a BrainModel axis.
 */
export interface BrainModelOptions {
  /**
   * Brain structure of each element, or a single structure shared by all
   * elements. Free-form names are canonicalized.
   */
  name: string | readonly StructureNameInput[]
  /**
   * Voxel indices of each element (default: [-1, -1, -1] for every
   * element). Can be omitted for axes covering only the surface.
   */
  voxel?: readonly ArrayLike<number>[]
  /**
   * Vertex index of each element (default: -1 for every element). Can be
   * omitted for purely volumetric axes.
   */
  vertex?: ArrayLike<number>
  /** Voxel-to-millimetre transform, required when any element is a voxel */
  affine?: AffineInput
  /** Shape of the volume, required when any element is a voxel */
  volumeShape?: ArrayLike<number>
  /**
   * Total number of vertices of each surface structure. Elements whose
   * structure appears here are surface elements; all others are voxels.
   */
  nvertices?: VertexCountsInput
}

/**
 * Options for {@link BrainModel.fromSurface}.
 */
export interface FromSurfaceOptions {
  /** Name of the surface structure (default: "Cortex") */
  name?: StructureNameInput
}

/**
 * Options for {@link BrainModel.fromMask}.
 */
export interface FromMaskOptions {
  /** Name of the brain structure (default: "other") */
  name?: StructureNameInput
  /**
   * Voxel-to-millimetre transform of a volume mask (default: identity).
   * Ignored for surface masks.
   */
  affine?: AffineInput
}

/**
 * Description of a single row/column of a BrainModel axis.
 */
export type BrainModelElement =
  | { isSurface: true; vertex: number; name: StructureName }
  | { isSurface: false; voxel: VoxelIndex; name: StructureName }

/**
 * A maximal run of consecutive elements sharing one brain structure.
 */
export interface StructureRun {
  name: StructureName
  /** First element of the run */
  start: number
  /** One past the last element of the run */
  stop: number
  /** Sub-axis covering the run */
  axis: BrainModel
}

function copyVoxels(
  voxel: readonly ArrayLike<number>[] | undefined,
  size: number,
): readonly VoxelIndex[] {
  if (voxel === undefined) {
    return Object.freeze(new Array<VoxelIndex>(size).fill(SURFACE_VOXEL))
  }
  return Object.freeze(
    voxel.map((v, i): VoxelIndex => {
      if (v.length !== 3) {
        throw new ShapeMismatchError(
          `Voxel index of element ${i} should have 3 components, not ${v.length}`,
        )
      }
      const ijk = [v[0], v[1], v[2]] as const
      if (!ijk.every(Number.isInteger)) {
        throw new ShapeMismatchError(
          `Voxel index of element ${i} should hold integers, got [${ijk.join(", ")}]`,
        )
      }
      return Object.freeze(ijk)
    }),
  )
}

function copyVertices(
  vertex: ArrayLike<number> | undefined,
  size: number,
): readonly number[] {
  if (vertex === undefined) return Object.freeze(new Array<number>(size).fill(-1))
  if (vertex.length !== size) {
    throw new ShapeMismatchError(
      `Input vertex has incorrect length (${vertex.length}) for BrainModel axis with ${size} elements`,
    )
  }
  const vertices = Array.from(vertex)
  if (!vertices.every(Number.isInteger)) {
    throw new ShapeMismatchError("Vertex indices should be integers")
  }
  return Object.freeze(vertices)
}

function copyNames(
  name: string | readonly StructureNameInput[],
  size: number,
): readonly StructureName[] {
  if (typeof name === "string") {
    return Object.freeze(
      new Array<StructureName>(size).fill(canonicalizeStructureName(name)),
    )
  }
  if (name.length !== size) {
    throw new ShapeMismatchError(
      `Input name has incorrect length (${name.length}) for BrainModel axis with ${size} elements`,
    )
  }
  return Object.freeze(name.map(canonicalizeStructureName))
}

function isNdMask(mask: ArrayLike<number | boolean> | NdMask): mask is NdMask {
  return "shape" in mask && "data" in mask
}

function isNonZero(value: number | boolean): boolean {
  return value !== 0 && value !== false
}

/**
 * Each row/column represents a single surface vertex or volume voxel (a
 * greyordinate).
 *
 * Elements are surface vertices when their structure has an entry in
 * `nvertices`, and voxels otherwise. Surface elements need a vertex index
 * and voxels need a voxel index; the other index holds a -1 sentinel.
 *
 * @example
 * ```typescript
 * const left = BrainModel.fromSurface([0, 1, 5], 32492, { name: "CortexLeft" })
 * const thalamus = BrainModel.fromMask(
 *   { data: mask, shape: [91, 109, 91] },
 *   { name: "thalamus_left", affine },
 * )
 * const greyordinates = concatAxes(left, thalamus)
 *
 * for (const { name, start, stop } of greyordinates.iterStructures()) {
 *   console.log(name, start, stop)
 * }
 * ```
 */
export class BrainModel implements Axis<BrainModel, BrainModelElement> {
  readonly kind = "brainModel" as const
  /** Canonical brain structure of each element */
  readonly name: readonly StructureName[]
  /** Voxel indices of each element */
  readonly voxel: readonly VoxelIndex[]
  /** Vertex index of each element */
  readonly vertex: readonly number[]
  /** Whether each element is a surface vertex */
  readonly isSurface: readonly boolean[]
  /** Total vertex count of each surface structure present on the axis */
  readonly nvertices: VertexCounts

  private readonly _geometry: VolumeGeometry | undefined

  /**
   * @throws ShapeMismatchError if the inputs disagree in length
   * @throws UndefinedIndicesError if a surface element has no vertex or a
   *   volumetric element no voxel
   * @throws IncompatibleGeometryError if voxels are present without an
   *   affine and volume shape
   */
  constructor(options: BrainModelOptions) {
    const { voxel, vertex } = options
    if (voxel === undefined && vertex === undefined) {
      throw new ShapeMismatchError("Voxel and vertex indices not defined")
    }
    const size = voxel?.length ?? vertex?.length ?? 0

    this.voxel = copyVoxels(voxel, size)
    this.vertex = copyVertices(vertex, size)
    this.name = copyNames(options.name, size)
    this.nvertices = copyVertexCounts(options.nvertices, new Set(this.name))
    this.isSurface = Object.freeze(this.name.map((n) => this.nvertices.has(n)))

    this._geometry = createGeometry(
      options.affine,
      options.volumeShape,
      !this.isSurface.every(Boolean),
    )

    this.isSurface.forEach((surface, i) => {
      if (surface && this.vertex[i] < 0) {
        throw new UndefinedIndicesError(
          `Undefined vertex index found for surface element ${i}`,
        )
      }
      if (!surface && this.voxel[i].some((v) => v < 0)) {
        throw new UndefinedIndicesError(
          `Undefined voxel indices found for volumetric element ${i}`,
        )
      }
    })
    Object.freeze(this)
  }

  /**
   * Create a BrainModel axis covering (part of) a surface.
   *
   * @param vertices - Indices of the covered vertices
   * @param nvertex - Total number of vertices of the surface
   */
  static fromSurface(
    vertices: ArrayLike<number>,
    nvertex: number,
    options: FromSurfaceOptions = {},
  ): BrainModel {
    const name = canonicalizeStructureName(options.name ?? "Cortex")
    return new BrainModel({
      name,
      vertex: vertices,
      nvertices: new Map([[name, nvertex]]),
    })
  }

  /**
   * Create a BrainModel axis covering every non-zero element of a mask.
   *
   * A 1-dimensional mask covers vertices of a surface with as many
   * vertices as the mask has elements. A 3-dimensional mask covers voxels
   * of a volume with the mask's shape.
   *
   * @throws InvalidMaskRankError for masks of any other dimensionality
   */
  static fromMask(
    mask: ArrayLike<number | boolean> | NdMask,
    options: FromMaskOptions = {},
  ): BrainModel {
    const { data, shape } = isNdMask(mask) ? mask : { data: mask, shape: [mask.length] }
    const affine = createAffine(options.affine ?? identityAffine())
    const name = canonicalizeStructureName(options.name ?? "other")

    const expected = shape.reduce((a, b) => a * b, 1)
    if (data.length !== expected) {
      throw new ShapeMismatchError(
        `Mask has ${data.length} elements, expected ${expected} for shape [${shape.join(", ")}]`,
      )
    }

    if (shape.length === 1) {
      const vertices: number[] = []
      for (let i = 0; i < data.length; i++) {
        if (isNonZero(data[i])) vertices.push(i)
      }
      return BrainModel.fromSurface(vertices, data.length, { name })
    }
    if (shape.length === 3) {
      const [, ny, nz] = shape
      const voxels: VoxelIndex[] = []
      for (let f = 0; f < data.length; f++) {
        if (!isNonZero(data[f])) continue
        voxels.push([Math.floor(f / (ny * nz)), Math.floor(f / nz) % ny, f % nz])
      }
      return new BrainModel({ name, voxel: voxels, affine, volumeShape: shape })
    }
    throw new InvalidMaskRankError(shape.length)
  }

  /**
   * Create a BrainModel axis from a header matrix indices map.
   *
   * @throws ShapeMismatchError if the brain model entries do not tile the
   *   axis or their index lists disagree with their counts
   * @throws InconsistentVertexCountError if a surface entry lacks a vertex
   *   count or two entries disagree on it
   * @throws IncompatibleGeometryError if voxel entries are present without
   *   a volume element
   */
  static fromMapping(mim: BrainModelsMap): BrainModel {
    const size = mim.brainModels.reduce((n, bm) => n + bm.indexCount, 0)
    const name = new Array<StructureName | undefined>(size).fill(undefined)
    const voxel = new Array<VoxelIndex>(size).fill(SURFACE_VOXEL)
    const vertex = new Array<number>(size).fill(-1)
    const nvertices = new Map<StructureName, number>()
    let geometry: VolumeGeometry | undefined

    for (const bm of mim.brainModels) {
      const end = bm.indexOffset + bm.indexCount
      if (bm.indexOffset < 0 || end > size) {
        throw new ShapeMismatchError(
          `Brain model ${bm.brainStructure} covers [${bm.indexOffset}, ${end}) outside of ${size} elements`,
        )
      }
      name.fill(bm.brainStructure, bm.indexOffset, end)
      if (bm.modelType === "CIFTI_MODEL_TYPE_SURFACE") {
        if (bm.surfaceNumberOfVertices === undefined) {
          throw new InconsistentVertexCountError(
            `Number of vertices for surface structure ${bm.brainStructure} not defined`,
          )
        }
        addVertexCount(
          nvertices,
          bm.brainStructure,
          bm.surfaceNumberOfVertices,
          "brain models",
        )
        copyInto(vertex, bm, bm.vertexIndices)
      } else {
        if (mim.volume === undefined) {
          throw new IncompatibleGeometryError(
            `Voxels of ${bm.brainStructure} are defined without a volume`,
          )
        }
        geometry ??= readVolume(mim.volume)
        copyInto(voxel, bm, bm.voxelIndicesIJK)
      }
    }

    const names: StructureName[] = []
    for (let i = 0; i < size; i++) {
      const n = name[i]
      if (n === undefined) {
        throw new ShapeMismatchError(`No brain model describes element ${i}`)
      }
      names.push(n)
    }
    return new BrainModel({
      name: names,
      voxel,
      vertex,
      affine: geometry?.affine,
      volumeShape: geometry?.volumeShape,
      nvertices,
    })
  }

  get length(): number {
    return this.name.length
  }

  /**
   * Voxel-to-millimetre transform of the volume in which voxels are
   * defined; undefined when every element is on the surface.
   */
  get affine(): Affine | undefined {
    return this._geometry && createAffine(this._geometry.affine)
  }

  /**
   * Shape of the volume in which voxels are defined; undefined when every
   * element is on the surface.
   */
  get volumeShape(): VolumeShape | undefined {
    return this._geometry?.volumeShape
  }

  getElement(index: number): BrainModelElement {
    const i = normalizeIndex(index, this.length)
    return this.isSurface[i]
      ? { isSurface: true, vertex: this.vertex[i], name: this.name[i] }
      : { isSurface: false, voxel: this.voxel[i], name: this.name[i] }
  }

  slice(start?: number, stop?: number, step?: number): BrainModel {
    return this.take(sliceIndices({ start, stop, step }, this.length))
  }

  index(selector: IndexSelector): BrainModelElement
  index(selector: RangeSelector | IndicesSelector): BrainModel
  index(selector: AxisSelector): BrainModelElement | BrainModel
  index(selector: AxisSelector): BrainModelElement | BrainModel {
    switch (selector.kind) {
      case "index":
        return this.getElement(selector.index)
      case "range":
      case "indices":
        return this.take(selectedIndices(selector, this.length))
      case "name":
        throw unsupportedNameSelector(this.kind)
    }
  }

  private take(indices: number[]): BrainModel {
    return new BrainModel({
      name: take(this.name, indices),
      voxel: take(this.voxel, indices),
      vertex: take(this.vertex, indices),
      affine: this._geometry?.affine,
      volumeShape: this._geometry?.volumeShape,
      nvertices: this.nvertices,
    })
  }

  /**
   * Iterate over the brain structures in the order they appear along the
   * axis.
   *
   * Each maximal run of consecutive elements with the same structure is
   * yielded separately, so a structure that appears twice with something
   * else in between yields two runs. The returned iterable can be iterated
   * more than once.
   */
  iterStructures(): Iterable<StructureRun> {
    return { [Symbol.iterator]: () => this.structureRuns() }
  }

  private *structureRuns(): Generator<StructureRun> {
    let start = 0
    for (let i = 1; i <= this.length; i++) {
      if (i === this.length || this.name[i] !== this.name[start]) {
        yield {
          name: this.name[start],
          start,
          stop: i,
          axis: this.slice(start, i),
        }
        start = i
      }
    }
  }

  toMapping(dim: number): BrainModelsMap {
    const brainModels: BrainModelEntry[] = []
    for (const { name, start, stop, axis } of this.iterStructures()) {
      const count = this.nvertices.get(name)
      brainModels.push(
        count !== undefined
          ? {
              indexOffset: start,
              indexCount: stop - start,
              modelType: "CIFTI_MODEL_TYPE_SURFACE",
              brainStructure: name,
              surfaceNumberOfVertices: count,
              vertexIndices: [...axis.vertex],
            }
          : {
              indexOffset: start,
              indexCount: stop - start,
              modelType: "CIFTI_MODEL_TYPE_VOXELS",
              brainStructure: name,
              voxelIndicesIJK: axis.voxel.map(([i, j, k]) => [i, j, k] as const),
            },
      )
    }
    return {
      indicesMapToDataType: "CIFTI_INDEX_TYPE_BRAIN_MODELS",
      appliesToMatrixDimension: [dim],
      ...(this._geometry && { volume: writeVolume(this._geometry) }),
      brainModels,
    }
  }

  /**
   * Append `other` to this axis.
   *
   * @throws IncompatibleGeometryError if both axes contain voxels defined
   *   in different volumes
   * @throws InconsistentVertexCountError if a surface structure has a
   *   different vertex count in each axis
   */
  concat(other: CiftiAxis): BrainModel | NotSupported {
    if (!(other instanceof BrainModel)) return NOT_SUPPORTED
    const geometry = mergeGeometry(this._geometry, other._geometry, "BrainModels")
    return new BrainModel({
      name: [...this.name, ...other.name],
      voxel: [...this.voxel, ...other.voxel],
      vertex: [...this.vertex, ...other.vertex],
      affine: geometry?.affine,
      volumeShape: geometry?.volumeShape,
      nvertices: mergeVertexCounts(this.nvertices, other.nvertices, "BrainModels"),
    })
  }

  equals(other: unknown): boolean {
    if (!(other instanceof BrainModel) || other.length !== this.length) {
      return false
    }
    return (
      geometriesClose(this._geometry, other._geometry) &&
      mapsEqual(this.nvertices, other.nvertices) &&
      arraysEqual(this.name, other.name) &&
      arraysEqual(this.isSurface, other.isSurface) &&
      arraysEqual(this.vertex, other.vertex) &&
      this.voxel.every(
        (v, i) => this.isSurface[i] || voxelsEqual(v, other.voxel[i]),
      )
    )
  }
}

/**
 * Copy the indices listed by a brain model entry into its block of `target`.
 */
function copyInto<T>(
  target: T[],
  bm: BrainModelEntry,
  indices: readonly T[] | undefined,
): void {
  const list = indices ?? []
  if (list.length !== bm.indexCount) {
    throw new ShapeMismatchError(
      `Brain model ${bm.brainStructure} declares ${bm.indexCount} elements but lists ${list.length} indices`,
    )
  }
  for (let i = 0; i < list.length; i++) {
    target[bm.indexOffset + i] = list[i]
  }
}
