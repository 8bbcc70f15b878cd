// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type {
  Axis,
  AxisSelector,
  CiftiAxis,
  IndexSelector,
  IndicesSelector,
  NameSelector,
  NotSupported,
  RangeSelector,
} from "./Axis.js"
import { NOT_SUPPORTED, selectedIndices } from "./Axis.js"
import type { BrainModel } from "./BrainModel.js"
import {
  AmbiguousParcelNameError,
  InconsistentVertexCountError,
  ParcelNotFoundError,
  ShapeMismatchError,
  UndefinedIndicesError,
} from "./errors.js"
import type { ParcelsMap } from "./mapping.js"
import type { StructureName, StructureNameInput } from "./structures.js"
import { canonicalizeStructureName } from "./structures.js"
import type {
  Affine,
  AffineInput,
  VertexCounts,
  VertexCountsInput,
  VolumeShape,
  VoxelIndex,
} from "./types.js"
import { createAffine } from "./utils/affine.js"
import {
  arraysEqual,
  mapsEqual,
  voxelListsEqual,
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

/** Vertex indices of a parcel, per surface structure. */
export type ParcelVertices = ReadonlyMap<StructureName, readonly number[]>

/**
 * Accepted per-parcel vertex inputs; keys are canonicalized on
 * construction.
 */
export type ParcelVerticesInput =
  | ReadonlyMap<StructureNameInput, ArrayLike<number>>
  | Readonly<Record<string, ArrayLike<number>>>

/**
 * Options for creating a Parcels axis.
 */
export interface ParcelsOptions {
  /** Name of each parcel */
  name: readonly string[]
  /** Voxel indices covered by each parcel */
  voxels: readonly (readonly ArrayLike<number>[])[]
  /** Vertices covered by each parcel, per surface structure */
  vertices: readonly ParcelVerticesInput[]
  /** Voxel-to-millimetre transform, required when any parcel has voxels */
  affine?: AffineInput
  /** Shape of the volume, required when any parcel has voxels */
  volumeShape?: ArrayLike<number>
  /**
   * Total number of vertices of each surface structure. Required for
   * every structure referenced by a parcel's vertices.
   */
  nvertices?: VertexCountsInput
}

/** Voxels and vertices covered by a parcel. */
export interface ParcelContents {
  voxels: readonly VoxelIndex[]
  vertices: ParcelVertices
}

/** Description of a single row/column of a Parcels axis. */
export interface ParcelElement extends ParcelContents {
  name: string
}

function copyVoxelList(
  voxels: readonly ArrayLike<number>[],
  parcel: number,
): readonly VoxelIndex[] {
  return Object.freeze(
    voxels.map((v): VoxelIndex => {
      if (v.length !== 3) {
        throw new ShapeMismatchError(
          `Voxel indices of parcel ${parcel} should have 3 components, not ${v.length}`,
        )
      }
      const ijk = [v[0], v[1], v[2]] as const
      if (!ijk.every((x) => Number.isInteger(x) && x >= 0)) {
        throw new UndefinedIndicesError(
          `Invalid voxel index [${ijk.join(", ")}] in parcel ${parcel}`,
        )
      }
      return Object.freeze(ijk)
    }),
  )
}

function isVertexMap(
  input: ParcelVerticesInput,
): input is ReadonlyMap<StructureNameInput, ArrayLike<number>> {
  return input instanceof Map
}

function copyParcelVertices(
  input: ParcelVerticesInput,
  parcel: number,
): ParcelVertices {
  const entries: [StructureNameInput, ArrayLike<number>][] = isVertexMap(input)
    ? [...input.entries()]
    : Object.entries(input)
  const vertices = new Map<StructureName, readonly number[]>()
  for (const [key, indices] of entries) {
    const list = Array.from(indices)
    if (!list.every((x) => Number.isInteger(x) && x >= 0)) {
      throw new UndefinedIndicesError(
        `Invalid vertex index in parcel ${parcel}`,
      )
    }
    vertices.set(canonicalizeStructureName(key), Object.freeze(list))
  }
  return vertices
}

function verticesEqual(a: ParcelVertices, b: ParcelVertices): boolean {
  return mapsEqual(a, b, arraysEqual)
}

/**
 * Each row/column represents a parcel: a named group of voxels and/or
 * surface vertices.
 *
 * Parcel names need not be unique, but looking a parcel up by name with
 * {@link byName} requires exactly one match.
 *
 * @example
 * ```typescript
 * const parcels = Parcels.fromBrainModels([
 *   ["Left-Thalamus", BrainModel.fromMask(thalamusMask, { name: "thalamus_left", affine })],
 *   ["V1", BrainModel.fromSurface(v1Vertices, 32492, { name: "CortexLeft" })],
 * ])
 * const { voxels, vertices } = parcels.index(byName("Left-Thalamus"))
 * ```
 */
export class Parcels
  implements Axis<Parcels, ParcelElement, ParcelContents>
{
  readonly kind = "parcels" as const
  readonly name: readonly string[]
  readonly voxels: readonly (readonly VoxelIndex[])[]
  readonly vertices: readonly ParcelVertices[]
  /** Total vertex count of each surface structure used by a parcel */
  readonly nvertices: VertexCounts

  private readonly _geometry: VolumeGeometry | undefined

  /**
   * @throws ShapeMismatchError if the inputs disagree in length
   * @throws InconsistentVertexCountError if a parcel uses a surface
   *   structure without a vertex count
   * @throws IncompatibleGeometryError if voxels are present without an
   *   affine and volume shape
   */
  constructor(options: ParcelsOptions) {
    this.name = Object.freeze([...options.name])
    const size = this.name.length
    for (const field of ["voxels", "vertices"] as const) {
      if (options[field].length !== size) {
        throw new ShapeMismatchError(
          `Input ${field} has incorrect length (${options[field].length}) for Parcels axis with ${size} elements`,
        )
      }
    }
    this.voxels = Object.freeze(options.voxels.map(copyVoxelList))
    this.vertices = Object.freeze(options.vertices.map(copyParcelVertices))

    const used = new Set<StructureName>()
    for (const parcel of this.vertices) {
      for (const structure of parcel.keys()) used.add(structure)
    }
    this.nvertices = copyVertexCounts(options.nvertices, used)
    for (const structure of used) {
      if (!this.nvertices.has(structure)) {
        throw new InconsistentVertexCountError(
          `Number of vertices for surface structure ${structure} not defined`,
        )
      }
    }

    this._geometry = createGeometry(
      options.affine,
      options.volumeShape,
      this.voxels.some((v) => v.length > 0),
    )
    Object.freeze(this)
  }

  /**
   * Create a Parcels axis with one parcel per named BrainModel axis.
   *
   * The voxels of each brain model become the parcel's voxels; its
   * surface elements become the parcel's vertices, per structure.
   *
   * @throws IncompatibleGeometryError if the brain models' voxels are
   *   defined in different volumes
   * @throws InconsistentVertexCountError if brain models disagree on the
   *   vertex count of a surface structure
   */
  static fromBrainModels(
    namedBrainModels: Iterable<readonly [string, BrainModel]>,
  ): Parcels {
    const names: string[] = []
    const allVoxels: VoxelIndex[][] = []
    const allVertices: Map<StructureName, number[]>[] = []
    const nvertices = new Map<StructureName, number>()
    let geometry: VolumeGeometry | undefined

    for (const [parcelName, bm] of namedBrainModels) {
      names.push(parcelName)
      const voxels = bm.voxel.filter((_, i) => !bm.isSurface[i])
      if (voxels.length > 0) {
        const { affine, volumeShape } = bm
        geometry = mergeGeometry(
          geometry,
          createGeometry(affine, volumeShape, true),
          "brain models",
        )
      }
      allVoxels.push(voxels)

      const vertices = new Map<StructureName, number[]>()
      for (const { name, axis } of bm.iterStructures()) {
        const count = bm.nvertices.get(name)
        if (count === undefined) continue
        addVertexCount(nvertices, name, count, "brain models")
        const surface = axis.vertex.filter((_, k) => axis.isSurface[k])
        vertices.set(name, [...(vertices.get(name) ?? []), ...surface])
      }
      allVertices.push(vertices)
    }

    return new Parcels({
      name: names,
      voxels: allVoxels,
      vertices: allVertices,
      affine: geometry?.affine,
      volumeShape: geometry?.volumeShape,
      nvertices,
    })
  }

  /**
   * Create a Parcels axis from a header matrix indices map.
   *
   * @throws InconsistentVertexCountError if a parcel references a surface
   *   without a surface element
   */
  static fromMapping(mim: ParcelsMap): Parcels {
    const geometry = mim.volume && readVolume(mim.volume)
    const nvertices = new Map<StructureName, number>()
    for (const surface of mim.surfaces) {
      addVertexCount(
        nvertices,
        surface.brainStructure,
        surface.surfaceNumberOfVertices,
        "surfaces",
      )
    }
    return new Parcels({
      name: mim.parcels.map((p) => p.name),
      voxels: mim.parcels.map((p) => p.voxelIndicesIJK),
      vertices: mim.parcels.map(
        (p) =>
          new Map(p.vertices.map((v) => [v.brainStructure, v.indices] as const)),
      ),
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
   * defined; undefined when no parcel contains voxels.
   */
  get affine(): Affine | undefined {
    return this._geometry && createAffine(this._geometry.affine)
  }

  get volumeShape(): VolumeShape | undefined {
    return this._geometry?.volumeShape
  }

  toMapping(dim: number): ParcelsMap {
    return {
      indicesMapToDataType: "CIFTI_INDEX_TYPE_PARCELS",
      appliesToMatrixDimension: [dim],
      ...(this._geometry && { volume: writeVolume(this._geometry) }),
      surfaces: [...this.nvertices].map(([brainStructure, count]) => ({
        brainStructure,
        surfaceNumberOfVertices: count,
      })),
      parcels: this.name.map((name, i) => ({
        name,
        voxelIndicesIJK: this.voxels[i].map(([x, y, z]) => [x, y, z] as const),
        vertices: [...this.vertices[i]].map(([brainStructure, indices]) => ({
          brainStructure,
          indices: [...indices],
        })),
      })),
    }
  }

  getElement(index: number): ParcelElement {
    const i = normalizeIndex(index, this.length)
    return {
      name: this.name[i],
      voxels: this.voxels[i],
      vertices: this.vertices[i],
    }
  }

  /**
   * Look up the voxels and vertices of the parcel with the given name.
   *
   * @throws ParcelNotFoundError if no parcel has this name
   * @throws AmbiguousParcelNameError if several parcels have this name
   */
  getParcel(name: string): ParcelContents {
    const matches: number[] = []
    this.name.forEach((n, i) => {
      if (n === name) matches.push(i)
    })
    if (matches.length === 0) throw new ParcelNotFoundError(name)
    if (matches.length > 1) {
      throw new AmbiguousParcelNameError(name, matches.length)
    }
    const [i] = matches
    return { voxels: this.voxels[i], vertices: this.vertices[i] }
  }

  slice(start?: number, stop?: number, step?: number): Parcels {
    return this.take(sliceIndices({ start, stop, step }, this.length))
  }

  index(selector: IndexSelector): ParcelElement
  index(selector: NameSelector): ParcelContents
  index(selector: RangeSelector | IndicesSelector): Parcels
  index(selector: AxisSelector): ParcelElement | ParcelContents | Parcels
  index(selector: AxisSelector): ParcelElement | ParcelContents | Parcels {
    switch (selector.kind) {
      case "index":
        return this.getElement(selector.index)
      case "name":
        return this.getParcel(selector.name)
      case "range":
      case "indices":
        return this.take(selectedIndices(selector, this.length))
    }
  }

  private take(indices: number[]): Parcels {
    return new Parcels({
      name: take(this.name, indices),
      voxels: take(this.voxels, indices),
      vertices: take(this.vertices, indices),
      affine: this._geometry?.affine,
      volumeShape: this._geometry?.volumeShape,
      nvertices: this.nvertices,
    })
  }

  /**
   * Append `other` to this axis.
   *
   * @throws IncompatibleGeometryError if both axes contain voxels defined
   *   in different volumes
   * @throws InconsistentVertexCountError if a surface structure has a
   *   different vertex count in each axis
   */
  concat(other: CiftiAxis): Parcels | NotSupported {
    if (!(other instanceof Parcels)) return NOT_SUPPORTED
    const geometry = mergeGeometry(this._geometry, other._geometry, "Parcels")
    return new Parcels({
      name: [...this.name, ...other.name],
      voxels: [...this.voxels, ...other.voxels],
      vertices: [...this.vertices, ...other.vertices],
      affine: geometry?.affine,
      volumeShape: geometry?.volumeShape,
      nvertices: mergeVertexCounts(this.nvertices, other.nvertices, "Parcels"),
    })
  }

  /**
   * Deep equality: names position by position, vertex counts, geometry
   * (affine within tolerance), and for every parcel its voxel list (in
   * order) and its vertices (same structures, same indices in order).
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Parcels) || other.length !== this.length) {
      return false
    }
    return (
      arraysEqual(this.name, other.name) &&
      mapsEqual(this.nvertices, other.nvertices) &&
      geometriesClose(this._geometry, other._geometry) &&
      this.voxels.every((v, i) => voxelListsEqual(v, other.voxels[i])) &&
      this.vertices.every((v, i) => verticesEqual(v, other.vertices[i]))
    )
  }
}
