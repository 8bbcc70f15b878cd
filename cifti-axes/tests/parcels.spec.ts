// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, test } from "vitest"

import {
  AmbiguousParcelNameError,
  BrainModel,
  IncompatibleGeometryError,
  InconsistentVertexCountError,
  NOT_SUPPORTED,
  ParcelNotFoundError,
  Parcels,
  ShapeMismatchError,
  affineToRows,
  byIndex,
  byName,
  byRange,
} from "../src/index.js"
import type { ParcelsMap } from "../src/index.js"

const IDENTITY_ROWS = [
  [1, 0, 0, 0],
  [0, 1, 0, 0],
  [0, 0, 1, 0],
  [0, 0, 0, 1],
]

// 2x2x2 mask selecting flat (C order) positions 1 and 6
const MASK = { data: [0, 1, 0, 0, 0, 0, 1, 0], shape: [2, 2, 2] }

function join(a: BrainModel, b: BrainModel): BrainModel {
  const joined = a.concat(b)
  if (joined === NOT_SUPPORTED) throw new Error("expected a BrainModel")
  return joined
}

function joinParcels(a: Parcels, b: Parcels): Parcels {
  const joined = a.concat(b)
  if (joined === NOT_SUPPORTED) throw new Error("expected Parcels")
  return joined
}

describe("Parcels", () => {
  const left = BrainModel.fromSurface([0, 1], 5, { name: "CortexLeft" })
  const thalamus = BrainModel.fromMask(MASK, { name: "thalamus_left" })
  const parcels = Parcels.fromBrainModels([
    ["V1", left],
    ["thalamus", thalamus],
  ])

  test("fromBrainModels collects voxels and vertices per parcel", () => {
    expect(parcels.length).toBe(2)
    expect(parcels.name).toEqual(["V1", "thalamus"])
    expect(parcels.voxels).toEqual([
      [],
      [
        [0, 0, 1],
        [1, 1, 0],
      ],
    ])
    expect([...parcels.vertices[0]]).toEqual([
      ["CIFTI_STRUCTURE_CORTEX_LEFT", [0, 1]],
    ])
    expect(parcels.vertices[1].size).toBe(0)
    expect([...parcels.nvertices]).toEqual([["CIFTI_STRUCTURE_CORTEX_LEFT", 5]])
    expect(parcels.volumeShape).toEqual([2, 2, 2])
    expect(parcels.affine && affineToRows(parcels.affine)).toEqual(IDENTITY_ROWS)
  })

  test("fromBrainModels appends repeated structures", () => {
    const tail = BrainModel.fromSurface([3], 5, { name: "CortexLeft" })
    const mixed = Parcels.fromBrainModels([
      ["mixed", join(join(left, thalamus), tail)],
    ])
    expect(mixed.vertices[0].get("CIFTI_STRUCTURE_CORTEX_LEFT")).toEqual([
      0, 1, 3,
    ])
    expect(mixed.voxels[0]).toEqual([
      [0, 0, 1],
      [1, 1, 0],
    ])
  })

  test("fromBrainModels rejects inconsistent vertex counts", () => {
    const other = BrainModel.fromSurface([2], 6, { name: "CortexLeft" })
    expect(() =>
      Parcels.fromBrainModels([
        ["a", left],
        ["b", other],
      ]),
    ).toThrow(InconsistentVertexCountError)
  })

  test("lookup by name", () => {
    const { voxels, vertices } = parcels.index(byName("thalamus"))
    expect(voxels).toEqual([
      [0, 0, 1],
      [1, 1, 0],
    ])
    expect(vertices.size).toBe(0)
    expect(() => parcels.index(byName("missing"))).toThrow(
      "Parcel missing not found",
    )
    expect(() => parcels.index(byName("missing"))).toThrow(ParcelNotFoundError)
  })

  test("lookup by name requires a unique match", () => {
    const doubled = joinParcels(parcels, parcels)
    expect(doubled.length).toBe(4)
    expect(() => doubled.getParcel("V1")).toThrow(AmbiguousParcelNameError)
  })

  test("getElement describes a single parcel", () => {
    const element = parcels.index(byIndex(0))
    expect(element.name).toBe("V1")
    expect(element.voxels).toEqual([])
    expect(element.vertices.get("CIFTI_STRUCTURE_CORTEX_LEFT")).toEqual([0, 1])
  })

  test("slicing drops unused geometry and vertex counts", () => {
    const volumeOnly = parcels.index(byRange(1))
    expect(volumeOnly.name).toEqual(["thalamus"])
    expect(volumeOnly.nvertices.size).toBe(0)
    expect(volumeOnly.volumeShape).toEqual([2, 2, 2])

    const surfaceOnly = parcels.slice(0, 1)
    expect(surfaceOnly.affine).toBeUndefined()
    expect(surfaceOnly.nvertices.get("CIFTI_STRUCTURE_CORTEX_LEFT")).toBe(5)
  })

  test("surface structures need a vertex count", () => {
    expect(
      () =>
        new Parcels({
          name: ["a"],
          voxels: [[]],
          vertices: [{ CortexLeft: [0] }],
        }),
    ).toThrow(InconsistentVertexCountError)
  })

  test("voxels need geometry", () => {
    expect(
      () =>
        new Parcels({
          name: ["a"],
          voxels: [[[0, 0, 0]]],
          vertices: [{}],
        }),
    ).toThrow(IncompatibleGeometryError)
  })

  test("inputs must have matching lengths", () => {
    expect(
      () =>
        new Parcels({
          name: ["a", "b"],
          voxels: [[]],
          vertices: [{}, {}],
        }),
    ).toThrow(ShapeMismatchError)
  })

  test("concatenation rejects different volumes", () => {
    const scaled = Parcels.fromBrainModels([
      [
        "thalamus",
        BrainModel.fromMask(MASK, {
          name: "thalamus_left",
          affine: [
            [2, 0, 0, 0],
            [0, 2, 0, 0],
            [0, 0, 2, 0],
            [0, 0, 0, 1],
          ],
        }),
      ],
    ])
    expect(() => parcels.concat(scaled)).toThrow(IncompatibleGeometryError)
    expect(parcels.concat(left)).toBe(NOT_SUPPORTED)
  })

  test("equality compares every parcel deeply", () => {
    const same = Parcels.fromBrainModels([
      ["V1", BrainModel.fromSurface([0, 1], 5, { name: "CortexLeft" })],
      ["thalamus", BrainModel.fromMask(MASK, { name: "thalamus_left" })],
    ])
    expect(parcels.equals(same)).toBe(true)

    const otherVertices = Parcels.fromBrainModels([
      ["V1", BrainModel.fromSurface([0, 2], 5, { name: "CortexLeft" })],
      ["thalamus", thalamus],
    ])
    expect(parcels.equals(otherVertices)).toBe(false)

    const reordered = new Parcels({
      name: ["V1", "thalamus"],
      voxels: [
        [],
        [
          [1, 1, 0],
          [0, 0, 1],
        ],
      ],
      vertices: [{ CortexLeft: [0, 1] }, {}],
      affine: IDENTITY_ROWS,
      volumeShape: [2, 2, 2],
      nvertices: { CortexLeft: 5 },
    })
    expect(parcels.equals(reordered)).toBe(false)
    expect(parcels.equals(left)).toBe(false)
  })

  test("header map round trip", () => {
    const mapping = parcels.toMapping(0)
    expect(mapping.surfaces).toEqual([
      {
        brainStructure: "CIFTI_STRUCTURE_CORTEX_LEFT",
        surfaceNumberOfVertices: 5,
      },
    ])
    expect(mapping.parcels).toEqual([
      {
        name: "V1",
        voxelIndicesIJK: [],
        vertices: [
          { brainStructure: "CIFTI_STRUCTURE_CORTEX_LEFT", indices: [0, 1] },
        ],
      },
      {
        name: "thalamus",
        voxelIndicesIJK: [
          [0, 0, 1],
          [1, 1, 0],
        ],
        vertices: [],
      },
    ])
    expect(mapping.volume?.volumeDimensions).toEqual([2, 2, 2])
    expect(Parcels.fromMapping(mapping).equals(parcels)).toBe(true)
  })

  test("header parcels must reference declared surfaces", () => {
    const mapping: ParcelsMap = {
      indicesMapToDataType: "CIFTI_INDEX_TYPE_PARCELS",
      appliesToMatrixDimension: [0],
      surfaces: [],
      parcels: [
        {
          name: "V1",
          voxelIndicesIJK: [],
          vertices: [
            { brainStructure: "CIFTI_STRUCTURE_CORTEX_LEFT", indices: [0] },
          ],
        },
      ],
    }
    expect(() => Parcels.fromMapping(mapping)).toThrow(
      InconsistentVertexCountError,
    )
  })
})
