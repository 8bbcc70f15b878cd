// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, test } from "vitest"

import {
  InvalidLabelColorError,
  Label,
  NOT_SUPPORTED,
  Scalar,
  Series,
  ShapeMismatchError,
  UnsupportedIndexError,
  byIndex,
  byIndices,
  byName,
  byRange,
  createLabelTable,
} from "../src/index.js"
import type { LabelTableInput } from "../src/index.js"

const table: LabelTableInput = {
  0: { label: "???", rgba: [0, 0, 0, 0] },
  1: { label: "V1", rgba: [1, 0, 0, 1] },
}

describe("Scalar", () => {
  const scalar = new Scalar(["thickness", "myelin"], [{ units: "mm" }, {}])

  test("elements carry name and metadata", () => {
    expect(scalar.length).toBe(2)
    expect(scalar.getElement(0)).toEqual({
      name: "thickness",
      meta: { units: "mm" },
    })
    expect(scalar.index(byIndex(-1))).toEqual({ name: "myelin", meta: {} })
  })

  test("metadata defaults to empty records", () => {
    expect(new Scalar(["a", "b"]).meta).toEqual([{}, {}])
  })

  test("metadata must match the number of names", () => {
    expect(() => new Scalar(["a", "b"], [{}])).toThrow(ShapeMismatchError)
  })

  test("selecting rows", () => {
    expect(scalar.index(byIndices([1, 0])).name).toEqual(["myelin", "thickness"])
    expect(scalar.index(byRange(1)).name).toEqual(["myelin"])
    expect(scalar.slice(undefined, undefined, -1).name).toEqual([
      "myelin",
      "thickness",
    ])
    expect(() => scalar.index(byName("myelin"))).toThrow(UnsupportedIndexError)
  })

  test("concatenation", () => {
    const joined = scalar.concat(new Scalar(["curvature"]))
    expect(joined).toBeInstanceOf(Scalar)
    if (joined instanceof Scalar) {
      expect(joined.name).toEqual(["thickness", "myelin", "curvature"])
      expect(joined.meta[0]).toEqual({ units: "mm" })
    }
    expect(scalar.concat(new Series(0, 1, 2))).toBe(NOT_SUPPORTED)
  })

  test("equality compares names and metadata", () => {
    expect(
      scalar.equals(new Scalar(["thickness", "myelin"], [{ units: "mm" }, {}])),
    ).toBe(true)
    expect(
      scalar.equals(new Scalar(["thickness", "myelin"], [{ units: "cm" }, {}])),
    ).toBe(false)
    expect(scalar.equals(new Scalar(["thickness", "myelin"]))).toBe(false)
  })

  test("header map omits empty metadata", () => {
    const mapping = scalar.toMapping(0)
    expect(mapping).toEqual({
      indicesMapToDataType: "CIFTI_INDEX_TYPE_SCALARS",
      appliesToMatrixDimension: [0],
      namedMaps: [
        { mapName: "thickness", metadata: { units: "mm" } },
        { mapName: "myelin" },
      ],
    })
    expect(Scalar.fromMapping(mapping).equals(scalar)).toBe(true)
  })

  test("converting to a label axis shares one table", () => {
    const label = scalar.toLabel(table)
    expect(label).toBeInstanceOf(Label)
    expect(label.label.length).toBe(2)
    expect(label.label[1].get(1)).toEqual({ label: "V1", rgba: [1, 0, 0, 1] })
    expect(label.toScalar().equals(scalar)).toBe(true)
  })

  test("converting to a label axis with a table per row", () => {
    expect(() => scalar.toLabel([table])).toThrow(ShapeMismatchError)
  })
})

describe("Label", () => {
  const label = new Label(["parcellation"], [table], [{ source: "atlas" }])

  test("lookup tables are keyed by integer value", () => {
    const element = label.getElement(0)
    expect(element.name).toBe("parcellation")
    expect(element.meta).toEqual({ source: "atlas" })
    expect([...element.label.keys()]).toEqual([0, 1])
    expect(element.label.get(0)).toEqual({ label: "???", rgba: [0, 0, 0, 0] })
  })

  test("colours must lie between 0 and 1", () => {
    expect(() =>
      createLabelTable({ 3: { label: "bright", rgba: [2, 0, 0, 1] } }),
    ).toThrow(InvalidLabelColorError)
  })

  test("keys must be integers", () => {
    expect(() =>
      createLabelTable({ 1.5: { label: "half", rgba: [0, 0, 0, 1] } }),
    ).toThrow(ShapeMismatchError)
  })

  test("number of tables must match the number of names", () => {
    expect(() => new Label(["a", "b"], [table])).toThrow(ShapeMismatchError)
  })

  test("equality compares tables", () => {
    const other = new Label(
      ["parcellation"],
      [{ 0: { label: "???", rgba: [0, 0, 0, 0] }, 1: { label: "V1", rgba: [0, 1, 0, 1] } }],
      [{ source: "atlas" }],
    )
    expect(label.equals(other)).toBe(false)
    expect(
      label.equals(new Label(["parcellation"], [table], [{ source: "atlas" }])),
    ).toBe(true)
    expect(label.equals(label.toScalar())).toBe(false)
  })

  test("concatenation", () => {
    const joined = label.concat(new Label(["second"], [new Map()]))
    expect(joined).toBeInstanceOf(Label)
    if (joined instanceof Label) {
      expect(joined.name).toEqual(["parcellation", "second"])
      expect(joined.label[1].size).toBe(0)
      expect(joined.meta[1]).toEqual({})
    }
    expect(label.concat(label.toScalar())).toBe(NOT_SUPPORTED)
  })

  test("header map round trip", () => {
    const mapping = label.toMapping(1)
    expect(mapping.namedMaps).toEqual([
      {
        mapName: "parcellation",
        metadata: { source: "atlas" },
        labelTable: [
          { key: 0, label: "???", red: 0, green: 0, blue: 0, alpha: 0 },
          { key: 1, label: "V1", red: 1, green: 0, blue: 0, alpha: 1 },
        ],
      },
    ])
    expect(Label.fromMapping(mapping).equals(label)).toBe(true)
  })
})
