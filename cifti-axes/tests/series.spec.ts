// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, test } from "vitest"

import {
  IncompatibleAxesError,
  IndexOutOfRangeError,
  InvalidUnitError,
  NOT_SUPPORTED,
  Scalar,
  Series,
  ShapeMismatchError,
  UnsupportedIndexError,
  byIndex,
  byIndices,
  byName,
  byRange,
} from "../src/index.js"

function expectSeries(
  series: Series,
  start: number,
  step: number,
  size: number,
): void {
  expect([series.start, series.step, series.size]).toEqual([start, step, size])
}

describe("Series", () => {
  const series = new Series(0, 2, 5)

  test("elements follow start + step * index", () => {
    expect(Array.from(series.values())).toEqual([0, 2, 4, 6, 8])
    expect(series.length).toBe(5)
    expect(series.getElement(3)).toBe(6)
    expect(series.getElement(-1)).toBe(8)
  })

  test("out of range indices are rejected", () => {
    expect(() => series.getElement(5)).toThrow(IndexOutOfRangeError)
    expect(() => series.getElement(-6)).toThrow(IndexOutOfRangeError)
  })

  test("unit defaults to seconds and is case-insensitive", () => {
    expect(series.unit).toBe("SECOND")
    expect(new Series(0, 1, 3, "hertz").unit).toBe("HERTZ")
    expect(() => new Series(0, 1, 3, "minute")).toThrow(InvalidUnitError)
  })

  test("size must be a non-negative integer", () => {
    expect(() => new Series(0, 1, -1)).toThrow(ShapeMismatchError)
    expect(() => new Series(0, 1, 1.5)).toThrow(ShapeMismatchError)
  })

  test("slicing keeps the series regular", () => {
    expectSeries(series.slice(1, 4), 2, 2, 3)
    expectSeries(series.slice(undefined, undefined, 2), 0, 4, 3)
    expectSeries(series.slice(-2), 6, 2, 2)
  })

  test("reversed slice", () => {
    const reversed = series.slice(undefined, undefined, -1)
    expectSeries(reversed, 8, -2, 5)
    expect(Array.from(reversed.values())).toEqual([8, 6, 4, 2, 0])
  })

  test("empty slice", () => {
    expect(series.slice(4, 1).length).toBe(0)
  })

  test("index with selectors", () => {
    expect(series.index(byIndex(2))).toBe(4)
    expect(series.index(byRange(1, 4)).equals(series.slice(1, 4))).toBe(true)
    expect(() => series.index(byIndices([0, 2]))).toThrow(UnsupportedIndexError)
    expect(() => series.index(byName("t0"))).toThrow(UnsupportedIndexError)
  })

  test("concatenation continues the first series", () => {
    const joined = new Series(0, 2, 3).concat(new Series(100, 2, 2))
    expect(joined).toBeInstanceOf(Series)
    if (joined instanceof Series) expectSeries(joined, 0, 2, 5)
  })

  test("concatenation requires equal step and unit", () => {
    expect(() => new Series(0, 2, 3).extend(new Series(0, 3, 3))).toThrow(
      IncompatibleAxesError,
    )
    expect(() =>
      new Series(0, 2, 3).extend(new Series(0, 2, 3, "HERTZ")),
    ).toThrow("Can only concatenate Series with the same unit")
  })

  test("concatenation with another kind is not supported", () => {
    expect(series.concat(new Scalar(["a"]))).toBe(NOT_SUPPORTED)
  })

  test("equality", () => {
    expect(series.equals(new Series(0, 2, 5))).toBe(true)
    expect(series.equals(new Series(1, 2, 5))).toBe(false)
    expect(series.equals(new Series(0, 2, 5, "METER"))).toBe(false)
    expect(series.equals(new Scalar(["a"]))).toBe(false)
    expect(series.equals(undefined)).toBe(false)
  })

  test("instances are immutable", () => {
    expect(Object.isFrozen(series)).toBe(true)
  })

  test("header map round trip", () => {
    const mapping = new Series(1.5, 0.72, 10).toMapping(1)
    expect(mapping).toEqual({
      indicesMapToDataType: "CIFTI_INDEX_TYPE_SERIES",
      appliesToMatrixDimension: [1],
      seriesExponent: 0,
      seriesStart: 1.5,
      seriesStep: 0.72,
      numberOfSeriesPoints: 10,
      seriesUnit: "SECOND",
    })
    expect(Series.fromMapping(mapping).equals(new Series(1.5, 0.72, 10))).toBe(
      true,
    )
  })

  test("series exponent scales start and step", () => {
    const scaled = Series.fromMapping({
      indicesMapToDataType: "CIFTI_INDEX_TYPE_SERIES",
      appliesToMatrixDimension: [0],
      seriesExponent: -3,
      seriesStart: 5,
      seriesStep: 2,
      numberOfSeriesPoints: 4,
      seriesUnit: "SECOND",
    })
    expect(scaled.start).toBeCloseTo(0.005, 12)
    expect(scaled.step).toBeCloseTo(0.002, 12)
    expect(scaled.size).toBe(4)
  })
})
