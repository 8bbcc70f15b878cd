// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, test } from "vitest"

import { IndexOutOfRangeError, ShapeMismatchError, UnsupportedIndexError } from "../src/errors.js"
import {
  affinesClose,
  affineToRows,
  createAffine,
  createVolumeShape,
} from "../src/utils/affine.js"
import { normalizeIndex, resolveSlice, sliceIndices } from "../src/utils/slice.js"

describe("Slices", () => {
  test("full range by default", () => {
    expect(resolveSlice({}, 5)).toEqual({ start: 0, step: 1, count: 5 })
  })

  test("out of range bounds are clamped", () => {
    expect(resolveSlice({ start: -10, stop: 10 }, 5)).toEqual({
      start: 0,
      step: 1,
      count: 5,
    })
  })

  test("negative bounds count from the end", () => {
    expect(sliceIndices({ start: 1, stop: -1 }, 5)).toEqual([1, 2, 3])
  })

  test("negative steps walk backwards", () => {
    expect(sliceIndices({ step: -2 }, 5)).toEqual([4, 2, 0])
    expect(sliceIndices({ start: 3, stop: 0, step: -1 }, 5)).toEqual([3, 2, 1])
  })

  test("uneven steps round the count up", () => {
    expect(sliceIndices({ start: 0, stop: 5, step: 3 }, 10)).toEqual([0, 3])
    expect(sliceIndices({ start: 0, stop: 7, step: 3 }, 10)).toEqual([0, 3, 6])
  })

  test("zero step is rejected", () => {
    expect(() => resolveSlice({ step: 0 }, 5)).toThrow(UnsupportedIndexError)
  })

  test("normalizeIndex", () => {
    expect(normalizeIndex(-1, 3)).toBe(2)
    expect(() => normalizeIndex(3, 3)).toThrow(IndexOutOfRangeError)
    expect(() => normalizeIndex(1.5, 3)).toThrow(UnsupportedIndexError)
  })
})

describe("Affines", () => {
  const rows = [
    [1, 2, 3, 4],
    [5, 6, 7, 8],
    [9, 10, 11, 12],
    [0, 0, 0, 1],
  ]

  test("rows are stored column-major", () => {
    expect(Array.from(createAffine(rows))).toEqual([
      1, 5, 9, 0, 2, 6, 10, 0, 3, 7, 11, 0, 4, 8, 12, 1,
    ])
    expect(affineToRows(createAffine(rows))).toEqual(rows)
  })

  test("flat input is copied as is", () => {
    const flat = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 5, 6, 7, 1]
    expect(affineToRows(createAffine(flat))[0]).toEqual([1, 0, 0, 5])
  })

  test("only 4x4 transforms are accepted", () => {
    expect(() => createAffine(rows.slice(0, 3))).toThrow(ShapeMismatchError)
    expect(() => createAffine([1, 2, 3])).toThrow(ShapeMismatchError)
  })

  test("closeness uses a small tolerance", () => {
    const a = createAffine(rows)
    const b = createAffine(rows)
    b[0] += 1e-9
    expect(affinesClose(a, b)).toBe(true)
    b[0] += 1e-6
    expect(affinesClose(a, b)).toBe(false)
  })

  test("volume shapes hold three non-negative integers", () => {
    expect(createVolumeShape([91, 109, 91])).toEqual([91, 109, 91])
    expect(() => createVolumeShape([91, 109])).toThrow(ShapeMismatchError)
    expect(() => createVolumeShape([91, -1, 91])).toThrow(ShapeMismatchError)
  })
})
