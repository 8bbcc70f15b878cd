// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { IndexOutOfRangeError, UnsupportedIndexError } from "../errors.js"

/**
 * A slice over an axis; omitted bounds default to the extreme matching the
 * direction of `step`.
 */
export interface SliceRange {
  start?: number
  stop?: number
  /** Distance between selected elements, may be negative (default: 1) */
  step?: number
}

/**
 * Concrete positions selected by a slice on an axis of known length.
 */
export interface ResolvedSlice {
  /** First selected index (meaningful only when count > 0) */
  start: number
  step: number
  /** Number of selected elements */
  count: number
}

/**
 * Resolve a slice against an axis length.
 *
 * Negative bounds count from the end, out-of-range bounds are clamped and
 * an empty range yields `count` 0.
 *
 * @throws UnsupportedIndexError if the step is zero or not an integer
 */
export function resolveSlice(range: SliceRange, length: number): ResolvedSlice {
  const step = range.step ?? 1
  if (step === 0 || !Number.isInteger(step)) {
    throw new UnsupportedIndexError(`Slice step should be a non-zero integer, not ${step}`)
  }
  const lower = step < 0 ? -1 : 0
  const upper = step < 0 ? length - 1 : length

  const clamp = (bound: number | undefined, fallback: number): number => {
    if (bound === undefined) return fallback
    if (!Number.isInteger(bound)) {
      throw new UnsupportedIndexError(`Slice bounds should be integers, not ${bound}`)
    }
    if (bound < 0) return Math.max(bound + length, lower)
    return Math.min(bound, upper)
  }

  const start = clamp(range.start, step < 0 ? upper : lower)
  const stop = clamp(range.stop, step < 0 ? lower : upper)

  let count = 0
  if (step > 0 && stop > start) {
    count = Math.ceil((stop - start) / step)
  } else if (step < 0 && start > stop) {
    count = Math.ceil((start - stop) / -step)
  }
  return { start, step, count }
}

/**
 * List the indices selected by a slice.
 */
export function sliceIndices(range: SliceRange, length: number): number[] {
  const { start, step, count } = resolveSlice(range, length)
  return Array.from({ length: count }, (_, i) => start + i * step)
}

/**
 * Normalize a possibly negative element index.
 *
 * @throws IndexOutOfRangeError if the index falls outside [0, length)
 * @throws UnsupportedIndexError if the index is not an integer
 */
export function normalizeIndex(index: number, length: number): number {
  if (!Number.isInteger(index)) {
    throw new UnsupportedIndexError(`Axis index should be an integer, not ${index}`)
  }
  const normalized = index < 0 ? length + index : index
  if (normalized < 0 || normalized >= length) {
    throw new IndexOutOfRangeError(index, length)
  }
  return normalized
}

/**
 * Pick the elements of an array at the given positions.
 */
export function take<T>(values: readonly T[], indices: readonly number[]): T[] {
  return indices.map((i) => values[i])
}
