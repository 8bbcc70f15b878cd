// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type {
  Axis,
  AxisSelector,
  CiftiAxis,
  IndexSelector,
  NotSupported,
  RangeSelector,
} from "./Axis.js"
import { NOT_SUPPORTED, unsupportedNameSelector } from "./Axis.js"
import {
  IncompatibleAxesError,
  InvalidUnitError,
  ShapeMismatchError,
  UnsupportedIndexError,
} from "./errors.js"
import type { SeriesMap } from "./mapping.js"
import type { SeriesUnit } from "./types.js"
import { normalizeIndex, resolveSlice } from "./utils/slice.js"

const SERIES_UNITS: readonly SeriesUnit[] = ["SECOND", "HERTZ", "METER", "RADIAN"]

/**
 * Parse a series unit, case-insensitively.
 *
 * @throws InvalidUnitError for anything but second, hertz, meter or radian
 */
export function parseSeriesUnit(unit: string): SeriesUnit {
  const upper = unit.toUpperCase()
  const match = SERIES_UNITS.find((u) => u === upper)
  if (match === undefined) throw new InvalidUnitError(unit)
  return match
}

/**
 * Rows/columns sampled at regular intervals, e.g. the time points of a
 * dense time series.
 *
 * Element `i` is `start + step * i`; no array is stored.
 *
 * @example
 * ```typescript
 * const time = new Series(0, 0.72, 1200) // 1200 frames, TR = 0.72s
 * time.getElement(-1) // start of the last frame
 * time.slice(100, 200) // Series(72, 0.72, 100)
 * ```
 */
export class Series implements Axis<Series, number> {
  readonly kind = "series" as const
  /** Position of the first row/column */
  readonly start: number
  /** Spacing between consecutive rows/columns */
  readonly step: number
  /** Number of rows/columns */
  readonly size: number
  readonly unit: SeriesUnit

  /**
   * @param start - Position of the first element
   * @param step - Spacing between elements
   * @param size - Number of elements
   * @param unit - One of second, hertz, meter or radian, in any case
   *   (default: "SECOND")
   */
  constructor(start: number, step: number, size: number, unit: string = "SECOND") {
    if (!Number.isInteger(size) || size < 0) {
      throw new ShapeMismatchError(
        `Series size should be a non-negative integer, not ${size}`,
      )
    }
    this.start = start
    this.step = step
    this.size = size
    this.unit = parseSeriesUnit(unit)
    Object.freeze(this)
  }

  /**
   * Create a Series axis from a header matrix indices map.
   *
   * Start and step are scaled by `10 ** seriesExponent`.
   */
  static fromMapping(mim: SeriesMap): Series {
    const scale = 10 ** mim.seriesExponent
    return new Series(
      mim.seriesStart * scale,
      mim.seriesStep * scale,
      mim.numberOfSeriesPoints,
      mim.seriesUnit,
    )
  }

  get length(): number {
    return this.size
  }

  /**
   * All positions along the axis.
   */
  values(): Float64Array {
    const values = new Float64Array(this.size)
    for (let i = 0; i < this.size; i++) {
      values[i] = this.start + this.step * i
    }
    return values
  }

  toMapping(dim: number): SeriesMap {
    return {
      indicesMapToDataType: "CIFTI_INDEX_TYPE_SERIES",
      appliesToMatrixDimension: [dim],
      seriesExponent: 0,
      seriesStart: this.start,
      seriesStep: this.step,
      numberOfSeriesPoints: this.size,
      seriesUnit: this.unit,
    }
  }

  /**
   * Position of a single row/column; negative indices count from the end.
   */
  getElement(index: number): number {
    return this.start + this.step * normalizeIndex(index, this.size)
  }

  /**
   * Sub-series selected by a slice. The result is again exactly regular:
   * its step is `step * sliceStep`.
   */
  slice(start?: number, stop?: number, step?: number): Series {
    const resolved = resolveSlice({ start, stop, step }, this.size)
    return new Series(
      this.start + resolved.start * this.step,
      this.step * resolved.step,
      resolved.count,
      this.unit,
    )
  }

  index(selector: IndexSelector): number
  index(selector: RangeSelector): Series
  index(selector: AxisSelector): number | Series
  index(selector: AxisSelector): number | Series {
    switch (selector.kind) {
      case "index":
        return this.getElement(selector.index)
      case "range":
        return this.slice(selector.start, selector.stop, selector.step)
      case "indices":
        throw new UnsupportedIndexError(
          "Series can only be indexed with integers or ranges without breaking the regular structure",
        )
      case "name":
        throw unsupportedNameSelector("series")
    }
  }

  /**
   * Append `other` to this series, continuing this series' progression.
   * The start of `other` is ignored.
   *
   * @throws IncompatibleAxesError if the steps or units differ
   */
  extend(other: Series): Series {
    if (other.step !== this.step) {
      throw new IncompatibleAxesError(
        "Can only concatenate Series with the same step size",
      )
    }
    if (other.unit !== this.unit) {
      throw new IncompatibleAxesError(
        "Can only concatenate Series with the same unit",
      )
    }
    return new Series(this.start, this.step, this.size + other.size, this.unit)
  }

  concat(other: CiftiAxis): Series | NotSupported {
    if (!(other instanceof Series)) return NOT_SUPPORTED
    return this.extend(other)
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Series &&
      this.start === other.start &&
      this.step === other.step &&
      this.size === other.size &&
      this.unit === other.unit
    )
  }
}
