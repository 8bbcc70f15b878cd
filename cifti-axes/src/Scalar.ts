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
import { Label } from "./Label.js"
import type { ScalarsMap } from "./mapping.js"
import type { LabelTableInput, Metadata } from "./types.js"
import { arraysEqual, metadataEqual } from "./utils/equality.js"
import {
  copyMetadata,
  readNamedMaps,
  writeNamedMap,
} from "./utils/namedMaps.js"
import { normalizeIndex, sliceIndices, take } from "./utils/slice.js"

/**
 * Description of a single row/column of a Scalar axis.
 */
export interface ScalarElement {
  name: string
  meta: Metadata
}

function isTableList(
  tables: LabelTableInput | readonly LabelTableInput[],
): tables is readonly LabelTableInput[] {
  return Array.isArray(tables)
}

/**
 * Rows/columns that each carry a name and optional metadata, such as the
 * maps of a dscalar file.
 *
 * @example
 * ```typescript
 * const maps = new Scalar(["thickness", "myelin"], [{ units: "mm" }, {}])
 * maps.getElement(0) // { name: "thickness", meta: { units: "mm" } }
 * ```
 */
export class Scalar implements Axis<Scalar, ScalarElement> {
  readonly kind = "scalar" as const
  readonly name: readonly string[]
  readonly meta: readonly Metadata[]

  /**
   * @param name - Name of each row/column
   * @param meta - Metadata of each row/column (default: empty records)
   */
  constructor(name: readonly string[], meta?: readonly Metadata[]) {
    this.name = Object.freeze([...name])
    this.meta = copyMetadata(meta, this.name.length, "Scalar")
    Object.freeze(this)
  }

  /**
   * Create a Scalar axis from a header matrix indices map.
   */
  static fromMapping(mim: ScalarsMap): Scalar {
    const { names, meta } = readNamedMaps(mim.namedMaps)
    return new Scalar(names, meta)
  }

  get length(): number {
    return this.name.length
  }

  toMapping(dim: number): ScalarsMap {
    return {
      indicesMapToDataType: "CIFTI_INDEX_TYPE_SCALARS",
      appliesToMatrixDimension: [dim],
      namedMaps: this.name.map((name, i) => writeNamedMap(name, this.meta[i])),
    }
  }

  getElement(index: number): ScalarElement {
    const i = normalizeIndex(index, this.length)
    return { name: this.name[i], meta: this.meta[i] }
  }

  slice(start?: number, stop?: number, step?: number): Scalar {
    return this.take(sliceIndices({ start, stop, step }, this.length))
  }

  index(selector: IndexSelector): ScalarElement
  index(selector: RangeSelector | IndicesSelector): Scalar
  index(selector: AxisSelector): ScalarElement | Scalar
  index(selector: AxisSelector): ScalarElement | Scalar {
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

  private take(indices: number[]): Scalar {
    return new Scalar(take(this.name, indices), take(this.meta, indices))
  }

  /**
   * Create a Label axis with the same names and metadata.
   *
   * @param tables - One lookup table shared by every row/column, or one
   *   table per row/column
   * @throws ShapeMismatchError if a per-row list has the wrong length
   */
  toLabel(tables: LabelTableInput | readonly LabelTableInput[]): Label {
    const perRow = isTableList(tables)
      ? tables
      : new Array<LabelTableInput>(this.length).fill(tables)
    return new Label(this.name, perRow, this.meta)
  }

  concat(other: CiftiAxis): Scalar | NotSupported {
    if (!(other instanceof Scalar)) return NOT_SUPPORTED
    return new Scalar([...this.name, ...other.name], [...this.meta, ...other.meta])
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Scalar &&
      arraysEqual(this.name, other.name) &&
      this.meta.every((m, i) => metadataEqual(m, other.meta[i]))
    )
  }
}
