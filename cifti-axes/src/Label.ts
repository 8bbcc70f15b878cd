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
import { InvalidLabelColorError, ShapeMismatchError } from "./errors.js"
import type { LabelsMap, LabelTableEntry } from "./mapping.js"
import { Scalar } from "./Scalar.js"
import type {
  LabelEntry,
  LabelTable,
  LabelTableInput,
  Metadata,
} from "./types.js"
import {
  arraysEqual,
  labelTablesEqual,
  metadataEqual,
} from "./utils/equality.js"
import {
  copyMetadata,
  readNamedMaps,
  writeNamedMap,
} from "./utils/namedMaps.js"
import { normalizeIndex, sliceIndices, take } from "./utils/slice.js"

/**
 * Description of a single row/column of a Label axis.
 */
export interface LabelElement {
  name: string
  label: LabelTable
  meta: Metadata
}

function copyLabelEntry(key: number, entry: LabelEntry): LabelEntry {
  const { rgba } = entry
  if (rgba.length !== 4) {
    throw new InvalidLabelColorError(
      `Colour of label ${key} should have 4 components (RGBA), not ${rgba.length}`,
    )
  }
  if (!rgba.every((c) => Number.isFinite(c) && c >= 0 && c <= 1)) {
    throw new InvalidLabelColorError(
      `Colour components of label ${key} should lie between 0 and 1, got [${rgba.join(", ")}]`,
    )
  }
  return Object.freeze({
    label: entry.label,
    rgba: Object.freeze([rgba[0], rgba[1], rgba[2], rgba[3]] as const),
  })
}

function isLabelMap(
  input: LabelTableInput,
): input is ReadonlyMap<number, LabelEntry> {
  return input instanceof Map
}

/**
 * Validate and copy a label lookup table.
 *
 * @throws ShapeMismatchError if a key is not an integer
 * @throws InvalidLabelColorError if a colour is not four values in [0, 1]
 */
export function createLabelTable(input: LabelTableInput): LabelTable {
  const entries: [number, LabelEntry][] = isLabelMap(input)
    ? [...input.entries()]
    : Object.entries(input).map(([key, entry]): [number, LabelEntry] => [
        Number(key),
        entry,
      ])
  const table = new Map<number, LabelEntry>()
  for (const [key, entry] of entries) {
    if (!Number.isInteger(key)) {
      throw new ShapeMismatchError(`Label keys should be integers, not ${key}`)
    }
    table.set(key, copyLabelEntry(key, entry))
  }
  return table
}

function readLabelTable(entries: readonly LabelTableEntry[] | undefined): LabelTable {
  const table = new Map<number, LabelEntry>()
  for (const e of entries ?? []) {
    table.set(e.key, { label: e.label, rgba: [e.red, e.green, e.blue, e.alpha] })
  }
  return table
}

function writeLabelTable(table: LabelTable): LabelTableEntry[] {
  return [...table].map(([key, { label, rgba }]) => ({
    key,
    label,
    red: rgba[0],
    green: rgba[1],
    blue: rgba[2],
    alpha: rgba[3],
  }))
}

/**
 * Rows/columns that each carry a name, a label lookup table and optional
 * metadata, such as the maps of a dlabel file.
 *
 * Every row/column has its own independent table. Use
 * {@link Scalar.toLabel} to share one table between all of them.
 */
export class Label implements Axis<Label, LabelElement> {
  readonly kind = "label" as const
  readonly name: readonly string[]
  readonly label: readonly LabelTable[]
  readonly meta: readonly Metadata[]

  /**
   * @param name - Name of each row/column
   * @param label - Lookup table of each row/column
   * @param meta - Metadata of each row/column (default: empty records)
   */
  constructor(
    name: readonly string[],
    label: readonly LabelTableInput[],
    meta?: readonly Metadata[],
  ) {
    this.name = Object.freeze([...name])
    if (label.length !== this.name.length) {
      throw new ShapeMismatchError(
        `Input label has incorrect length (${label.length}) for Label axis with ${this.name.length} elements`,
      )
    }
    this.label = Object.freeze(label.map(createLabelTable))
    this.meta = copyMetadata(meta, this.name.length, "Label")
    Object.freeze(this)
  }

  /**
   * Create a Label axis from a header matrix indices map.
   */
  static fromMapping(mim: LabelsMap): Label {
    const { names, meta } = readNamedMaps(mim.namedMaps)
    const tables = mim.namedMaps.map((nm) => readLabelTable(nm.labelTable))
    return new Label(names, tables, meta)
  }

  get length(): number {
    return this.name.length
  }

  toMapping(dim: number): LabelsMap {
    return {
      indicesMapToDataType: "CIFTI_INDEX_TYPE_LABELS",
      appliesToMatrixDimension: [dim],
      namedMaps: this.name.map((name, i) => ({
        ...writeNamedMap(name, this.meta[i]),
        labelTable: writeLabelTable(this.label[i]),
      })),
    }
  }

  getElement(index: number): LabelElement {
    const i = normalizeIndex(index, this.length)
    return { name: this.name[i], label: this.label[i], meta: this.meta[i] }
  }

  slice(start?: number, stop?: number, step?: number): Label {
    return this.take(sliceIndices({ start, stop, step }, this.length))
  }

  index(selector: IndexSelector): LabelElement
  index(selector: RangeSelector | IndicesSelector): Label
  index(selector: AxisSelector): LabelElement | Label
  index(selector: AxisSelector): LabelElement | Label {
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

  private take(indices: number[]): Label {
    return new Label(
      take(this.name, indices),
      take(this.label, indices),
      take(this.meta, indices),
    )
  }

  /**
   * Drop the lookup tables, keeping names and metadata.
   */
  toScalar(): Scalar {
    return new Scalar(this.name, this.meta)
  }

  concat(other: CiftiAxis): Label | NotSupported {
    if (!(other instanceof Label)) return NOT_SUPPORTED
    return new Label(
      [...this.name, ...other.name],
      [...this.label, ...other.label],
      [...this.meta, ...other.meta],
    )
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Label &&
      arraysEqual(this.name, other.name) &&
      this.meta.every((m, i) => metadataEqual(m, other.meta[i])) &&
      this.label.every((table, i) => labelTablesEqual(table, other.label[i]))
    )
  }
}
