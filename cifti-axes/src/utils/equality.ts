// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { LabelTable, Metadata, VoxelIndex } from "../types.js"

export function arraysEqual<T>(a: readonly T[], b: readonly T[]): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

export function voxelsEqual(a: VoxelIndex, b: VoxelIndex): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2]
}

export function voxelListsEqual(
  a: readonly VoxelIndex[],
  b: readonly VoxelIndex[],
): boolean {
  return a.length === b.length && a.every((voxel, i) => voxelsEqual(voxel, b[i]))
}

/**
 * Compare two maps by key set and per-key value.
 */
export function mapsEqual<K, V>(
  a: ReadonlyMap<K, V>,
  b: ReadonlyMap<K, V>,
  valuesEqual: (x: V, y: V) => boolean = (x, y) => x === y,
): boolean {
  if (a.size !== b.size) return false
  for (const [key, value] of a) {
    if (!b.has(key)) return false
    const other = b.get(key)
    if (other === undefined || !valuesEqual(value, other)) return false
  }
  return true
}

export function metadataEqual(a: Metadata, b: Metadata): boolean {
  const keys = Object.keys(a)
  if (keys.length !== Object.keys(b).length) return false
  return keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key])
}

export function labelTablesEqual(a: LabelTable, b: LabelTable): boolean {
  return mapsEqual(
    a,
    b,
    (x, y) =>
      x.label === y.label &&
      x.rgba.length === y.rgba.length &&
      x.rgba.every((c, i) => c === y.rgba[i]),
  )
}
