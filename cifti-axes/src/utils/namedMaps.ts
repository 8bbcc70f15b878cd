// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { ShapeMismatchError } from "../errors.js"
import type { NamedMap } from "../mapping.js"
import type { Metadata } from "../types.js"

/**
 * Copy per-row metadata, defaulting to empty records.
 *
 * @throws ShapeMismatchError if the number of records differs from `size`
 */
export function copyMetadata(
  meta: readonly Metadata[] | undefined,
  size: number,
  axisName: string,
): readonly Metadata[] {
  if (meta === undefined) {
    return Object.freeze(Array.from({ length: size }, () => Object.freeze({})))
  }
  if (meta.length !== size) {
    throw new ShapeMismatchError(
      `Input meta has incorrect length (${meta.length}) for ${axisName} axis with ${size} elements`,
    )
  }
  return Object.freeze(meta.map((m) => Object.freeze({ ...m })))
}

/**
 * Names and metadata of the named maps in a header.
 */
export function readNamedMaps(namedMaps: readonly NamedMap[]): {
  names: string[]
  meta: Metadata[]
} {
  return {
    names: namedMaps.map((nm) => nm.mapName),
    meta: namedMaps.map((nm) => ({ ...(nm.metadata ?? {}) })),
  }
}

/**
 * Write a named map, leaving out empty metadata.
 */
export function writeNamedMap(name: string, meta: Metadata): NamedMap {
  return Object.keys(meta).length === 0
    ? { mapName: name }
    : { mapName: name, metadata: { ...meta } }
}
