// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { LRUCache } from "lru-cache"

import { InvalidStructureNameError } from "./errors.js"

/**
 * The brain structure names recognised by CIFTI-2.
 */
export const CIFTI_BRAIN_STRUCTURES = [
  "CIFTI_STRUCTURE_ACCUMBENS_LEFT",
  "CIFTI_STRUCTURE_ACCUMBENS_RIGHT",
  "CIFTI_STRUCTURE_ALL_WHITE_MATTER",
  "CIFTI_STRUCTURE_ALL_GREY_MATTER",
  "CIFTI_STRUCTURE_AMYGDALA_LEFT",
  "CIFTI_STRUCTURE_AMYGDALA_RIGHT",
  "CIFTI_STRUCTURE_BRAIN_STEM",
  "CIFTI_STRUCTURE_CAUDATE_LEFT",
  "CIFTI_STRUCTURE_CAUDATE_RIGHT",
  "CIFTI_STRUCTURE_CEREBELLAR_WHITE_MATTER_LEFT",
  "CIFTI_STRUCTURE_CEREBELLAR_WHITE_MATTER_RIGHT",
  "CIFTI_STRUCTURE_CEREBELLUM",
  "CIFTI_STRUCTURE_CEREBELLUM_LEFT",
  "CIFTI_STRUCTURE_CEREBELLUM_RIGHT",
  "CIFTI_STRUCTURE_CEREBRAL_WHITE_MATTER_LEFT",
  "CIFTI_STRUCTURE_CEREBRAL_WHITE_MATTER_RIGHT",
  "CIFTI_STRUCTURE_CORTEX",
  "CIFTI_STRUCTURE_CORTEX_LEFT",
  "CIFTI_STRUCTURE_CORTEX_RIGHT",
  "CIFTI_STRUCTURE_DIENCEPHALON_VENTRAL_LEFT",
  "CIFTI_STRUCTURE_DIENCEPHALON_VENTRAL_RIGHT",
  "CIFTI_STRUCTURE_HIPPOCAMPUS_LEFT",
  "CIFTI_STRUCTURE_HIPPOCAMPUS_RIGHT",
  "CIFTI_STRUCTURE_INVALID",
  "CIFTI_STRUCTURE_OTHER",
  "CIFTI_STRUCTURE_OTHER_GREY_MATTER",
  "CIFTI_STRUCTURE_OTHER_WHITE_MATTER",
  "CIFTI_STRUCTURE_PALLIDUM_LEFT",
  "CIFTI_STRUCTURE_PALLIDUM_RIGHT",
  "CIFTI_STRUCTURE_PUTAMEN_LEFT",
  "CIFTI_STRUCTURE_PUTAMEN_RIGHT",
  "CIFTI_STRUCTURE_THALAMUS_LEFT",
  "CIFTI_STRUCTURE_THALAMUS_RIGHT",
] as const

/**
 * Canonical CIFTI-2 brain structure name, e.g. `CIFTI_STRUCTURE_CORTEX_LEFT`.
 */
export type StructureName = (typeof CIFTI_BRAIN_STRUCTURES)[number]

/** Hemisphere part of a structure name. */
export type Orientation = "left" | "right" | "both"

/**
 * Free-form structure name input: a string such as `"CortexLeft"`,
 * `"left_cortex"` or `"brain_stem"`, or a (structure, orientation) tuple
 * in either order.
 */
export type StructureNameInput =
  | string
  | readonly [string]
  | readonly [string, string]

/** Default number of resolved names kept by a resolver. */
export const DEFAULT_STRUCTURE_CACHE_SIZE = 256

const ORIENTATIONS: readonly Orientation[] = ["left", "right", "both"]

/**
 * Options for creating a StructureNameResolver.
 */
export interface StructureNameResolverOptions {
  /**
   * Closed set of valid canonical names, a subset of the CIFTI-2
   * structures (default: all of them).
   */
  vocabulary?: Iterable<StructureName>
  /**
   * Maximum number of resolved inputs to memoize
   * (default: DEFAULT_STRUCTURE_CACHE_SIZE).
   */
  cacheSize?: number
}

function isOrientation(value: string): value is Orientation {
  return (ORIENTATIONS as readonly string[]).includes(value)
}

/**
 * Split a free-form name into its structure and orientation parts.
 *
 * Orientations are looked for at the start and then at the end of the
 * name, for `left`, `right` and `both` in turn. A single `_` or space
 * separating the orientation from the structure is dropped.
 */
function splitOrientation(name: string): [string, string] {
  const lower = name.toLowerCase()
  for (const orientation of ORIENTATIONS) {
    const n = orientation.length
    if (lower.startsWith(orientation)) {
      const separated = name.charAt(n) === "_" || name.charAt(n) === " "
      return [name.slice(separated ? n + 1 : n), orientation]
    }
    if (lower.endsWith(orientation)) {
      const sep = name.charAt(name.length - n - 1)
      const separated = sep === "_" || sep === " "
      return [name.slice(0, name.length - (separated ? n + 1 : n)), orientation]
    }
  }
  return [name, "both"]
}

/**
 * Resolves free-form anatomical region names to canonical CIFTI-2
 * structure names.
 *
 * @example
 * ```typescript
 * const resolver = new StructureNameResolver()
 * resolver.canonicalize("left_cortex") // "CIFTI_STRUCTURE_CORTEX_LEFT"
 * resolver.canonicalize("CortexRight") // "CIFTI_STRUCTURE_CORTEX_RIGHT"
 * resolver.canonicalize(["thalamus", "left"]) // "CIFTI_STRUCTURE_THALAMUS_LEFT"
 * ```
 */
export class StructureNameResolver {
  private readonly vocabulary: ReadonlySet<string>
  private readonly cache: LRUCache<string, StructureName>

  constructor(options: StructureNameResolverOptions = {}) {
    this.vocabulary = new Set<string>(options.vocabulary ?? CIFTI_BRAIN_STRUCTURES)
    this.cache = new LRUCache({
      max: options.cacheSize ?? DEFAULT_STRUCTURE_CACHE_SIZE,
    })
  }

  /**
   * Whether the value is a canonical name in this resolver's vocabulary.
   */
  isStructureName(value: string): value is StructureName {
    return this.vocabulary.has(value)
  }

  /**
   * Convert a name into its canonical CIFTI-2 form.
   *
   * @param input - Canonical name, free-form name, or
   *   (structure, orientation) tuple
   * @returns The canonical structure name
   * @throws InvalidStructureNameError if the interpreted name is not part
   *   of the vocabulary
   */
  canonicalize(input: StructureNameInput): StructureName {
    if (typeof input === "string" && this.isStructureName(input)) {
      return input
    }
    // Tuples are never split on orientation, so they get their own keys
    const key =
      typeof input === "string" ? `s:${input}` : `t:${input.join("\u0000")}`
    const cached = this.cache.get(key)
    if (cached !== undefined) return cached

    let structure: string
    let orientation: string
    if (typeof input === "string") {
      ;[structure, orientation] = splitOrientation(input)
    } else if (input.length === 1) {
      structure = input[0]
      orientation = "both"
    } else {
      ;[structure, orientation] = input
      if (isOrientation(structure.toLowerCase())) {
        ;[orientation, structure] = input
      }
    }

    const proposed =
      orientation.toLowerCase() === "both"
        ? `CIFTI_STRUCTURE_${structure.toUpperCase()}`
        : `CIFTI_STRUCTURE_${structure.toUpperCase()}_${orientation.toUpperCase()}`
    if (!this.isStructureName(proposed)) {
      throw new InvalidStructureNameError(
        typeof input === "string" ? input : `(${input.join(", ")})`,
        proposed,
      )
    }
    this.cache.set(key, proposed)
    return proposed
  }
}

const defaultResolver = new StructureNameResolver()

/**
 * Convert a name into its canonical CIFTI-2 form using the default
 * vocabulary.
 *
 * @see StructureNameResolver.canonicalize
 */
export function canonicalizeStructureName(
  input: StructureNameInput,
): StructureName {
  return defaultResolver.canonicalize(input)
}

/**
 * Whether the value is one of the canonical CIFTI-2 structure names.
 */
export function isStructureName(value: string): value is StructureName {
  return defaultResolver.isStructureName(value)
}
