// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

/** Typed lookups into parsed JSON of unknown shape. Missing paths give `undefined`. */

export type JsonPath = readonly (string | number)[]

export function at(value: unknown, ...path: JsonPath): unknown {
  let current = value
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined
      current = current[key]
    } else {
      if (!isRecord(current)) return undefined
      current = current[key]
    }
  }
  return current
}

export function numberAt(value: unknown, ...path: JsonPath): number | undefined {
  const found = at(value, ...path)
  return typeof found === 'number' ? found : undefined
}

/** Like {@link numberAt}, also accepting numeric strings */
export function numericAt(value: unknown, ...path: JsonPath): number | undefined {
  const found = at(value, ...path)
  if (typeof found === 'number') return found
  if (typeof found === 'string' && found.trim() !== '') {
    const parsed = Number(found)
    return Number.isNaN(parsed) ? undefined : parsed
  }
  return undefined
}

export function stringAt(value: unknown, ...path: JsonPath): string | undefined {
  const found = at(value, ...path)
  return typeof found === 'string' ? found : undefined
}

export function booleanAt(value: unknown, ...path: JsonPath): boolean | undefined {
  const found = at(value, ...path)
  return typeof found === 'boolean' ? found : undefined
}

export function arrayAt(value: unknown, ...path: JsonPath): unknown[] {
  const found = at(value, ...path)
  return Array.isArray(found) ? found : []
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
