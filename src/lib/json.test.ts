// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, it } from 'vitest'
import { arrayAt, at, booleanAt, isRecord, numberAt, numericAt, stringAt } from './json.js'

const doc: unknown = JSON.parse('{"a":[1,{"b":"x","c":true}],"n":"42","e":"","s":"abc"}')

describe('at', () => {
  it('walks objects and arrays', () => {
    expect(at(doc, 'a', 1, 'b')).toBe('x')
    expect(at(doc, 'a', 0)).toBe(1)
  })

  it('returns undefined when the shape does not match', () => {
    expect(at(doc, 'a', 'b')).toBeUndefined()
    expect(at(doc, 0)).toBeUndefined()
    expect(at(doc, 'missing', 'deeper')).toBeUndefined()
    expect(at(null, 'a')).toBeUndefined()
  })

  it('returns the value itself for an empty path', () => {
    expect(at(doc)).toBe(doc)
  })
})

describe('typed lookups', () => {
  it('checks the type of the found value', () => {
    expect(numberAt(doc, 'a', 0)).toBe(1)
    expect(numberAt(doc, 'n')).toBeUndefined()
    expect(stringAt(doc, 'a', 1, 'b')).toBe('x')
    expect(stringAt(doc, 'a', 0)).toBeUndefined()
    expect(booleanAt(doc, 'a', 1, 'c')).toBe(true)
    expect(booleanAt(doc, 'a', 1, 'b')).toBeUndefined()
  })

  it('reads numeric strings with numericAt', () => {
    expect(numericAt(doc, 'n')).toBe(42)
    expect(numericAt(doc, 'a', 0)).toBe(1)
    expect(numericAt(doc, 'e')).toBeUndefined()
    expect(numericAt(doc, 's')).toBeUndefined()
  })

  it('gives an empty array for missing arrays', () => {
    expect(arrayAt(doc, 'a')).toHaveLength(2)
    expect(arrayAt(doc, 's')).toEqual([])
    expect(arrayAt(doc, 'missing')).toEqual([])
  })
})

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true)
    expect(isRecord([])).toBe(false)
    expect(isRecord(null)).toBe(false)
    expect(isRecord('x')).toBe(false)
  })
})
