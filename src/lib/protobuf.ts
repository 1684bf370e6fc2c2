// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { assert } from './utils.js'

/**
 * Values of the `!1m2!1d…` URL encoding of protobuf messages used by Google's
 * map endpoints. Message keys are field numbers; arrays are repeated fields.
 */
export type ProtobufValue =
  | boolean
  | string
  | ProtoEnum
  | ProtoInt
  | ProtoFloat
  | ProtoDouble
  | { [key: string]: ProtobufValue }
  | ProtobufValue[]

/** Represents a value that will be serialized as an enum. */
export class ProtoEnum {
  readonly type = 'e'
  constructor(public value: number) {}
}

/** Represents a value that will be serialized as an integer. */
export class ProtoInt {
  readonly type = 'i'
  constructor(public value: number) {}
}

/** Represents a value that will be serialized as a float. */
export class ProtoFloat {
  readonly type = 'f'
  constructor(public value: number) {}
}

/** Represents a value that will be serialized as a double. */
export class ProtoDouble {
  readonly type = 'd'
  constructor(public value: number) {}
}

export function pEnum(value: number): ProtoEnum {
  return new ProtoEnum(value)
}

export function pInt(value: number): ProtoInt {
  return new ProtoInt(value)
}

export function pDouble(value: number): ProtoDouble {
  return new ProtoDouble(value)
}

export function serialize(message: { [key: string]: ProtobufValue }): string {
  return Object.entries(message)
    .flatMap(([k, v]) => serializeField(k, v))
    .join('')
}

function serializeField(key: string, value: ProtobufValue): string[] {
  assert(key.match(/^[0-9]+$/), `Invalid key: ${key}`)
  if (typeof value === 'boolean') return [`!${key}b${value ? 1 : 0}`]
  if (typeof value === 'string') return [`!${key}s${value}`]
  if (
    value instanceof ProtoEnum ||
    value instanceof ProtoInt ||
    value instanceof ProtoFloat ||
    value instanceof ProtoDouble
  ) {
    return [`!${key}${value.type}${value.value}`]
  }
  if (Array.isArray(value)) return value.flatMap((v) => serializeField(key, v))
  const children = Object.entries(value).flatMap(([k, v]) => serializeField(k, v))
  return [`!${key}m${children.length}`, ...children]
}
