// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * 3x3 rotation matrices (row-major) and unit quaternions.
 *
 * Euler angle sequences are extrinsic: `'xyz'` rotates about the fixed x axis
 * first, then y, then z, so its matrix is `Rz · Ry · Rx`.
 */

export type Mat3 = Float64Array

/** (x, y, z, w) */
export type Quat = readonly [x: number, y: number, z: number, w: number]

export function mat3(...values: number[]): Mat3 {
  return Float64Array.from(values)
}

export function multiply(a: Mat3, b: Mat3): Mat3 {
  const out = new Float64Array(9)
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      out[row * 3 + col] =
        a[row * 3] * b[col] + a[row * 3 + 1] * b[3 + col] + a[row * 3 + 2] * b[6 + col]
    }
  }
  return out
}

export function rotationX(angle: number): Mat3 {
  const c = Math.cos(angle)
  const s = Math.sin(angle)
  return mat3(1, 0, 0, 0, c, -s, 0, s, c)
}

export function rotationY(angle: number): Mat3 {
  const c = Math.cos(angle)
  const s = Math.sin(angle)
  return mat3(c, 0, s, 0, 1, 0, -s, 0, c)
}

export function rotationZ(angle: number): Mat3 {
  const c = Math.cos(angle)
  const s = Math.sin(angle)
  return mat3(c, -s, 0, s, c, 0, 0, 0, 1)
}

/** Extrinsic x, then y, then z */
export function fromEulerXYZ(x: number, y: number, z: number): Mat3 {
  return multiply(rotationZ(z), multiply(rotationY(y), rotationX(x)))
}

/**
 * Inverse of an extrinsic z, then x, then y rotation (`Ry · Rx · Rz`).
 * Returns `[z, x, y]`; x is in [-π/2, π/2].
 */
export function toEulerZXY(m: Mat3): [z: number, x: number, y: number] {
  const x = Math.asin(Math.max(-1, Math.min(1, -m[5])))
  const z = Math.atan2(m[3], m[4])
  const y = Math.atan2(m[2], m[8])
  return [z, x, y]
}

export function fromQuat([x, y, z, w]: Quat): Mat3 {
  const n = Math.hypot(x, y, z, w)
  x /= n
  y /= n
  z /= n
  w /= n
  return mat3(
    1 - 2 * (y * y + z * z),
    2 * (x * y - z * w),
    2 * (x * z + y * w),
    2 * (x * y + z * w),
    1 - 2 * (x * x + z * z),
    2 * (y * z - x * w),
    2 * (x * z - y * w),
    2 * (y * z + x * w),
    1 - 2 * (x * x + y * y),
  )
}

export function toQuat(m: Mat3): Quat {
  const trace = m[0] + m[4] + m[8]
  if (trace > 0) {
    const s = Math.sqrt(trace + 1) * 2
    return [(m[7] - m[5]) / s, (m[2] - m[6]) / s, (m[3] - m[1]) / s, s / 4]
  }
  if (m[0] > m[4] && m[0] > m[8]) {
    const s = Math.sqrt(1 + m[0] - m[4] - m[8]) * 2
    return [s / 4, (m[1] + m[3]) / s, (m[2] + m[6]) / s, (m[7] - m[5]) / s]
  }
  if (m[4] > m[8]) {
    const s = Math.sqrt(1 + m[4] - m[0] - m[8]) * 2
    return [(m[1] + m[3]) / s, s / 4, (m[5] + m[7]) / s, (m[2] - m[6]) / s]
  }
  const s = Math.sqrt(1 + m[8] - m[0] - m[4]) * 2
  return [(m[2] + m[6]) / s, (m[5] + m[7]) / s, s / 4, (m[3] - m[1]) / s]
}
