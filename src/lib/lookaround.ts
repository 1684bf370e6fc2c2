// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import * as egm96 from 'egm96-universal'
import { InvalidParameterError, ReprojectionUnavailableError } from './errors.js'
import { tileToWgs84, WGS84_A, WGS84_F, type GeoPoint, type ProjectedPoint } from './geo.js'
import { unavailableReprojector, type CameraMetadata, type Reprojector } from './reproject.js'
import { fromEulerXYZ, fromQuat, mat3, multiply, toEulerZXY, toQuat } from './rotation.js'
import type { RawImage } from './stitch.js'
import { DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

/** Face indices of a Look Around panorama */
export enum Face {
  BACK = 0,
  LEFT = 1,
  FRONT = 2,
  RIGHT = 3,
  TOP = 4,
  BOTTOM = 5,
}

export interface PanoramaOrientation {
  /** Radians; 0 is north, π/2 is west */
  heading: number
  pitch: number
  roll: number
}

/** Coverage tiles and tile positions are always at this zoom level */
const COVERAGE_ZOOM = 17

const TILE_SIZE = 256
const WEB_MERCATOR_SIZE = 40086474.44
const RAW_ANGLE_RANGE = 16383

/** Absolute position of a panorama from its offset within a z17 coverage tile. */
export function tileOffsetToWgs84(
  xOffset: number,
  yOffset: number,
  tileX: number,
  tileY: number,
): GeoPoint {
  const x = tileX + xOffset / 64 / (TILE_SIZE - 1)
  const y = tileY + (255 - yOffset / 64) / (TILE_SIZE - 1)
  return tileToWgs84(x, y, COVERAGE_ZOOM)
}

/** Web Mercator coordinates of a tile corner, on the y axis of the map's tile pyramid. */
export function tileToMercator(tileX: number, tileY: number, zoom: number): ProjectedPoint {
  const scale = 2 ** zoom
  return {
    x: (tileX / scale - 0.5) * WEB_MERCATOR_SIZE,
    y: ((scale + ~tileY) / scale - 0.5) * WEB_MERCATOR_SIZE,
  }
}

/**
 * Converts a raw altitude to meters. `altitude` is above the ellipsoid;
 * `elevation` is above the EGM96 geoid.
 */
export function convertAltitude(
  rawAltitude: number,
  lat: number,
  lon: number,
  tileX: number,
  tileY: number,
): { altitude: number; elevation: number } {
  const topLeft = mercatorToEcef(tileToMercator(tileX, tileY, COVERAGE_ZOOM))
  const topRight = mercatorToEcef(tileToMercator(tileX + 1, tileY, COVERAGE_ZOOM))
  const span = Math.hypot(topLeft[0] - topRight[0], topLeft[1] - topRight[1])

  const altitude = span * (rawAltitude / RAW_ANGLE_RANGE)
  const geoidHeight = egm96.egm96ToEllipsoid(lat, lon, 0)
  return { altitude, elevation: altitude - geoidHeight }
}

/** Converts the raw yaw, pitch and roll of a panorama to the rotation of its photosphere. */
export function convertPanoOrientation(
  lat: number,
  lon: number,
  rawYaw: number,
  rawPitch: number,
  rawRoll: number,
): PanoramaOrientation {
  const yaw = (rawYaw / RAW_ANGLE_RANGE) * 2 * Math.PI
  const pitch = (rawPitch / RAW_ANGLE_RANGE) * 2 * Math.PI
  const roll = (rawRoll / RAW_ANGLE_RANGE) * 2 * Math.PI

  const rotation = multiply(fromEulerXYZ(yaw, pitch, roll), fromQuat([0.5, 0.5, -0.5, -0.5]))
  const [x, y, z, w] = toQuat(rotation)
  const swapped = fromQuat([w, -z, -x, y])

  const local = multiply(localEcefBasis(lat, lon), swapped)
  const [ez, ex, ey] = toEulerZXY(local)
  return { heading: ey, pitch: -ex, roll: -ez }
}

/**
 * Reprojects the six faces, in {@link Face} order, to one equirectangular image.
 * Needs a caller-supplied reprojector.
 */
export async function toEquirectangular(
  faces: readonly RawImage[],
  cameras: readonly CameraMetadata[],
  { reprojector = unavailableReprojector }: { reprojector?: Reprojector } = {},
): Promise<RawImage> {
  if (faces.length !== 6 || cameras.length !== 6) {
    throw new InvalidParameterError(
      `Expected 6 faces and 6 cameras, got ${faces.length} and ${cameras.length}`,
    )
  }
  if (!reprojector.available) throw new ReprojectionUnavailableError()
  return reprojector.toEquirectangular(faces, cameras)
}

function localEcefBasis(lat: number, lon: number) {
  const phi = lat * DEG_TO_RAD
  const lambda = lon * DEG_TO_RAD
  const cosLat = Math.cos(phi)
  const sinLat = Math.sin(phi)
  const cosLon = Math.cos(lambda)
  const sinLon = Math.sin(lambda)
  // prettier-ignore
  return mat3(
    -sinLon, cosLon, 0,
    cosLon * cosLat, sinLon * cosLat, sinLat,
    cosLon * sinLat, sinLon * sinLat, -cosLat,
  )
}

function mercatorToEcef({ x, y }: ProjectedPoint): [x: number, y: number, z: number] {
  const lon = (x / WGS84_A) * RAD_TO_DEG
  const lat = (2 * Math.atan(Math.exp(y / WGS84_A)) - Math.PI / 2) * RAD_TO_DEG
  return geodeticToEcef(lat, lon, 0)
}

function geodeticToEcef(lat: number, lon: number, height: number): [x: number, y: number, z: number] {
  const phi = lat * DEG_TO_RAD
  const lambda = lon * DEG_TO_RAD
  const e2 = WGS84_F * (2 - WGS84_F)
  const n = WGS84_A / Math.sqrt(1 - e2 * Math.sin(phi) ** 2)
  return [
    (n + height) * Math.cos(phi) * Math.cos(lambda),
    (n + height) * Math.cos(phi) * Math.sin(lambda),
    (n * (1 - e2) + height) * Math.sin(phi),
  ]
}
