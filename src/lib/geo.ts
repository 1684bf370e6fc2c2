// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import gcoord from 'gcoord'
import geographiclib from 'geographiclib-geodesic'
import { DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

/** Coordinate reference systems a lat/lon pair can be expressed in */
export enum Crs {
  WGS84 = 'WGS84',
  /** Baidu's offset lat/lon */
  BD09 = 'BD09',
  /** Baidu Mercator, in projected meters */
  BD09MC = 'BD09MC',
  /** The Chinese "Mars" datum */
  GCJ02 = 'GCJ02',
}

export interface GeoPoint {
  lat: number
  lon: number
}

export interface ProjectedPoint {
  x: number
  y: number
}

export interface TileCoord {
  x: number
  y: number
}

/** WGS84 ellipsoid */
export const WGS84_A = 6378137
export const WGS84_F = 1 / 298.257223563

// Slippy map tiles

/** Converts XYZ tile coordinates, possibly fractional, to WGS84. */
export function tileToWgs84(x: number, y: number, zoom: number): GeoPoint {
  const scale = 2 ** zoom
  const lon = (x / scale) * 360 - 180
  const lat = Math.atan(Math.sinh(Math.PI * (1 - (2 * y) / scale))) * RAD_TO_DEG
  return { lat, lon }
}

/** Converts WGS84 coordinates to the XYZ tile containing them. */
export function wgs84ToTile(lat: number, lon: number, zoom: number): TileCoord {
  const scale = 2 ** zoom
  const x = ((lon + 180) / 360) * scale
  const y = ((1 - Math.asinh(Math.tan(lat * DEG_TO_RAD)) / Math.PI) / 2) * scale
  return { x: Math.floor(x), y: Math.floor(y) }
}

// Geodesics on the WGS84 ellipsoid (Karney, 2013)

const wgs84Geodesic = geographiclib.Geodesic.WGS84

export interface GeodesicDirectResult extends GeoPoint {
  /** Forward azimuth at the destination, degrees */
  azimuth: number
}

/**
 * Solves the direct geodesic problem: the point reached by travelling `distance`
 * meters from (`lat`, `lon`) with initial azimuth `azimuth` (degrees, clockwise from north).
 */
export function geodesicDirect(
  lat: number,
  lon: number,
  azimuth: number,
  distance: number,
): GeodesicDirectResult {
  const result = wgs84Geodesic.Direct(lat, lon, azimuth, distance)
  return { lat: result.lat2 ?? NaN, lon: result.lon2 ?? NaN, azimuth: result.azi2 ?? NaN }
}

export interface GeodesicInverseResult {
  /** Meters */
  distance: number
  /** Initial azimuth at point 1, radians in [-π, π] */
  azimuth1: number
}

/** Solves the inverse geodesic problem between two points. Converges for antipodal points too. */
export function geodesicInverse(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): GeodesicInverseResult {
  const result = wgs84Geodesic.Inverse(lat1, lon1, lat2, lon2)
  return { distance: result.s12 ?? NaN, azimuth1: (result.azi1 ?? NaN) * DEG_TO_RAD }
}

/**
 * Square around a point whose edges are `radius` meters from the center.
 * The corners are therefore `radius·√2` away, at bearings 315° and 135°.
 */
export function boundingBoxAroundPoint(
  lat: number,
  lon: number,
  radius: number,
): { topLeft: GeoPoint; bottomRight: GeoPoint } {
  const distanceToCorner = radius * Math.SQRT2
  const { lat: north, lon: west } = geodesicDirect(lat, lon, 315, distanceToCorner)
  const { lat: south, lon: east } = geodesicDirect(lat, lon, 135, distanceToCorner)
  return { topLeft: { lat: north, lon: west }, bottomRight: { lat: south, lon: east } }
}

/** Initial bearing from point 1 to point 2 in radians, in [0, 2π) */
export function bearing(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const azimuth = wgs84Geodesic.Inverse(lat1, lon1, lat2, lon2).azi1 ?? NaN
  return (((azimuth % 360) + 360) % 360) * DEG_TO_RAD
}

/** https://en.wikipedia.org/wiki/Haversine_formula */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const radius = WGS84_A
  lat1 *= DEG_TO_RAD
  lon1 *= DEG_TO_RAD
  lat2 *= DEG_TO_RAD
  lon2 *= DEG_TO_RAD
  const dLat = lat2 - lat1
  const dLon = lon2 - lon1
  const inner = Math.sin(dLat / 2) ** 2 + Math.sin(dLon / 2) ** 2 * Math.cos(lat1) * Math.cos(lat2)
  return 2 * radius * Math.asin(Math.sqrt(inner))
}

/** Returns a copy of `points` ordered by haversine distance from (`lat`, `lon`), nearest first. */
export function sortByDistance<T extends GeoPoint>(points: readonly T[], lat: number, lon: number): T[] {
  return points
    .map((point) => ({ point, distance: haversineDistance(lat, lon, point.lat, point.lon) }))
    .sort((a, b) => a.distance - b.distance)
    .map(({ point }) => point)
}

// Chinese datums. gcoord takes and returns [lon, lat] / [x, y].

export function wgs84ToBd09mc(lat: number, lon: number): ProjectedPoint {
  const [x, y] = gcoord.transform([lon, lat], gcoord.WGS84, gcoord.BD09MC)
  return { x, y }
}

export function bd09ToBd09mc(lat: number, lon: number): ProjectedPoint {
  const [x, y] = gcoord.transform([lon, lat], gcoord.BD09, gcoord.BD09MC)
  return { x, y }
}

export function gcj02ToBd09mc(lat: number, lon: number): ProjectedPoint {
  const [x, y] = gcoord.transform([lon, lat], gcoord.GCJ02, gcoord.BD09MC)
  return { x, y }
}

export function bd09mcToWgs84(x: number, y: number): GeoPoint {
  const [lon, lat] = gcoord.transform([x, y], gcoord.BD09MC, gcoord.WGS84)
  return { lat, lon }
}

export function bd09mcToGcj02(x: number, y: number): GeoPoint {
  const [lon, lat] = gcoord.transform([x, y], gcoord.BD09MC, gcoord.GCJ02)
  return { lat, lon }
}

/**
 * Converts a coordinate pair in `crs` to BD09MC. For the geographic systems the
 * pair is (lat, lon); for BD09MC it is (x, y) and is returned as is.
 */
export function toBd09mc(coord1: number, coord2: number, crs: Crs): ProjectedPoint {
  switch (crs) {
    case Crs.WGS84:
      return wgs84ToBd09mc(coord1, coord2)
    case Crs.GCJ02:
      return gcj02ToBd09mc(coord1, coord2)
    case Crs.BD09:
      return bd09ToBd09mc(coord1, coord2)
    case Crs.BD09MC:
      return { x: coord1, y: coord2 }
  }
}
