// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FetchClient } from './client.js'
import { InvalidParameterError } from './errors.js'
import { boundingBoxAroundPoint } from './geo.js'
import { arrayAt, isRecord, numberAt, numericAt, stringAt } from './json.js'
import {
  CubemapStitchingMethod,
  stitchCubemapFaces,
  stitchQuadrants,
  type RawImage,
} from './stitch.js'
import { fetchFaceTiles, type FetchTilesOptions, type TileAddress } from './tiles.js'
import { DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

const METADATA_ENDPOINT = 'https://t.ssl.ak.tiles.virtualearth.net/tiles/cmd/StreetSideBubbleMetaData'
const TILE_ENDPOINT = 'https://t.ssl.ak.tiles.virtualearth.net/tiles/hs'

export const TILE_SIZE = 256
export const MAX_ZOOM = 3

export interface StreetsidePanorama {
  id: number
  lat: number
  lon: number
  /** Capture time as reported, read as UTC */
  date: Date
  /** ID of the next panorama in the sequence */
  next?: number
  previous?: number
  elevation?: number
  /** Radians */
  heading?: number
  pitch?: number
  roll?: number
  maxZoom?: number
}

/** Panoramas within a square of side `2·radius` meters around a point. */
export async function findPanoramas(
  lat: number,
  lon: number,
  { radius = 25, limit = 50, client }: { radius?: number; limit?: number; client: FetchClient },
): Promise<StreetsidePanorama[]> {
  const { topLeft, bottomRight } = boundingBoxAroundPoint(lat, lon, radius)
  return findPanoramasInBbox(topLeft.lat, topLeft.lon, bottomRight.lat, bottomRight.lon, {
    limit,
    client,
  })
}

export async function findPanoramasInBbox(
  north: number,
  west: number,
  south: number,
  east: number,
  { limit = 50, client }: { limit?: number; client: FetchClient },
): Promise<StreetsidePanorama[]> {
  const params = new URLSearchParams({
    count: String(limit),
    north: String(north),
    south: String(south),
    east: String(east),
    west: String(west),
  })
  return parsePanoramas(await client.getJson(`${METADATA_ENDPOINT}?${params}`))
}

export async function findPanoramaById(
  id: number,
  { client }: { client: FetchClient },
): Promise<StreetsidePanorama | null> {
  const response = await client.getJson(`${METADATA_ENDPOINT}?id=${id}`)
  return parsePanoramas(response)[0] ?? null
}

/** The first element of a response is the elapsed time; panoramas follow. */
export function parsePanoramas(response: unknown): StreetsidePanorama[] {
  return arrayAt(response)
    .slice(1)
    .flatMap((item) => {
      const pano = parsePanorama(item)
      return pano ? [pano] : []
    })
}

export function parsePanorama(item: unknown): StreetsidePanorama | null {
  if (!isRecord(item)) return null
  const id = numberAt(item, 'id')
  const lat = numberAt(item, 'la')
  const lon = numberAt(item, 'lo')
  const date = parseCaptureDate(stringAt(item, 'cd') ?? '')
  if (id === undefined || lat === undefined || lon === undefined || !date) return null

  const heading = numberAt(item, 'he')
  const pitch = numberAt(item, 'pi')
  const roll = numberAt(item, 'ro')
  return {
    id,
    lat,
    lon,
    date,
    next: numberAt(item, 'ne'),
    previous: numberAt(item, 'pr'),
    elevation: numberAt(item, 'al'),
    heading: heading === undefined ? undefined : heading * DEG_TO_RAD,
    pitch: pitch === undefined ? undefined : pitch * DEG_TO_RAD,
    roll: roll === undefined ? undefined : roll * DEG_TO_RAD,
    maxZoom: numericAt(item, 'ml'),
  }
}

/** Parses `M/D/YYYY h:mm:ss AM` as UTC. */
export function parseCaptureDate(text: string): Date | null {
  const match = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2}):(\d{2}) ([AP]M)$/)
  if (!match) return null
  const [, month, day, year, hour, minute, second, meridiem] = match
  const hour24 = (Number(hour) % 12) + (meridiem === 'PM' ? 12 : 0)
  return new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), hour24, Number(minute), Number(second)),
  )
}

export function toBase4(n: number): string {
  return n.toString(4)
}

export function fromBase4(n: string): number {
  return parseInt(n, 4)
}

/**
 * Tiles of the six faces (front, right, back, left, top, bottom). Each face has
 * `4^zoom` tiles in nested quadrant order; `x` is the position in that order.
 */
export function panoramaTiles(id: number, zoom: number): TileAddress[][] {
  if (zoom > MAX_ZOOM || zoom < 0 || !Number.isInteger(zoom)) {
    throw new InvalidParameterError(`Zoom must be an integer from 0 to ${MAX_ZOOM}, got ${zoom}`)
  }
  const idBase4 = toBase4(id).padStart(16, '0')
  const subdivisions = 4 ** zoom

  return Array.from({ length: 6 }, (_, face) => {
    const faceBase4 = toBase4(face + 1).padStart(2, '0')
    return Array.from({ length: subdivisions }, (_, subdivision) => {
      const subdivisionBase4 = zoom < 1 ? '' : toBase4(subdivision).padStart(zoom, '0')
      return {
        x: subdivision,
        y: 0,
        url: `${TILE_ENDPOINT}${idBase4}${faceBase4}${subdivisionBase4}.jpg?g=0`,
      }
    })
  })
}

export function getPanorama(
  id: number,
  options: FetchTilesOptions & { zoom?: number; layout: CubemapStitchingMethod.NONE },
): Promise<RawImage[]>
export function getPanorama(
  id: number,
  options: FetchTilesOptions & {
    zoom?: number
    layout?: CubemapStitchingMethod.NET | CubemapStitchingMethod.ROW
  },
): Promise<RawImage>
export function getPanorama(
  id: number,
  options: FetchTilesOptions & { zoom?: number; layout?: CubemapStitchingMethod },
): Promise<RawImage | RawImage[]>
export async function getPanorama(
  id: number,
  {
    zoom = MAX_ZOOM,
    layout = CubemapStitchingMethod.NET,
    ...options
  }: FetchTilesOptions & { zoom?: number; layout?: CubemapStitchingMethod },
): Promise<RawImage | RawImage[]> {
  const faceTiles = await fetchFaceTiles(panoramaTiles(id, zoom), options)
  const faces = await Promise.all(
    faceTiles.map((tiles) => {
      const ordered: Buffer[] = []
      for (let i = 0; i < tiles.size; i++) {
        const tile = tiles.get(i, 0)
        if (tile) ordered.push(tile)
      }
      return stitchQuadrants(ordered, TILE_SIZE)
    }),
  )
  return stitchCubemapFaces(faces, TILE_SIZE * 2 ** zoom, layout)
}

/** Bing Maps link opening the panorama closest to a location. Angles in radians. */
export function permalink(
  lat: number,
  lon: number,
  { heading = 0, pitch = 0, mapZoom = 17 } = {},
): string {
  return (
    `https://www.bing.com/maps?cp=${lat}%7E${lon}&lvl=${mapZoom}&v=2&sV=1` +
    `&pi=${pitch * RAD_TO_DEG}&style=x&dir=${heading * RAD_TO_DEG}`
  )
}
