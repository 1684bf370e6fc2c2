// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FetchClient } from './client.js'
import { InvalidParameterError } from './errors.js'
import { arrayAt, at, booleanAt, isRecord, numberAt, numericAt, stringAt } from './json.js'
import {
  cropImage,
  CubemapStitchingMethod,
  decodeImage,
  stitchCubemapFace,
  stitchCubemapFaces,
  type RawImage,
} from './stitch.js'
import { fetchFaceTiles, type FetchTilesOptions, type TileAddress } from './tiles.js'
import { clamp, DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

export const TILE_SIZE = 512
const PREVIEW_FACE_SIZE = 256
/** Face names in URLs, in the order front, right, back, left, up, down */
const FACE_NAMES = ['f', 'r', 'b', 'l', 'u', 'd'] as const
/** Positions of front, right, back, left, up, down in the zoom 0 strip */
const PREVIEW_FACE_ORDER = [1, 2, 3, 0, 5, 4] as const
/** Capture times are Korea Standard Time */
const KST_OFFSET = '+09:00'

export enum PanoramaType {
  AIR = 1,
  CAR = 3,
  BICYCLE = 4,
  INSIDE = 5,
  INTERIOR = 7,
  JIMMY_JIB = 8,
  INDOOR = 10,
  UNDERWATER = 12,
  TREKKER = 13,
  INDOOR_3D = 100,
}

export interface NaverLink {
  pano: NaverPanorama
  /** Radians */
  direction: number
}

export interface NaverPanorama {
  id: string
  lat: number
  lon: number
  /** Radians */
  heading?: number
  /** Highest cubemap zoom; only known from {@link findPanoramaById} */
  maxZoom?: number
  /** ID of the newest panorama at this location */
  timelineId?: string
  date?: Date
  isLatest?: boolean
  title?: string
  description?: string
  panoramaType?: PanoramaType
  /** Meters above sea level */
  elevation?: number
  /** Meters above ground */
  cameraHeight?: number
  links?: NaverLink[]
}

export interface Neighbors {
  street: NaverPanorama[]
  other: NaverPanorama[]
}

export async function findPanorama(
  lat: number,
  lon: number,
  { client }: { client: FetchClient },
): Promise<NaverPanorama | null> {
  const response = await client.getJson(`https://map.naver.com/p/api/panorama/nearby/${lon}/${lat}`)
  return parseNearby(response)
}

export async function findPanoramaById(
  id: string,
  { language = 'en', client }: { language?: string; client: FetchClient },
): Promise<NaverPanorama | null> {
  const response = await client.getJson(
    `https://panorama.map.naver.com/metadata/basic/${id}?lang=${language}&version=2.1.0`,
  )
  if (!isRecord(response) || 'errors' in response) return null
  return parsePanorama(response)
}

/**
 * Other captures at the location. Only older captures than the given one are
 * listed, so pass the `timelineId` of a panorama to get every date.
 */
export async function getHistorical(
  id: string,
  { client }: { client: FetchClient },
): Promise<NaverPanorama[]> {
  const response = await client.getJson(`https://panorama.map.naver.com/metadata/timeline/${id}`)
  if (!isRecord(response) || 'errors' in response) return []
  return parseHistorical(response, id)
}

export async function getNeighbors(
  id: string,
  { client }: { client: FetchClient },
): Promise<Neighbors> {
  const response = await client.getJson(`https://panorama.map.naver.com/metadata/around/${id}?lang=ko`)
  if (!isRecord(response) || 'errors' in response) return { street: [], other: [] }
  return parseNeighbors(response, id)
}

export function parseNearby(response: unknown): NaverPanorama | null {
  if (!isRecord(response) || 'error' in response) return null
  const feature = at(response, 'features', 0)
  const properties = at(feature, 'properties')
  const id = stringAt(properties, 'id')
  const lon = numberAt(feature, 'geometry', 'coordinates', 0)
  const lat = numberAt(feature, 'geometry', 'coordinates', 1)
  if (id === undefined || lat === undefined || lon === undefined) return null

  return {
    id,
    lat,
    lon,
    heading: degrees(numberAt(properties, 'camera_angle', 1)),
    date: parseDate(stringAt(properties, 'photodate')),
    title: stringAt(properties, 'title'),
    description: stringAt(properties, 'description'),
    panoramaType: parsePanoramaType(numericAt(properties, 'type')),
    ...parseHeights(numberAt(properties, 'land_altitude'), numberAt(properties, 'camera_altitude')),
  }
}

export function parsePanorama(response: unknown): NaverPanorama | null {
  const basic = at(response, 'basic')
  const id = stringAt(basic, 'id')
  const lat = numberAt(basic, 'latitude')
  const lon = numberAt(basic, 'longitude')
  if (id === undefined || lat === undefined || lon === undefined) return null

  const segments = numericAt(basic, 'image', 'segment')
  return {
    id,
    lat,
    lon,
    heading: degrees(numberAt(basic, 'camera_angle', 1)),
    maxZoom: segments === undefined ? undefined : Math.floor(segments / 2),
    timelineId: stringAt(basic, 'timeline_id'),
    date: parseDate(stringAt(basic, 'photodate')),
    isLatest: booleanAt(basic, 'latest'),
    title: stringAt(basic, 'title'),
    description: stringAt(basic, 'description'),
    panoramaType: parsePanoramaType(numericAt(basic, 'dtl_type')),
    ...parseHeights(numberAt(basic, 'land_altitude'), numberAt(basic, 'camera_altitude')),
    links: parseLinks(arrayAt(basic, 'links')),
  }
}

/** Rows are `[id, lon, lat, type, "YYYY-MM-DD hh:mm:ss.0"]` after a header row. */
export function parseHistorical(response: unknown, parentId: string): NaverPanorama[] {
  return arrayAt(response, 'timeline', 'panoramas')
    .slice(1)
    .flatMap((row) => {
      const id = stringAt(row, 0)
      const lon = numberAt(row, 1)
      const lat = numberAt(row, 2)
      if (id === undefined || lat === undefined || lon === undefined || id === parentId) return []
      const date = stringAt(row, 4)?.replace(/\.0$/, '')
      return [{ id, lat, lon, panoramaType: parsePanoramaType(numericAt(row, 3)), date: parseDate(date) }]
    })
}

export function parseNeighbors(response: unknown, parentId: string): Neighbors {
  return {
    street: parseNeighborSection(response, 'street', parentId),
    other: parseNeighborSection(response, 'air', parentId),
  }
}

function parseNeighborSection(response: unknown, section: string, parentId: string): NaverPanorama[] {
  return arrayAt(response, 'around', 'panoramas', section)
    .slice(1)
    .flatMap((row) => {
      const id = stringAt(row, 0)
      const lon = numberAt(row, 1)
      const lat = numberAt(row, 2)
      if (id === undefined || lat === undefined || lon === undefined || id === parentId) return []
      return [{ id, lat, lon, ...parseHeights(numberAt(row, 4), numberAt(row, 3)) }]
    })
}

/** Rows are `[id, title, direction, _, lon, lat]` after a header row. */
function parseLinks(rows: unknown[]): NaverLink[] | undefined {
  if (rows.length < 2) return undefined
  return rows.slice(1).flatMap((row) => {
    const id = stringAt(row, 0)
    const lon = numberAt(row, 4)
    const lat = numberAt(row, 5)
    const direction = numericAt(row, 2)
    if (id === undefined || lat === undefined || lon === undefined || direction === undefined) {
      return []
    }
    return [{ pano: { id, lat, lon, title: stringAt(row, 1) }, direction: direction * DEG_TO_RAD }]
  })
}

/** Altitudes are in centimeters */
function parseHeights(
  landAltitude: number | undefined,
  cameraAltitude: number | undefined,
): Pick<NaverPanorama, 'elevation' | 'cameraHeight'> {
  if (landAltitude === undefined) return {}
  const elevation = landAltitude * 0.01
  return {
    elevation,
    cameraHeight: cameraAltitude === undefined ? undefined : cameraAltitude * 0.01 - elevation,
  }
}

function parsePanoramaType(value: number | undefined): PanoramaType | undefined {
  return value !== undefined && isPanoramaType(value) ? value : undefined
}

function isPanoramaType(value: number): value is PanoramaType {
  return value in PanoramaType
}

/** `YYYY-MM-DD hh:mm:ss` in Korea Standard Time */
export function parseDate(text: string | undefined): Date | undefined {
  const match = text?.match(/^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/)
  if (!match) return undefined
  return new Date(`${match[1]}T${match[2]}${KST_OFFSET}`)
}

function degrees(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value * DEG_TO_RAD
}

/**
 * Clamps a zoom to the levels a panorama has. Without a known `maxZoom`,
 * only zoom 0 and 1 are allowed.
 */
export function validateZoom(pano: NaverPanorama, zoom: number): number {
  if (pano.maxZoom === undefined || pano.maxZoom === 0) {
    if (zoom > 1) {
      throw new InvalidParameterError(
        'maxZoom is unknown; call findPanoramaById to fetch it before requesting zoom > 1',
      )
    }
    return Math.max(0, Math.floor(zoom))
  }
  return clamp(Math.floor(zoom), 0, pano.maxZoom)
}

/**
 * Tiles of the six faces for zoom 1 (2×2 per face) or zoom 2 (4×4 per face).
 * Zoom 0 is a single preview image and has no tiles.
 */
export function cubemapTiles(id: string, zoom: number): { faces: TileAddress[][]; cols: number; rows: number } {
  if (zoom !== 1 && zoom !== 2) {
    throw new InvalidParameterError(`Cubemap tiles exist for zoom 1 and 2, got ${zoom}`)
  }
  const cols = zoom * 2
  const rows = zoom * 2
  const sizeLetter = zoom === 1 ? 'M' : 'L'

  const faces = FACE_NAMES.map((face) => {
    const tiles: TileAddress[] = []
    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) {
        tiles.push({
          x: col,
          y: row,
          url: `https://panorama.pstatic.net/image/${id}/512/${sizeLetter}/${face}/${col + 1}/${row + 1}`,
        })
      }
    }
    return tiles
  })
  return { faces, cols, rows }
}

export type PanoramaOptions = FetchTilesOptions & {
  zoom?: number
  /** Download one tile at a time */
  sequential?: boolean
}

export function getPanorama(
  pano: NaverPanorama,
  options: PanoramaOptions & { layout: CubemapStitchingMethod.NONE },
): Promise<RawImage[]>
export function getPanorama(
  pano: NaverPanorama,
  options: PanoramaOptions & { layout?: CubemapStitchingMethod.NET | CubemapStitchingMethod.ROW },
): Promise<RawImage>
export function getPanorama(
  pano: NaverPanorama,
  options: PanoramaOptions & { layout?: CubemapStitchingMethod },
): Promise<RawImage | RawImage[]>
export async function getPanorama(
  pano: NaverPanorama,
  {
    zoom = 2,
    layout = CubemapStitchingMethod.NET,
    sequential = false,
    ...options
  }: PanoramaOptions & { layout?: CubemapStitchingMethod },
): Promise<RawImage | RawImage[]> {
  const level = validateZoom(pano, zoom)

  if (level === 0) {
    const buffer = await options.client.getBuffer(
      `https://panorama.pstatic.net/image/${pano.id}/512/P`,
      { headers: options.headers },
    )
    const strip = await decodeImage(buffer)
    const faces = await Promise.all(
      PREVIEW_FACE_ORDER.map((i) =>
        cropImage(strip, i * PREVIEW_FACE_SIZE, 0, PREVIEW_FACE_SIZE, PREVIEW_FACE_SIZE),
      ),
    )
    return stitchCubemapFaces(faces, PREVIEW_FACE_SIZE, layout)
  }

  const { faces: faceTiles, cols, rows } = cubemapTiles(pano.id, level)
  const tiles = await fetchFaceTiles(faceTiles, { ...options, sequential })
  const faces = await Promise.all(tiles.map((face) => stitchCubemapFace(face, TILE_SIZE, cols, rows)))
  return stitchCubemapFaces(faces, TILE_SIZE * cols, layout)
}

/** Naver Map link opening this panorama. Angles in radians. */
export function permalink(
  id: string,
  { heading = 0, pitch = 10 * DEG_TO_RAD, fov = 80 * DEG_TO_RAD, mapZoom = 17 } = {},
): string {
  const angles = [heading, pitch, fov].map((angle) => angle * RAD_TO_DEG).join(',')
  return `https://map.naver.com/p?c=${mapZoom},0,0,0,adh&p=${id},${angles},Float`
}
