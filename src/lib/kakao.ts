// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FetchClient } from './client.js'
import { HttpError, InvalidParameterError } from './errors.js'
import { arrayAt, at, isRecord, numericAt, stringAt } from './json.js'
import { decodeImage, stitchEquirectangular, type RawImage } from './stitch.js'
import { fetchTiles, type FetchTilesOptions, type TileAddress } from './tiles.js'
import { clamp, DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

export const TILE_SIZE = 512
export const MAX_ZOOM = 2
/** Tile grid per zoom level. Zoom 0 is a single thumbnail. */
const COLS = [1, 8, 16]
const ROWS = [1, 4, 8]

/** Panorama type or camera, as numbered by the API */
export enum PanoramaType {
  PANOZIP = 100,
  ROTATOR = 101,
  CAR = 102,
  SKY = 103,
  NAVER_CAR = 200,
  INSTA360 = 201,
  INSTA_TITAN = 202,
  SEA = 203,
  SDMG_OFFICE = 204,
}

const CAR_TYPES: readonly PanoramaType[] = [
  PanoramaType.CAR,
  PanoramaType.NAVER_CAR,
  PanoramaType.INSTA_TITAN,
]

export interface KakaoLink {
  pano: KakaoPanorama
  /** Radians */
  direction: number
}

export interface KakaoPanorama {
  id: number
  lat: number
  lon: number
  /** WCongnamul coordinates, used by map.kakao.com */
  wcongx?: number
  wcongy?: number
  /** Radians */
  heading?: number
  /** Path of the image on the tile server */
  imagePath?: string
  /** UTC, from the image path */
  date?: Date
  streetName?: string
  address?: string
  /** Road category, in Korean */
  streetType?: string
  panoramaType?: PanoramaType
  /** The arrows of the viewer */
  links?: KakaoLink[]
  /** Other captures at the location; only from {@link findPanoramaById} */
  historical?: KakaoPanorama[]
  /** Only from {@link findPanoramaById} */
  neighbors?: KakaoPanorama[]
}

export function isCar(pano: KakaoPanorama): boolean {
  return pano.panoramaType !== undefined && CAR_TYPES.includes(pano.panoramaType)
}

/** Panoramas within `radius` meters (at most 100), up to `limit` of them (at most 100). */
export async function findPanoramas(
  lat: number,
  lon: number,
  { radius = 35, limit = 50, client }: { radius?: number; limit?: number; client: FetchClient },
): Promise<KakaoPanorama[]> {
  const response = await client.getJson(
    'https://rv.map.kakao.com/roadview-search/v2/nodes' +
      `?PX=${lon}&PY=${lat}&RAD=${radius}&PAGE_SIZE=${limit}&INPUT=wgs&TYPE=w&SERVICE=glpano`,
  )
  return parsePanoramas(response)
}

/** Looks up a panorama. Unless `neighbors` is false, a second request lists the panoramas around it. */
export async function findPanoramaById(
  id: number,
  { neighbors = true, client }: { neighbors?: boolean; client: FetchClient },
): Promise<KakaoPanorama | null> {
  const response = await client.getJson(
    `https://rv.map.kakao.com/roadview-search/v2/node/${id}?SERVICE=glpano`,
  )
  if (numericAt(response, 'street_view', 'cnt') === 0) return null
  const pano = parsePanorama(at(response, 'street_view', 'street'))
  if (pano && neighbors) {
    pano.neighbors = await findPanoramas(pano.lat, pano.lon, { client })
  }
  return pano
}

export function parsePanoramas(response: unknown): KakaoPanorama[] {
  if (numericAt(response, 'street_view', 'cnt') === 0) return []
  return arrayAt(response, 'street_view', 'streetList').flatMap((item) => {
    const pano = parsePanorama(item)
    return pano ? [pano] : []
  })
}

export function parsePanorama(item: unknown): KakaoPanorama | null {
  if (!isRecord(item)) return null
  const id = numericAt(item, 'id')
  const lat = numericAt(item, 'wgsy')
  const lon = numericAt(item, 'wgsx')
  if (id === undefined || lat === undefined || lon === undefined) return null

  const imagePath = stringAt(item, 'img_path')
  return {
    id,
    lat,
    lon,
    wcongx: numericAt(item, 'wcongx'),
    wcongy: numericAt(item, 'wcongy'),
    heading: radians(numericAt(item, 'angle')),
    imagePath,
    // shot_date is sometimes midnight; the image path always has the time
    date: parseDateFromImagePath(imagePath),
    streetName: stringAt(item, 'st_name'),
    address: stringAt(item, 'addr'),
    streetType: stringAt(item, 'st_type'),
    panoramaType: parsePanoramaType(numericAt(item, 'shot_tool')),
    links: parseLinks(at(item, 'spot')),
    historical: parseHistorical(at(item, 'past')),
  }
}

function parseHistorical(past: unknown): KakaoPanorama[] | undefined {
  if (!Array.isArray(past)) return undefined
  return past.flatMap((item) => {
    const pano = parsePanorama(item)
    return pano ? [pano] : []
  })
}

function parseLinks(spots: unknown): KakaoLink[] | undefined {
  if (!Array.isArray(spots)) return undefined
  return spots.flatMap((spot) => {
    const id = numericAt(spot, 'id')
    const lat = numericAt(spot, 'wgsy')
    const lon = numericAt(spot, 'wgsx')
    const direction = numericAt(spot, 'pan')
    if (id === undefined || lat === undefined || lon === undefined || direction === undefined) {
      return []
    }
    const pano = { id, lat, lon, streetName: stringAt(spot, 'st_name') }
    return [{ pano, direction: direction * DEG_TO_RAD }]
  })
}

function parsePanoramaType(value: number | undefined): PanoramaType | undefined {
  return value !== undefined && isPanoramaType(value) ? value : undefined
}

function isPanoramaType(value: number): value is PanoramaType {
  return value in PanoramaType
}

/** The last `_` part of an image path is `YYYYMMDDhhmmss` in UTC. */
export function parseDateFromImagePath(imagePath: string | undefined): Date | undefined {
  const match = imagePath?.match(/_(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/)
  if (!match) return undefined
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number)
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second))
}

function radians(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value * DEG_TO_RAD
}

function requireImagePath(pano: KakaoPanorama): string {
  if (pano.imagePath === undefined) {
    throw new InvalidParameterError(`Panorama ${pano.id} has no image path`)
  }
  return pano.imagePath
}

function tileUrl(imagePath: string, zoom: number, x: number, y: number): string {
  if (zoom === 0) return `https://map.daumcdn.net/map_roadview${imagePath}.jpg`
  const name = imagePath.slice(imagePath.lastIndexOf('/') + 1)
  const index = y * COLS[zoom] + x + 1
  if (zoom === 1) {
    return `https://map.daumcdn.net/map_roadview${imagePath}/${name}_${pad(index, 2)}.jpg`
  }
  return `https://map.daumcdn.net/map_roadview${imagePath}_HD1/${name}_HD1_${pad(index, 3)}.jpg`
}

function pad(value: number, digits: number): string {
  return String(value).padStart(digits, '0')
}

/** Tile list of zoom 1 (8×4) or 2 (16×8). Zoom 0 is one image; other values are clamped. */
export function panoramaTiles(pano: KakaoPanorama, zoom: number): TileAddress[] {
  const imagePath = requireImagePath(pano)
  const level = clamp(Math.floor(zoom), 0, MAX_ZOOM)
  const tiles: TileAddress[] = []
  for (let y = 0; y < ROWS[level]; y++) {
    for (let x = 0; x < COLS[level]; x++) {
      tiles.push({ x, y, url: tileUrl(imagePath, level, x, y) })
    }
  }
  return tiles
}

/**
 * Zoom 2 is missing for some panoramas and the metadata does not say which.
 * Downloads its first tile and falls back to zoom 1 when the server refuses it.
 */
export async function availableZoom(
  pano: KakaoPanorama,
  zoom: number,
  { client, headers }: Pick<FetchTilesOptions, 'client' | 'headers'>,
): Promise<number> {
  const level = clamp(Math.floor(zoom), 0, MAX_ZOOM)
  if (level < MAX_ZOOM) return level
  try {
    await client.getBuffer(tileUrl(requireImagePath(pano), MAX_ZOOM, 0, 0), { headers })
    return MAX_ZOOM
  } catch (e) {
    if (e instanceof HttpError) return MAX_ZOOM - 1
    throw e
  }
}

/** Downloads the equirectangular panorama. Zoom 2 falls back to 1 where it does not exist. */
export async function getPanorama(
  pano: KakaoPanorama,
  { zoom = MAX_ZOOM, ...options }: FetchTilesOptions & { zoom?: number },
): Promise<RawImage> {
  const level = await availableZoom(pano, zoom, options)
  const tiles = panoramaTiles(pano, level)
  if (level === 0) {
    const [thumbnail] = tiles
    const buffer = await options.client.getBuffer(thumbnail.url, { headers: options.headers })
    const image = await decodeImage(buffer)
    options.onTile?.(thumbnail)
    return image
  }
  const buffers = await fetchTiles(tiles, options)
  const width = COLS[level] * TILE_SIZE
  const height = ROWS[level] * TILE_SIZE
  return stitchEquirectangular(buffers, width, height, TILE_SIZE, TILE_SIZE)
}

/**
 * Kakao Map link opening the newest capture at the panorama's location;
 * older captures cannot be linked to. Angles in radians.
 */
export function permalink(
  pano: Pick<KakaoPanorama, 'id' | 'wcongx' | 'wcongy'>,
  { heading = 0, pitch = 0 } = {},
): string {
  return (
    'https://map.kakao.com/?map_type=TYPE_MAP&map_attribute=ROADVIEW' +
    `&panoid=${pano.id}&urlX=${pano.wcongx ?? 0}&urlY=${pano.wcongy ?? 0}` +
    `&pan=${heading * RAD_TO_DEG}&tilt=${pitch * RAD_TO_DEG}&zoom=0&urlLevel=3`
  )
}
