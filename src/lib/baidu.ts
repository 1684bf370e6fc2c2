// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FetchClient } from './client.js'
import { InvalidParameterError } from './errors.js'
import { bd09mcToWgs84, Crs, toBd09mc } from './geo.js'
import { arrayAt, at, numberAt, stringAt } from './json.js'
import { stitchEquirectangular, type RawImage } from './stitch.js'
import { fetchTiles, type FetchTilesOptions, type TileAddress } from './tiles.js'
import { clamp, DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

export const TILE_SIZE = 512
/** Image sizes are given in blocks of this many pixels */
const BLOCK_SIZE = 256
/** Pano IDs encode the capture time in China Standard Time */
const CST_OFFSET_HOURS = 8

export enum Provider {
  /** Captured by Baidu or one of its users */
  BAIDU = 0,
  CITY8 = 1,
  LIDE_SPACE = 2,
  VRWAY = 3,
  TAAGOO = 4,
  ZHDGPS = 5,
  PEACEMAP = 6,
  TMIC = 7,
  SUPER720 = 11,
  PANORAMA_NETWORK = 12,
  TIANYA = 13,
}

/** Provider codes that all stand for Baidu itself */
const BAIDU_PROVIDER_CODES = [8, 9, 10, 14]

export interface BaiduPanorama {
  id: string
  /** BD09MC */
  x: number
  y: number
  lat: number
  lon: number
  date: Date
  elevation?: number
  /** Radians */
  heading?: number
  pitch?: number
  roll?: number
  /** Image size of each zoom level, smallest first */
  imageSizes?: { width: number; height: number }[]
  streetName?: string
  /** A known {@link Provider}, or the raw code */
  provider?: Provider | number
  /** Camera height above ground in meters */
  height?: number
  creator?: { name: string; id: string }
  neighbors: BaiduPanorama[]
  /** Other capture dates; positions are not reported for these */
  historical: BaiduPanorama[]
}

export async function findPanorama(
  coord1: number,
  coord2: number,
  { crs = Crs.WGS84, client }: { crs?: Crs; client: FetchClient },
): Promise<BaiduPanorama | null> {
  const { x, y } = toBd09mc(coord1, coord2, crs)
  const response = await client.getJson(`https://mapsv0.bdimg.com/?qt=qsdata&x=${x}&y=${y}&action=1`)
  return parsePanoramaResponse(response)
}

export async function findPanoramaById(
  id: string,
  { client }: { client: FetchClient },
): Promise<BaiduPanorama | null> {
  const response = await client.getJson(`https://mapsv0.bdimg.com/?qt=sdata&pc=1&sid=${id}`)
  return parsePanoramaResponse(response)
}

export function parsePanoramaResponse(response: unknown): BaiduPanorama | null {
  if (numberAt(response, 'result', 'error') !== 0) return null
  const pano = at(response, 'content', 0)
  const id = stringAt(pano, 'ID')
  const rawX = numberAt(pano, 'X')
  const rawY = numberAt(pano, 'Y')
  if (id === undefined || rawX === undefined || rawY === undefined) return null

  const username = stringAt(pano, 'Username') ?? ''
  const userId = stringAt(pano, 'UserID') ?? ''
  return {
    id,
    ...convertPosition(rawX, rawY),
    date: parseDateFromPanoId(id),
    elevation: numberAt(pano, 'Z'),
    heading: radians(numberAt(pano, 'Heading')),
    pitch: radians(numberAt(pano, 'Pitch')),
    roll: radians(numberAt(pano, 'Roll')),
    imageSizes: arrayAt(pano, 'ImgLayer').flatMap((layer) => {
      const blockX = numberAt(layer, 'BlockX')
      const blockY = numberAt(layer, 'BlockY')
      if (blockX === undefined || blockY === undefined) return []
      return [{ width: blockX * BLOCK_SIZE, height: blockY * BLOCK_SIZE }]
    }),
    streetName: stringAt(pano, 'Rname'),
    provider: parseProvider(numberAt(pano, 'Provider')),
    height: numberAt(pano, 'DeviceHeight'),
    creator: username === '' && userId === '' ? undefined : { name: username, id: userId },
    neighbors: parseNeighbors(arrayAt(pano, 'Roads')),
    historical: parseHistorical(arrayAt(pano, 'TimeLine')),
  }
}

function parseNeighbors(roads: unknown[]): BaiduPanorama[] {
  return roads.flatMap((road) =>
    arrayAt(road, 'Panos').flatMap((item) => {
      const id = stringAt(item, 'PID')
      const rawX = numberAt(item, 'X')
      const rawY = numberAt(item, 'Y')
      if (id === undefined || rawX === undefined || rawY === undefined) return []
      return [relatedPanorama(id, convertPosition(rawX, rawY))]
    }),
  )
}

function parseHistorical(timeline: unknown[]): BaiduPanorama[] {
  return timeline.flatMap((entry) => {
    const id = stringAt(entry, 'ID')
    if (id === undefined || numberAt(entry, 'IsCurrent') === 1) return []
    return [relatedPanorama(id, { x: 0, y: 0, lat: 0, lon: 0 })]
  })
}

function relatedPanorama(
  id: string,
  position: Pick<BaiduPanorama, 'x' | 'y' | 'lat' | 'lon'>,
): BaiduPanorama {
  return {
    id,
    ...position,
    date: parseDateFromPanoId(id),
    provider: parseProvider(Number(id.slice(0, 2))),
    neighbors: [],
    historical: [],
  }
}

/** Raw positions are BD09MC in centimeters */
function convertPosition(rawX: number, rawY: number): Pick<BaiduPanorama, 'x' | 'y' | 'lat' | 'lon'> {
  const x = rawX / 100
  const y = rawY / 100
  return { x, y, ...bd09mcToWgs84(x, y) }
}

function parseProvider(code: number | undefined): Provider | number | undefined {
  if (code === undefined || Number.isNaN(code)) return undefined
  if (BAIDU_PROVIDER_CODES.includes(code)) return Provider.BAIDU
  return code
}

/** Characters 10 to 21 of a pano ID are `YYMMDDhhmmss` in China Standard Time. */
export function parseDateFromPanoId(id: string): Date {
  const field = (start: number) => Number(id.slice(start, start + 2))
  return new Date(
    Date.UTC(2000 + field(10), field(12) - 1, field(14), field(16) - CST_OFFSET_HOURS, field(18), field(20)),
  )
}

function radians(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value * DEG_TO_RAD
}

function validateZoom(pano: BaiduPanorama, zoom: number): number {
  if (!pano.imageSizes || pano.imageSizes.length === 0) {
    throw new InvalidParameterError(`Panorama ${pano.id} has no image sizes`)
  }
  return clamp(Math.floor(zoom), 0, pano.imageSizes.length - 1)
}

/** Tile list of one zoom level; `zoom` is clamped to the levels the panorama has. */
export function panoramaTiles(pano: BaiduPanorama, zoom: number): TileAddress[] {
  const level = validateZoom(pano, zoom)
  const { width, height } = pano.imageSizes?.[level] ?? { width: 0, height: 0 }
  const cols = Math.ceil(width / TILE_SIZE)
  const rows = Math.ceil(height / TILE_SIZE)

  const tiles: TileAddress[] = []
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      tiles.push({
        x,
        y,
        url: `https://mapsv1.bdimg.com/?qt=pdata&sid=${pano.id}&pos=${y}_${x}&z=${level + 1}`,
      })
    }
  }
  return tiles
}

export async function getPanorama(
  pano: BaiduPanorama,
  { zoom = 3, ...options }: FetchTilesOptions & { zoom?: number },
): Promise<RawImage> {
  const level = validateZoom(pano, zoom)
  const { width, height } = pano.imageSizes?.[level] ?? { width: 0, height: 0 }
  const tiles = await fetchTiles(panoramaTiles(pano, level), options)
  return stitchEquirectangular(tiles, width, height, TILE_SIZE, TILE_SIZE)
}

/** Baidu Maps link opening this panorama. Angles in radians. */
export function permalink(id: string, { heading = 0, pitch = 0 } = {}): string {
  return (
    `https://map.baidu.com/#panoid=${id}` +
    `&panotype=street&heading=${heading * RAD_TO_DEG}&pitch=${pitch * RAD_TO_DEG}&tn=B_NORMAL_MAP`
  )
}
