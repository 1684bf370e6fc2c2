// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FetchClient } from './client.js'
import { InvalidParameterError } from './errors.js'
import { arrayAt, at, numberAt, stringAt } from './json.js'
import { pDouble, pEnum, pInt, serialize, type ProtobufValue } from './protobuf.js'
import { decodeImage, stitchEquirectangular, type RawImage } from './stitch.js'
import { fetchTiles, type FetchTilesOptions, type TileAddress } from './tiles.js'
import { clamp, DEG_TO_RAD, RAD_TO_DEG } from './utils.js'

const defaultLocale = 'en-US'

export interface LocalizedText {
  text: string
  language: string
}

export interface PanoramaDate {
  year: number
  month: number
  day?: number
}

export interface Size {
  width: number
  height: number
}

export interface CorePanoramaMetadata {
  id: string
  lat: number
  lon: number
  elevation?: number
  /** Radians clockwise from north */
  heading?: number
  pitch?: number
  roll?: number
  date?: PanoramaDate
}

export interface PanoramaMetadata extends CorePanoramaMetadata {
  /** Image size of each zoom level, smallest first */
  sizes: Size[]
  tileSize: Size
  countryCode?: string
  address?: LocalizedText
  /** Older captures at this location, oldest first */
  historical: CorePanoramaMetadata[]
  neighbors: CorePanoramaMetadata[]
}

export interface RequestLocaleOptions {
  client: FetchClient
  /** IETF tag such as `en-US` */
  locale?: string
}

/** Note: This function does not always return the closest panorama. */
export async function findPanorama(
  lat: number,
  lon: number,
  {
    radius = 50,
    searchThirdParty = false,
    locale = defaultLocale,
    client,
  }: RequestLocaleOptions & { radius?: number; searchThirdParty?: boolean },
): Promise<PanoramaMetadata | null> {
  const url = panoramaSearchUrl(lat, lon, radius, locale, searchThirdParty)
  const text = await client.getText(url)
  return parseSearchResponse(text)
}

export async function findPanoramaById(
  id: string,
  { locale = defaultLocale, client }: RequestLocaleOptions,
): Promise<PanoramaMetadata | null> {
  const url = panoramaMetadataUrl(id, locale)
  const text = await client.getText(url)
  return parseMetadataResponse(text)
}

/** Tile list of one zoom level; `zoom` is clamped to the levels the panorama has. */
export function panoramaTiles(pano: PanoramaMetadata, zoom: number): TileAddress[] {
  const level = validateZoom(pano, zoom)
  const { width, height } = pano.sizes[level]
  const cols = Math.ceil(width / pano.tileSize.width)
  const rows = Math.ceil(height / pano.tileSize.height)

  const tiles: TileAddress[] = []
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      tiles.push({ x, y, url: tileUrl(pano.id, x, y, level) })
    }
  }
  return tiles
}

/**
 * Downloads and stitches a panorama. Third-party panoramas are served as one
 * image in the requested size and are not tiled.
 */
export async function getPanorama(
  pano: PanoramaMetadata,
  { zoom = 5, ...options }: FetchTilesOptions & { zoom?: number },
): Promise<RawImage> {
  const level = validateZoom(pano, zoom)
  const { width, height } = pano.sizes[level]

  if (isThirdPartyId(pano.id)) {
    const url = `https://lh3.ggpht.com/jsapi2/a/b/c/w${width}-h${height}/${pano.id}`
    return decodeImage(await options.client.getBuffer(url, { headers: options.headers }))
  }

  const tiles = await fetchTiles(panoramaTiles(pano, level), options)
  return stitchEquirectangular(tiles, width, height, pano.tileSize.width, pano.tileSize.height)
}

/** Google Maps link opening this panorama. Angles in radians. */
export function permalink(
  pano: CorePanoramaMetadata,
  { heading = 0, pitch = 0, fov = Math.PI / 2 } = {},
): string {
  const params = new URLSearchParams({
    api: '1',
    map_action: 'pano',
    pano: pano.id,
    heading: String(heading * RAD_TO_DEG),
    pitch: String(pitch * RAD_TO_DEG),
    fov: String(fov * RAD_TO_DEG),
  })
  return `https://www.google.com/maps/@?${params}`
}

export function comparePanoramaDates(a: PanoramaDate, b: PanoramaDate) {
  return a.year - b.year || a.month - b.month || (a.day ?? 0) - (b.day ?? 0)
}

export function isThirdPartyId(id: string): boolean {
  return id.length > 22
}

/** Parses a SingleImageSearch JSONP response. */
export function parseSearchResponse(text: string): PanoramaMetadata | null {
  const healed = text.match(/callback\((.*)\)/)?.[1] ?? ''
  const data: unknown = JSON.parse(`[${healed}]`)
  const status = numberAt(data, 0, 0, 0)
  if (status !== 0) return null
  return parsePanoramaMessage(at(data, 0, 1))
}

/** Parses a photometa response, whose first line is an XSSI guard. */
export function parseMetadataResponse(text: string): PanoramaMetadata | null {
  const healed = text.match(/\n(.*)/)?.[1] ?? ''
  const data: unknown = JSON.parse(`[${healed}]`)
  return parsePanoramaMessage(at(data, 0, 1, 0))
}

function validateZoom(pano: PanoramaMetadata, zoom: number): number {
  if (pano.sizes.length === 0) {
    throw new InvalidParameterError(`Panorama ${pano.id} has no image sizes`)
  }
  return clamp(Math.floor(zoom), 0, pano.sizes.length - 1)
}

function tileUrl(id: string, x: number, y: number, zoom: number): string {
  return isThirdPartyId(id)
    ? `https://lh5.googleusercontent.com/p/${id}=x${x}-y${y}-z${zoom}`
    : `https://streetviewpixels-pa.googleapis.com/v1/tile?panoid=${id}&x=${x}&y=${y}&zoom=${zoom}`
}

function panoramaSearchUrl(
  lat: number,
  lon: number,
  radius: number,
  locale: string,
  searchThirdParty: boolean,
): string {
  const panoType = searchThirdParty ? 10 : 2
  const [lang, country = ''] = locale.split('-')

  // Request layout of GeoPhotoService.SingleImageSearch as sent by the Maps JS API
  const pb = {
    1: { 1: 'apiv3', 5: 'US', 11: { 1: { 1: false } } },
    2: { 1: { 3: pDouble(lat), 4: pDouble(lon) }, 2: pDouble(radius) },
    3: {
      2: { 1: lang, 2: country },
      9: { 1: pEnum(2) },
      11: {
        1: [{ 1: pEnum(panoType), 2: true, 3: pEnum(2) }],
      },
    },
    4: {
      1: [pEnum(1), pEnum(2), pEnum(3), pEnum(4), pEnum(6), pEnum(8)],
    },
  } satisfies ProtobufValue

  return `https://maps.googleapis.com/maps/api/js/GeoPhotoService.SingleImageSearch?pb=${serialize(pb)}&callback=callback`
}

function panoramaMetadataUrl(id: string, locale: string): string {
  const panoType = isThirdPartyId(id) ? 10 : 2
  const [lang, country = ''] = locale.split('-')

  // Based on https://maps.google.com/ requests
  const pb = {
    1: { 1: 'maps_sv.tactile', 11: { 2: { 1: true } } },
    2: { 1: lang, 2: country },
    3: { 1: { 1: pEnum(panoType), 2: id } },
    4: {
      1: [
        pEnum(1),
        pEnum(2),
        pEnum(3),
        pEnum(4),
        pEnum(5),
        pEnum(6),
        pEnum(8),
        pEnum(12),
        pEnum(17),
      ],
      2: { 1: pEnum(1) },
      4: { 1: pInt(48) },
      5: [{ 1: pEnum(1) }, { 1: pEnum(2) }],
      6: [{ 1: pEnum(1) }, { 1: pEnum(2) }],
      9: {
        1: [
          { 1: pEnum(2), 2: true, 3: pEnum(2) },
          { 1: pEnum(2), 2: false, 3: pEnum(3) },
          { 1: pEnum(3), 2: true, 3: pEnum(2) },
          { 1: pEnum(3), 2: false, 3: pEnum(3) },
          { 1: pEnum(8), 2: false, 3: pEnum(3) },
          { 1: pEnum(1), 2: false, 3: pEnum(3) },
          { 1: pEnum(4), 2: false, 3: pEnum(3) },
          { 1: pEnum(10), 2: true, 3: pEnum(2) },
          { 1: pEnum(10), 2: false, 3: pEnum(3) },
        ],
      },
    },
    11: { 3: { 4: true } },
  } satisfies ProtobufValue

  return `https://www.google.com/maps/photometa/v1?authuser=0&hl=${lang}&gl=${country}&pb=${serialize(pb)}`
}

function parsePanoramaMessage(message: unknown): PanoramaMetadata | null {
  const id = stringAt(message, 1, 1)
  const lat = numberAt(message, 5, 0, 1, 0, 2)
  const lon = numberAt(message, 5, 0, 1, 0, 3)
  if (id === undefined || lat === undefined || lon === undefined) return null

  // Other panoramas are listed by index; only the historical ones carry a date
  const otherDates = new Map<number, PanoramaDate>()
  for (const entry of arrayAt(message, 5, 0, 8)) {
    const index = numberAt(entry, 0)
    const date = parseDate(at(entry, 1))
    if (index !== undefined && date) otherDates.set(index, date)
  }

  const historical: CorePanoramaMetadata[] = []
  const neighbors: CorePanoramaMetadata[] = []
  arrayAt(message, 5, 0, 3, 0).forEach((item, i) => {
    const other = parseOtherPanorama(item, otherDates.get(i))
    if (!other || other.id === id) return
    if (otherDates.has(i)) historical.push(other)
    else neighbors.push(other)
  })
  historical.sort((a, b) => comparePanoramaDates(dateOrEpoch(a.date), dateOrEpoch(b.date)))

  const sizes: Size[] = []
  for (const size of arrayAt(message, 2, 3, 0)) {
    const height = numberAt(size, 0, 0)
    const width = numberAt(size, 0, 1)
    if (width !== undefined && height !== undefined) sizes.push({ width, height })
  }

  const addressText = stringAt(message, 3, 2, 0, 0)
  return {
    id,
    lat,
    lon,
    sizes,
    tileSize: {
      width: numberAt(message, 2, 3, 1, 0) ?? 512,
      height: numberAt(message, 2, 3, 1, 1) ?? 512,
    },
    address:
      addressText === undefined
        ? undefined
        : { text: addressText, language: stringAt(message, 3, 2, 0, 1) ?? '' },
    elevation: numberAt(message, 5, 0, 1, 1, 0),
    ...parseOrientation(at(message, 5, 0, 1, 2)),
    countryCode: stringAt(message, 5, 0, 1, 4),
    date: parseDate(at(message, 6, 7)),
    historical,
    neighbors,
  }
}

function parseOtherPanorama(item: unknown, date: PanoramaDate | undefined): CorePanoramaMetadata | null {
  const id = stringAt(item, 0, 1)
  const lat = numberAt(item, 2, 0, 2)
  const lon = numberAt(item, 2, 0, 3)
  if (id === undefined || lat === undefined || lon === undefined) return null
  return {
    id,
    lat,
    lon,
    elevation: nonZero(numberAt(item, 2, 1, 0)),
    ...parseOrientation(at(item, 2, 2)),
    date,
  }
}

/** `[heading, tilt, roll]` in degrees; tilt 90 is level. Zero heading or roll means unknown. */
function parseOrientation(item: unknown): Pick<CorePanoramaMetadata, 'heading' | 'pitch' | 'roll'> {
  const heading = nonZero(numberAt(item, 0))
  const tilt = numberAt(item, 1)
  const roll = nonZero(numberAt(item, 2))
  return {
    heading: heading === undefined ? undefined : heading * DEG_TO_RAD,
    pitch: tilt === undefined ? undefined : (90 - tilt) * DEG_TO_RAD,
    roll: roll === undefined ? undefined : roll * DEG_TO_RAD,
  }
}

function parseDate(item: unknown): PanoramaDate | undefined {
  const year = numberAt(item, 0)
  const month = numberAt(item, 1)
  if (year === undefined || month === undefined) return undefined
  return { year, month, day: numberAt(item, 2) }
}

function dateOrEpoch(date: PanoramaDate | undefined): PanoramaDate {
  return date ?? { year: 0, month: 0 }
}

function nonZero(value: number | undefined): number | undefined {
  return value === 0 ? undefined : value
}
