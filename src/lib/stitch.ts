// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import sharp from 'sharp'
import { InvalidParameterError } from './errors.js'
import type { TileMap } from './tiles.js'
import { chunk } from './utils.js'

/** Decoded pixels, row-major and interleaved */
export interface RawImage {
  data: Buffer
  width: number
  height: number
  channels: 1 | 2 | 3 | 4
}

export enum CubemapStitchingMethod {
  /** Six separate faces */
  NONE = 'none',
  /** A 4×3 cross: top above front, bottom below, left/front/right/back in the middle row */
  NET = 'net',
  /** Front, right, back, left, top, bottom from left to right */
  ROW = 'row',
}

/** Face cells of the net layout, in face order front, right, back, left, top, bottom */
const NET_CELLS: readonly [col: number, row: number][] = [
  [1, 1],
  [2, 1],
  [3, 1],
  [0, 1],
  [1, 0],
  [1, 2],
]

interface Overlay {
  /** Encoded image bytes, or an already decoded image */
  image: Buffer | RawImage
  left: number
  top: number
}

export function toSharp(image: RawImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
}

export async function decodeImage(buffer: Buffer): Promise<RawImage> {
  const { data, info } = await sharp(buffer)
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true })
  return { data, width: info.width, height: info.height, channels: info.channels }
}

export async function cropImage(
  image: RawImage,
  left: number,
  top: number,
  width: number,
  height: number,
): Promise<RawImage> {
  const { data, info } = await toSharp(image)
    .extract({ left, top, width, height })
    .raw()
    .toBuffer({ resolveWithObject: true })
  return { data, width: info.width, height: info.height, channels: info.channels }
}

/**
 * Pastes each tile at `(x·tileWidth, y·tileHeight)` on a black `width`×`height` canvas.
 * The canvas is not resized to the grid: tiles beyond its edges are cropped and
 * missing tiles stay black.
 */
export async function stitchEquirectangular(
  tiles: TileMap<Buffer>,
  width: number,
  height: number,
  tileWidth: number,
  tileHeight: number,
): Promise<RawImage> {
  const overlays: Overlay[] = []
  for (const [x, y, image] of tiles) {
    overlays.push({ image, left: x * tileWidth, top: y * tileHeight })
  }
  return paste(width, height, overlays)
}

/** Stitches one square cube face from a `cols`×`rows` grid of square tiles. */
export async function stitchCubemapFace(
  tiles: TileMap<Buffer>,
  tileSize: number,
  cols: number,
  rows: number,
): Promise<RawImage> {
  return stitchEquirectangular(tiles, tileSize * cols, tileSize * rows, tileSize, tileSize)
}

/**
 * Combines six stitched faces, given in the order front, right, back, left, top, bottom.
 */
export function stitchCubemapFaces(
  faces: readonly RawImage[],
  faceSize: number,
  method: CubemapStitchingMethod.NONE,
): Promise<RawImage[]>
export function stitchCubemapFaces(
  faces: readonly RawImage[],
  faceSize: number,
  method: CubemapStitchingMethod.NET | CubemapStitchingMethod.ROW,
): Promise<RawImage>
export function stitchCubemapFaces(
  faces: readonly RawImage[],
  faceSize: number,
  method: CubemapStitchingMethod,
): Promise<RawImage | RawImage[]>
export async function stitchCubemapFaces(
  faces: readonly RawImage[],
  faceSize: number,
  method: CubemapStitchingMethod,
): Promise<RawImage | RawImage[]> {
  if (faces.length !== 6) {
    throw new InvalidParameterError(`A cubemap has 6 faces, got ${faces.length}`)
  }
  switch (method) {
    case CubemapStitchingMethod.NONE:
      return [...faces]
    case CubemapStitchingMethod.NET:
      return paste(
        4 * faceSize,
        3 * faceSize,
        faces.map((image, i) => ({
          image,
          left: NET_CELLS[i][0] * faceSize,
          top: NET_CELLS[i][1] * faceSize,
        })),
      )
    case CubemapStitchingMethod.ROW:
      return paste(
        6 * faceSize,
        faceSize,
        faces.map((image, i) => ({ image, left: i * faceSize, top: 0 })),
      )
  }
}

/**
 * Stitches a square face from tiles ordered as nested quadrants: every run of
 * four tiles (or four runs of sub-quadrants) is top-left, top-right,
 * bottom-left, bottom-right. The tile count must be a power of four.
 */
export async function stitchQuadrants(
  tiles: readonly Buffer[],
  tileSize: number,
): Promise<RawImage> {
  if (!isPowerOfFour(tiles.length)) {
    throw new InvalidParameterError(`Tile count must be a power of four, got ${tiles.length}`)
  }
  if (tiles.length === 1) return decodeImage(tiles[0])

  if (tiles.length === 4) {
    return paste(
      2 * tileSize,
      2 * tileSize,
      tiles.map((image, i) => ({
        image,
        left: (i % 2) * tileSize,
        top: Math.floor(i / 2) * tileSize,
      })),
    )
  }

  const quarter = tiles.length / 4
  const quadrantSize = Math.sqrt(quarter) * tileSize
  const quadrants = await Promise.all(
    chunk(tiles, quarter).map((quadrant) => stitchQuadrants(quadrant, tileSize)),
  )
  return paste(
    2 * quadrantSize,
    2 * quadrantSize,
    quadrants.map((image, i) => ({
      image,
      left: (i % 2) * quadrantSize,
      top: Math.floor(i / 2) * quadrantSize,
    })),
  )
}

function isPowerOfFour(n: number): boolean {
  if (n < 1 || !Number.isInteger(n)) return false
  while (n % 4 === 0) n /= 4
  return n === 1
}

async function paste(width: number, height: number, overlays: Overlay[]): Promise<RawImage> {
  const composites = await Promise.all(overlays.map((overlay) => fitOverlay(overlay, width, height)))

  const { data, info } = await sharp({
    create: { width, height, channels: 3, background: '#000000' },
  })
    .composite(composites.filter((c): c is sharp.OverlayOptions => c !== null))
    .raw()
    .toBuffer({ resolveWithObject: true })

  const image: RawImage = { data, width: info.width, height: info.height, channels: info.channels }
  return image.channels === 3 ? image : decodeRaw(image)
}

/** Crops an overlay to the canvas; `null` if nothing of it is visible */
async function fitOverlay(
  { image, left, top }: Overlay,
  width: number,
  height: number,
): Promise<sharp.OverlayOptions | null> {
  if (left >= width || top >= height) return null

  if (!Buffer.isBuffer(image)) {
    const raw = { width: image.width, height: image.height, channels: image.channels }
    if (left + image.width <= width && top + image.height <= height) {
      return { input: image.data, raw, left, top }
    }
    const input = await sharp(image.data, { raw })
      .extract({
        left: 0,
        top: 0,
        width: Math.min(image.width, width - left),
        height: Math.min(image.height, height - top),
      })
      .png()
      .toBuffer()
    return { input, left, top }
  }

  const metadata = await sharp(image).metadata()
  const tileWidth = metadata.width ?? 0
  const tileHeight = metadata.height ?? 0
  if (left + tileWidth <= width && top + tileHeight <= height) {
    return { input: image, left, top }
  }
  const input = await sharp(image)
    .extract({
      left: 0,
      top: 0,
      width: Math.min(tileWidth, width - left),
      height: Math.min(tileHeight, height - top),
    })
    .toBuffer()
  return { input, left, top }
}

async function decodeRaw(image: RawImage): Promise<RawImage> {
  const { data, info } = await toSharp(image)
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true })
  return { data, width: info.width, height: info.height, channels: info.channels }
}
