// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { SingleBar } from 'cli-progress'
import dedent from 'dedent'
import { extname } from 'node:path'
import { parseArgs } from 'node:util'
import * as baidu from './lib/baidu.js'
import { createFetchClient } from './lib/client.js'
import { sortByDistance } from './lib/geo.js'
import * as kakao from './lib/kakao.js'
import * as naver from './lib/naver.js'
import { CubemapStitchingMethod, toSharp, type RawImage } from './lib/stitch.js'
import * as streetside from './lib/streetside.js'
import * as streetview from './lib/streetview.js'
import { makeDirectoryForFile } from './lib/utils.js'

const usage = dedent`
  Usage: streetpano <provider> <lat> <lon> [options]

  Downloads the panorama closest to a WGS84 location.

  Providers:
    streetview   Google Street View (equirectangular)
    streetside   Bing Streetside (cubemap)
    naver        Naver (cubemap)
    baidu        Baidu (equirectangular)
    kakao        Kakao (equirectangular)

  Options:
    --out <file>       Output image (default: pano.jpg)
    --zoom <n>         Zoom level (default: highest available)
    --layout <layout>  Cubemap layout: none, net or row (default: net)
    --radius <m>       Search radius in meters (default: 50)
    -h, --help         Show this help
`

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    out: { type: 'string', default: 'pano.jpg' },
    zoom: { type: 'string' },
    layout: { type: 'string', default: CubemapStitchingMethod.NET },
    radius: { type: 'string', default: '50' },
    help: { type: 'boolean', short: 'h', default: false },
  },
})

if (values.help || positionals.length !== 3) {
  console.log(usage)
  process.exit(values.help ? 0 : 1)
}

const [provider, latText, lonText] = positionals
const lat = Number(latText)
const lon = Number(lonText)
const zoom = values.zoom === undefined ? undefined : Number(values.zoom)
const radius = Number(values.radius)
const layout = parseLayout(values.layout)
if (
  Number.isNaN(lat) ||
  Number.isNaN(lon) ||
  Number.isNaN(radius) ||
  (zoom !== undefined && Number.isNaN(zoom))
) {
  console.error('lat, lon, --zoom and --radius must be numbers')
  process.exit(1)
}

const client = createFetchClient({ retryLimit: 3 })
const bar = new SingleBar({ etaBuffer: 10000 })
const onTile = () => bar.increment()

try {
  const images = await download()
  if (images === null) {
    console.log(`No panorama found near ${lat}, ${lon}`)
    process.exitCode = 1
  } else {
    await save(images, values.out)
  }
} finally {
  bar.stop()
  client.close()
}

async function download(): Promise<RawImage | RawImage[] | null> {
  switch (provider) {
    case 'streetview': {
      const pano = await streetview.findPanorama(lat, lon, { radius, client })
      if (!pano) return null
      report(pano.id, pano.lat, pano.lon, formatDate(pano.date))
      const level = zoom ?? pano.sizes.length - 1
      bar.start(streetview.isThirdPartyId(pano.id) ? 0 : streetview.panoramaTiles(pano, level).length, 0)
      return streetview.getPanorama(pano, { zoom: level, client, onTile })
    }
    case 'streetside': {
      const found = await streetside.findPanoramas(lat, lon, { radius, client })
      const [pano] = sortByDistance(found, lat, lon)
      if (!pano) return null
      report(String(pano.id), pano.lat, pano.lon, pano.date.toISOString())
      const level = Math.min(zoom ?? streetside.MAX_ZOOM, streetside.MAX_ZOOM)
      bar.start(streetside.panoramaTiles(pano.id, level).flat().length, 0)
      return streetside.getPanorama(pano.id, { zoom: level, layout, client, onTile })
    }
    case 'naver': {
      const nearby = await naver.findPanorama(lat, lon, { client })
      if (!nearby) return null
      // maxZoom is only part of the full metadata
      const pano = (await naver.findPanoramaById(nearby.id, { client })) ?? nearby
      report(pano.id, pano.lat, pano.lon, pano.date?.toISOString())
      const level = naver.validateZoom(pano, zoom ?? pano.maxZoom ?? 1)
      bar.start(level === 0 ? 0 : naver.cubemapTiles(pano.id, level).faces.flat().length, 0)
      return naver.getPanorama(pano, { zoom: level, layout, client, onTile })
    }
    case 'baidu': {
      const pano = await baidu.findPanorama(lat, lon, { client })
      if (!pano) return null
      report(pano.id, pano.lat, pano.lon, pano.date.toISOString())
      const level = zoom ?? (pano.imageSizes?.length ?? 1) - 1
      bar.start(baidu.panoramaTiles(pano, level).length, 0)
      return baidu.getPanorama(pano, { zoom: level, client, onTile })
    }
    case 'kakao': {
      const found = await kakao.findPanoramas(lat, lon, { radius, client })
      const [pano] = sortByDistance(found, lat, lon)
      if (!pano) return null
      report(String(pano.id), pano.lat, pano.lon, pano.date?.toISOString())
      const level = await kakao.availableZoom(pano, zoom ?? kakao.MAX_ZOOM, { client })
      bar.start(kakao.panoramaTiles(pano, level).length, 0)
      return kakao.getPanorama(pano, { zoom: level, client, onTile })
    }
    default:
      console.error(`Unknown provider: ${provider}`)
      console.log(usage)
      process.exit(1)
  }
}

async function save(images: RawImage | RawImage[], out: string) {
  if (!Array.isArray(images)) {
    makeDirectoryForFile(out)
    await toSharp(images).toFile(out)
    console.log(`Saved ${out} (${images.width}×${images.height})`)
    return
  }
  const extension = extname(out)
  const stem = out.slice(0, out.length - extension.length)
  for (const [i, image] of images.entries()) {
    const file = `${stem}_${i}${extension}`
    makeDirectoryForFile(file)
    await toSharp(image).toFile(file)
    console.log(`Saved ${file} (${image.width}×${image.height})`)
  }
}

function report(id: string, panoLat: number, panoLon: number, date: string | undefined) {
  console.log(`id: ${id}, lat: ${panoLat}, lon: ${panoLon}, date: ${date ?? 'unknown'}`)
}

function formatDate(date: streetview.PanoramaDate | undefined): string | undefined {
  if (!date) return undefined
  const month = String(date.month).padStart(2, '0')
  if (date.day === undefined) return `${date.year}-${month}`
  return `${date.year}-${month}-${String(date.day).padStart(2, '0')}`
}

function parseLayout(value: string): CubemapStitchingMethod {
  switch (value) {
    case CubemapStitchingMethod.NONE:
      return CubemapStitchingMethod.NONE
    case CubemapStitchingMethod.NET:
      return CubemapStitchingMethod.NET
    case CubemapStitchingMethod.ROW:
      return CubemapStitchingMethod.ROW
    default:
      console.error(`Unknown layout: ${value}`)
      process.exit(1)
  }
}
