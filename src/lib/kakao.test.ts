// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import sharp from 'sharp'
import { describe, expect, it, vi } from 'vitest'
import type { FetchClient } from './client.js'
import { HttpError, InvalidParameterError } from './errors.js'
import {
  availableZoom,
  findPanoramaById,
  findPanoramas,
  getPanorama,
  isCar,
  PanoramaType,
  panoramaTiles,
  parseDateFromImagePath,
  parsePanorama,
  parsePanoramas,
  permalink,
  type KakaoPanorama,
} from './kakao.js'

const IMAGE_PATH = '/2024/05/1234567/2_100060_1234567_20240512093015'
const TILE_BASE = `https://map.daumcdn.net/map_roadview${IMAGE_PATH}`

const street = {
  id: 1100000001,
  wgsy: 37.5,
  wgsx: 127,
  wcongx: 500000,
  wcongy: 1100000,
  angle: '90',
  img_path: IMAGE_PATH,
  st_name: 'Test-ro',
  addr: 'Test-dong 1',
  st_type: '이면도로',
  shot_tool: '102',
  spot: [{ id: 1100000002, wgsy: 37.5001, wgsx: 127, st_name: 'Test-ro', pan: '180' }],
  past: [
    {
      id: 1000000001,
      wgsy: 37.5,
      wgsx: 127,
      angle: '0',
      img_path: '/2020/01/7654321/2_100060_7654321_20200101120000',
      shot_tool: 200,
    },
  ],
}

const byIdResponse = { street_view: { cnt: 1, street } }
const listResponse = { street_view: { cnt: 2, streetList: [street, { ...street, id: 1100000003 }] } }
const emptyResponse = { street_view: { cnt: 0 } }

function fakeClient(json: unknown = listResponse, image?: Buffer): FetchClient {
  return {
    getText: vi.fn(async () => ''),
    getJson: vi.fn(async () => json),
    getBuffer: vi.fn(async () => image ?? Buffer.alloc(0)),
    close: vi.fn(),
    closed: false,
  }
}

function pano(overrides: Partial<KakaoPanorama> = {}): KakaoPanorama {
  return { id: 1100000001, lat: 37.5, lon: 127, imagePath: IMAGE_PATH, ...overrides }
}

describe('parsePanorama', () => {
  it('reads the panorama', () => {
    const result = parsePanorama(street)
    expect(result).toMatchObject({
      id: 1100000001,
      lat: 37.5,
      lon: 127,
      wcongx: 500000,
      wcongy: 1100000,
      imagePath: IMAGE_PATH,
      date: new Date(Date.UTC(2024, 4, 12, 9, 30, 15)),
      streetName: 'Test-ro',
      address: 'Test-dong 1',
      streetType: '이면도로',
      panoramaType: PanoramaType.CAR,
    })
    expect(result?.heading).toBeCloseTo(Math.PI / 2, 10)
  })

  it('reads the links of the viewer', () => {
    const links = parsePanorama(street)?.links
    expect(links).toHaveLength(1)
    expect(links?.[0].pano).toEqual({ id: 1100000002, lat: 37.5001, lon: 127, streetName: 'Test-ro' })
    expect(links?.[0].direction).toBeCloseTo(Math.PI, 10)
  })

  it('reads other captures at the location', () => {
    const historical = parsePanorama(street)?.historical
    expect(historical?.map((p) => [p.id, p.date, p.panoramaType])).toEqual([
      [1000000001, new Date(Date.UTC(2020, 0, 1, 12, 0, 0)), PanoramaType.NAVER_CAR],
    ])
  })

  it('leaves unknown panorama types out', () => {
    expect(parsePanorama({ ...street, shot_tool: '999' })?.panoramaType).toBeUndefined()
  })

  it('returns null without an ID or position', () => {
    expect(parsePanorama({ ...street, wgsy: undefined })).toBeNull()
    expect(parsePanorama('x')).toBeNull()
  })
})

describe('parsePanoramas', () => {
  it('reads the street list', () => {
    expect(parsePanoramas(listResponse).map((p) => p.id)).toEqual([1100000001, 1100000003])
  })

  it('returns an empty list when nothing was found', () => {
    expect(parsePanoramas(emptyResponse)).toEqual([])
  })
})

describe('parseDateFromImagePath', () => {
  it('reads the time after the last underscore as UTC', () => {
    expect(parseDateFromImagePath('/a/b_c_20231231235959')).toEqual(
      new Date(Date.UTC(2023, 11, 31, 23, 59, 59)),
    )
  })

  it('returns undefined for paths without a time', () => {
    expect(parseDateFromImagePath('/a/b')).toBeUndefined()
    expect(parseDateFromImagePath(undefined)).toBeUndefined()
  })
})

describe('isCar', () => {
  it('counts every car camera', () => {
    expect(isCar(pano({ panoramaType: PanoramaType.CAR }))).toBe(true)
    expect(isCar(pano({ panoramaType: PanoramaType.NAVER_CAR }))).toBe(true)
    expect(isCar(pano({ panoramaType: PanoramaType.INSTA_TITAN }))).toBe(true)
    expect(isCar(pano({ panoramaType: PanoramaType.SKY }))).toBe(false)
    expect(isCar(pano())).toBe(false)
  })
})

describe('findPanoramas', () => {
  it('searches around a WGS84 point', async () => {
    const client = fakeClient()
    await findPanoramas(37.5, 127, { client })
    expect(client.getJson).toHaveBeenCalledWith(
      'https://rv.map.kakao.com/roadview-search/v2/nodes' +
        '?PX=127&PY=37.5&RAD=35&PAGE_SIZE=50&INPUT=wgs&TYPE=w&SERVICE=glpano',
    )
  })

  it('passes radius and limit', async () => {
    const client = fakeClient(emptyResponse)
    expect(await findPanoramas(37.5, 127, { radius: 100, limit: 5, client })).toEqual([])
    const [url] = vi.mocked(client.getJson).mock.calls[0]
    expect(url).toContain('&RAD=100&PAGE_SIZE=5&')
  })
})

describe('findPanoramaById', () => {
  it('fetches the panorama and the panoramas around it', async () => {
    const client = fakeClient()
    vi.mocked(client.getJson).mockResolvedValueOnce(byIdResponse)
    const result = await findPanoramaById(1100000001, { client })
    expect(client.getJson).toHaveBeenNthCalledWith(
      1,
      'https://rv.map.kakao.com/roadview-search/v2/node/1100000001?SERVICE=glpano',
    )
    expect(client.getJson).toHaveBeenCalledTimes(2)
    expect(result?.neighbors?.map((p) => p.id)).toEqual([1100000001, 1100000003])
  })

  it('skips the neighbor search on request', async () => {
    const client = fakeClient(byIdResponse)
    const result = await findPanoramaById(1100000001, { neighbors: false, client })
    expect(result?.id).toBe(1100000001)
    expect(result?.neighbors).toBeUndefined()
    expect(client.getJson).toHaveBeenCalledTimes(1)
  })

  it('returns null for unknown IDs', async () => {
    const client = fakeClient(emptyResponse)
    expect(await findPanoramaById(1, { client })).toBeNull()
    expect(client.getJson).toHaveBeenCalledTimes(1)
  })
})

describe('panoramaTiles', () => {
  it('uses the thumbnail at zoom 0', () => {
    expect(panoramaTiles(pano(), 0)).toEqual([{ x: 0, y: 0, url: `${TILE_BASE}.jpg` }])
  })

  it('numbers zoom 1 tiles row by row from 01', () => {
    const tiles = panoramaTiles(pano(), 1)
    expect(tiles).toHaveLength(32)
    expect(tiles[0]).toEqual({ x: 0, y: 0, url: `${TILE_BASE}/2_100060_1234567_20240512093015_01.jpg` })
    expect(tiles[31]).toEqual({ x: 7, y: 3, url: `${TILE_BASE}/2_100060_1234567_20240512093015_32.jpg` })
  })

  it('numbers zoom 2 tiles with three digits in the HD directory', () => {
    const tiles = panoramaTiles(pano(), 2)
    expect(tiles).toHaveLength(128)
    expect(tiles[127]).toEqual({
      x: 15,
      y: 7,
      url: `${TILE_BASE}_HD1/2_100060_1234567_20240512093015_HD1_128.jpg`,
    })
  })

  it('requires an image path', () => {
    expect(() => panoramaTiles(pano({ imagePath: undefined }), 1)).toThrow(InvalidParameterError)
  })
})

describe('availableZoom', () => {
  it('keeps zoom 2 when its first tile exists', async () => {
    const client = fakeClient()
    expect(await availableZoom(pano(), 2, { client })).toBe(2)
    expect(client.getBuffer).toHaveBeenCalledWith(
      `${TILE_BASE}_HD1/2_100060_1234567_20240512093015_HD1_001.jpg`,
      { headers: undefined },
    )
  })

  it('falls back to zoom 1 when the server refuses zoom 2', async () => {
    const client = fakeClient()
    vi.mocked(client.getBuffer).mockRejectedValueOnce(new HttpError(404, 'https://example.test/'))
    expect(await availableZoom(pano(), 5, { client })).toBe(1)
  })

  it('passes other errors on', async () => {
    const client = fakeClient()
    vi.mocked(client.getBuffer).mockRejectedValueOnce(new Error('offline'))
    await expect(availableZoom(pano(), 2, { client })).rejects.toThrow('offline')
  })

  it('does not check lower zoom levels', async () => {
    const client = fakeClient()
    expect(await availableZoom(pano(), 1, { client })).toBe(1)
    expect(client.getBuffer).not.toHaveBeenCalled()
  })
})

describe('getPanorama', () => {
  it('decodes the thumbnail at zoom 0', async () => {
    const thumbnail = await sharp({ create: { width: 64, height: 32, channels: 3, background: 'gray' } })
      .png()
      .toBuffer()
    const client = fakeClient(listResponse, thumbnail)
    const onTile = vi.fn()
    const image = await getPanorama(pano(), { zoom: 0, client, onTile })
    expect(image).toMatchObject({ width: 64, height: 32, channels: 3 })
    expect(client.getBuffer).toHaveBeenCalledWith(`${TILE_BASE}.jpg`, { headers: undefined })
    expect(onTile).toHaveBeenCalledTimes(1)
  })

  it('stitches zoom 1 after zoom 2 turns out to be missing', async () => {
    const tile = await sharp({ create: { width: 16, height: 16, channels: 3, background: 'gray' } })
      .png()
      .toBuffer()
    const client = fakeClient(listResponse, tile)
    vi.mocked(client.getBuffer).mockRejectedValueOnce(new HttpError(404, 'https://example.test/'))
    const image = await getPanorama(pano(), { client })
    expect(image).toMatchObject({ width: 4096, height: 2048 })
    expect(client.getBuffer).toHaveBeenCalledTimes(1 + 32)
  })
})

describe('permalink', () => {
  it('links to the location and ID', () => {
    expect(permalink({ id: 7, wcongx: 500000, wcongy: 1100000 })).toBe(
      'https://map.kakao.com/?map_type=TYPE_MAP&map_attribute=ROADVIEW' +
        '&panoid=7&urlX=500000&urlY=1100000&pan=0&tilt=0&zoom=0&urlLevel=3',
    )
  })

  it('converts the view angles to degrees', () => {
    const url = new URL(permalink({ id: 7 }, { heading: Math.PI, pitch: -Math.PI / 4 }))
    expect(Number(url.searchParams.get('pan'))).toBeCloseTo(180, 10)
    expect(Number(url.searchParams.get('tilt'))).toBeCloseTo(-45, 10)
  })

  it('uses the origin when the location is unknown', () => {
    expect(permalink({ id: 7 })).toContain('&urlX=0&urlY=0&')
  })
})
