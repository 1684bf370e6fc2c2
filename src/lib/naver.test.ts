// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import sharp from 'sharp'
import { describe, expect, it, vi } from 'vitest'
import type { FetchClient } from './client.js'
import { InvalidParameterError } from './errors.js'
import {
  cubemapTiles,
  findPanorama,
  findPanoramaById,
  getHistorical,
  getNeighbors,
  getPanorama,
  PanoramaType,
  parseDate,
  parseHistorical,
  parseNearby,
  parseNeighbors,
  parsePanorama,
  permalink,
  validateZoom,
} from './naver.js'
import { CubemapStitchingMethod, decodeImage, stitchCubemapFaces, toSharp } from './stitch.js'

const nearby = {
  features: [
    {
      geometry: { coordinates: [127.0, 37.5] },
      properties: {
        id: 'PANO1',
        camera_angle: [0, 90, 0],
        photodate: '2022-04-01 13:30:00',
        title: 'Station',
        description: 'Exit 1',
        type: '3',
        land_altitude: 3000,
        camera_altitude: 3250,
      },
    },
  ],
}

const basic = {
  basic: {
    id: 'PANO1',
    latitude: 37.5,
    longitude: 127.0,
    camera_angle: [0, 45, 0],
    image: { segment: '4' },
    timeline_id: 'PANO2',
    photodate: '2022-04-01 13:30:00',
    latest: false,
    title: 'Station',
    dtl_type: 13,
    land_altitude: 3000,
    links: [
      ['id', 'title', 'direction', 'type', 'lng', 'lat'],
      ['LINK1', 'North', '180', 3, 127.1, 37.6],
    ],
  },
}

function fakeClient(json: unknown = null, image?: Buffer): FetchClient {
  return {
    getText: vi.fn(async () => ''),
    getJson: vi.fn(async () => json),
    getBuffer: vi.fn(async () => image ?? Buffer.alloc(0)),
    close: vi.fn(),
    closed: false,
  }
}

describe('parseNearby', () => {
  it('reads the closest panorama', () => {
    const pano = parseNearby(nearby)
    expect(pano).toMatchObject({
      id: 'PANO1',
      lat: 37.5,
      lon: 127.0,
      date: new Date(Date.UTC(2022, 3, 1, 4, 30, 0)),
      title: 'Station',
      description: 'Exit 1',
      panoramaType: PanoramaType.CAR,
      elevation: 30,
    })
    expect(pano?.heading).toBeCloseTo(Math.PI / 2)
    expect(pano?.cameraHeight).toBeCloseTo(2.5)
  })

  it('returns null for errors and empty results', () => {
    expect(parseNearby({ error: 'not found' })).toBeNull()
    expect(parseNearby({ features: [] })).toBeNull()
    expect(parseNearby('')).toBeNull()
  })
})

describe('parsePanorama', () => {
  it('reads the basic metadata', () => {
    const pano = parsePanorama(basic)
    expect(pano).toMatchObject({
      id: 'PANO1',
      maxZoom: 2,
      timelineId: 'PANO2',
      isLatest: false,
      panoramaType: PanoramaType.TREKKER,
      elevation: 30,
      cameraHeight: undefined,
    })
    expect(pano?.heading).toBeCloseTo(Math.PI / 4)
    expect(pano?.links).toHaveLength(1)
    expect(pano?.links?.[0].pano).toEqual({ id: 'LINK1', lat: 37.6, lon: 127.1, title: 'North' })
    expect(pano?.links?.[0].direction).toBeCloseTo(Math.PI)
  })

  it('leaves unknown panorama types out', () => {
    expect(parsePanorama({ basic: { ...basic.basic, dtl_type: 2 } })?.panoramaType).toBeUndefined()
  })
})

describe('findPanorama', () => {
  it('passes longitude before latitude', async () => {
    const client = fakeClient(nearby)
    expect((await findPanorama(37.5, 127, { client }))?.id).toBe('PANO1')
    expect(client.getJson).toHaveBeenCalledWith('https://map.naver.com/p/api/panorama/nearby/127/37.5')
  })
})

describe('findPanoramaById', () => {
  it('requests the basic metadata', async () => {
    const client = fakeClient(basic)
    expect((await findPanoramaById('PANO1', { client }))?.maxZoom).toBe(2)
    expect(client.getJson).toHaveBeenCalledWith(
      'https://panorama.map.naver.com/metadata/basic/PANO1?lang=en&version=2.1.0',
    )
  })

  it('returns null on errors', async () => {
    expect(await findPanoramaById('PANO1', { client: fakeClient({ errors: [] }) })).toBeNull()
  })
})

describe('historical and neighbors', () => {
  const timeline = {
    timeline: {
      panoramas: [
        ['id', 'lng', 'lat', 'type', 'photodate'],
        ['PANO1', 127, 37.5, 3, '2022-04-01 13:30:00.0'],
        ['OLD', 127.0001, 37.5001, 3, '2015-06-01 10:00:00.0'],
      ],
    },
  }

  const around = {
    around: {
      panoramas: {
        street: [
          ['id', 'lng', 'lat', 'camera_altitude', 'land_altitude'],
          ['N1', 127.1, 37.6, 3300, 3000],
        ],
        air: [
          ['id', 'lng', 'lat', 'camera_altitude', 'land_altitude'],
          ['A1', 127.2, 37.7, 20000, 3000],
          ['PANO1', 127, 37.5, 3250, 3000],
        ],
      },
    },
  }

  it('lists other captures without the panorama itself', () => {
    expect(parseHistorical(timeline, 'PANO1')).toEqual([
      {
        id: 'OLD',
        lat: 37.5001,
        lon: 127.0001,
        panoramaType: PanoramaType.CAR,
        date: new Date(Date.UTC(2015, 5, 1, 1, 0, 0)),
      },
    ])
  })

  it('splits neighbors into street and other', () => {
    const { street, other } = parseNeighbors(around, 'PANO1')
    expect(street.map((p) => p.id)).toEqual(['N1'])
    expect(street[0].elevation).toBe(30)
    expect(street[0].cameraHeight).toBeCloseTo(3)
    expect(other.map((p) => p.id)).toEqual(['A1'])
  })

  it('fetches both through the client', async () => {
    expect(await getHistorical('PANO1', { client: fakeClient(timeline) })).toHaveLength(1)
    expect(await getHistorical('PANO1', { client: fakeClient({ errors: [] }) })).toEqual([])
    const neighbors = await getNeighbors('PANO1', { client: fakeClient(around) })
    expect(neighbors.street).toHaveLength(1)
  })
})

describe('parseDate', () => {
  it('reads Korea Standard Time', () => {
    expect(parseDate('2020-01-01 00:00:00')).toEqual(new Date(Date.UTC(2019, 11, 31, 15, 0, 0)))
    expect(parseDate('2020-01-01')).toBeUndefined()
    expect(parseDate(undefined)).toBeUndefined()
  })
})

describe('validateZoom', () => {
  const pano = { id: 'P', lat: 0, lon: 0 }

  it('allows zoom 0 and 1 without maxZoom', () => {
    expect(validateZoom(pano, 1)).toBe(1)
    expect(validateZoom(pano, -1)).toBe(0)
    expect(() => validateZoom(pano, 2)).toThrow(InvalidParameterError)
  })

  it('clamps to maxZoom', () => {
    expect(validateZoom({ ...pano, maxZoom: 2 }, 5)).toBe(2)
    expect(validateZoom({ ...pano, maxZoom: 2 }, 1)).toBe(1)
  })
})

describe('cubemapTiles', () => {
  it('lists a grid for every face', () => {
    const { faces, cols, rows } = cubemapTiles('P', 1)
    expect([faces.length, cols, rows]).toEqual([6, 2, 2])
    expect(faces[1][3]).toEqual({ x: 1, y: 1, url: 'https://panorama.pstatic.net/image/P/512/M/r/2/2' })
    expect(cubemapTiles('P', 2).faces[5][0].url).toBe('https://panorama.pstatic.net/image/P/512/L/d/1/1')
  })

  it('has no tiles for other zoom levels', () => {
    expect(() => cubemapTiles('P', 0)).toThrow(InvalidParameterError)
    expect(() => cubemapTiles('P', 3)).toThrow(InvalidParameterError)
  })
})

describe('getPanorama', () => {
  const pano = { id: 'P', lat: 0, lon: 0 }

  it('cuts the zoom 0 preview into faces', async () => {
    // Strip position i is filled with red = 40·i
    const cells = await Promise.all(
      Array.from({ length: 6 }, async (_, i) =>
        decodeImage(
          await sharp({ create: { width: 256, height: 256, channels: 3, background: { r: 40 * i, g: 0, b: 0 } } })
            .png()
            .toBuffer(),
        ),
      ),
    )
    const strip = await stitchCubemapFaces(cells, 256, CubemapStitchingMethod.ROW)
    const client = fakeClient(null, await toSharp(strip).png().toBuffer())

    const faces = await getPanorama(pano, { zoom: 0, layout: CubemapStitchingMethod.NONE, client })
    expect(client.getBuffer).toHaveBeenCalledWith('https://panorama.pstatic.net/image/P/512/P', {
      headers: undefined,
    })
    expect(faces.map((face) => face.data[0])).toEqual([40, 80, 120, 0, 200, 160])
    expect(faces[0]).toMatchObject({ width: 256, height: 256 })
  })

  it('stitches zoom 1 tiles into 1024 pixel faces', async () => {
    const tile = await sharp({ create: { width: 512, height: 512, channels: 3, background: 'white' } })
      .png()
      .toBuffer()
    const client = fakeClient(null, tile)
    const faces = await getPanorama(pano, { zoom: 1, layout: CubemapStitchingMethod.NONE, client })
    expect(client.getBuffer).toHaveBeenCalledTimes(24)
    expect(faces.map((face) => [face.width, face.height])).toEqual(Array(6).fill([1024, 1024]))
  })

  it('refuses zoom 2 without maxZoom', async () => {
    const client = fakeClient()
    await expect(getPanorama(pano, { zoom: 2, client })).rejects.toBeInstanceOf(InvalidParameterError)
    expect(client.getBuffer).not.toHaveBeenCalled()
  })
})

describe('permalink', () => {
  it('points Naver Map at the panorama', () => {
    const link = permalink('P', { heading: 0, pitch: 0 })
    const match = link.match(/^https:\/\/map\.naver\.com\/p\?c=17,0,0,0,adh&p=P,0,0,([\d.]+),Float$/)
    expect(Number(match?.[1])).toBeCloseTo(80)
  })
})
