// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import pMap from 'p-map'
import type { FetchClient } from './client.js'

/** One tile of a tiled panorama. `x` and `y` are zero-based grid indices. */
export interface TileAddress {
  x: number
  y: number
  url: string
}

/** Values keyed by tile grid position */
export class TileMap<T> implements Iterable<[x: number, y: number, value: T]> {
  private entries = new Map<string, { x: number; y: number; value: T }>()

  get(x: number, y: number): T | undefined {
    return this.entries.get(`${x},${y}`)?.value
  }

  has(x: number, y: number): boolean {
    return this.entries.has(`${x},${y}`)
  }

  set(x: number, y: number, value: T): this {
    this.entries.set(`${x},${y}`, { x, y, value })
    return this
  }

  delete(x: number, y: number): boolean {
    return this.entries.delete(`${x},${y}`)
  }

  get size(): number {
    return this.entries.size
  }

  *[Symbol.iterator](): IterableIterator<[x: number, y: number, value: T]> {
    for (const { x, y, value } of this.entries.values()) {
      yield [x, y, value]
    }
  }
}

export interface FetchTilesOptions {
  client: FetchClient
  headers?: Record<string, string>
  /** Called once per downloaded tile, in completion order */
  onTile?: (tile: TileAddress) => void
}

/**
 * Downloads every tile at once. Rejects as soon as one request fails;
 * there is no partial result.
 */
export async function fetchTiles(
  addresses: readonly TileAddress[],
  options: FetchTilesOptions,
): Promise<TileMap<Buffer>> {
  return fetchWithConcurrency(addresses, options, Infinity)
}

/** Same as {@link fetchTiles}, one request at a time. */
export async function fetchTilesSequential(
  addresses: readonly TileAddress[],
  options: FetchTilesOptions,
): Promise<TileMap<Buffer>> {
  return fetchWithConcurrency(addresses, options, 1)
}

/** Downloads the tiles of several faces. The result keeps the face order of the input. */
export async function fetchFaceTiles(
  faces: readonly (readonly TileAddress[])[],
  { sequential = false, ...options }: FetchTilesOptions & { sequential?: boolean },
): Promise<TileMap<Buffer>[]> {
  if (sequential) {
    const result: TileMap<Buffer>[] = []
    for (const face of faces) {
      result.push(await fetchTilesSequential(face, options))
    }
    return result
  }
  return Promise.all(faces.map((face) => fetchTiles(face, options)))
}

async function fetchWithConcurrency(
  addresses: readonly TileAddress[],
  { client, headers, onTile }: FetchTilesOptions,
  concurrency: number,
): Promise<TileMap<Buffer>> {
  const buffers = await pMap(
    addresses,
    async (tile) => {
      const buffer = await client.getBuffer(tile.url, { headers })
      onTile?.(tile)
      return buffer
    },
    { concurrency },
  )

  const tiles = new TileMap<Buffer>()
  addresses.forEach((tile, i) => tiles.set(tile.x, tile.y, buffers[i]))
  return tiles
}
