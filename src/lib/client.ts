// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import pLimit from 'p-limit'
import { ClientClosedError, HttpError } from './errors.js'
import { sleep } from './utils.js'

export interface RequestOptions {
  /** Merged over the client's default headers */
  headers?: Record<string, string>
}

/**
 * A caller-owned HTTP client. One instance may be shared by any number of
 * concurrent panorama and tile requests; `close()` aborts everything in flight.
 */
export interface FetchClient {
  getText(url: string, options?: RequestOptions): Promise<string>
  getJson(url: string, options?: RequestOptions): Promise<unknown>
  getBuffer(url: string, options?: RequestOptions): Promise<Buffer>
  close(): void
  readonly closed: boolean
}

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>

export interface FetchClientOptions {
  concurrencyLimit?: number
  /** Number of attempts per request. 1 disables retrying. */
  retryLimit?: number
  retryDelay?: number
  headers?: Record<string, string>
  fetch?: FetchFunction
}

export function createFetchClient({
  concurrencyLimit = 16,
  retryLimit = 1,
  retryDelay = 1000,
  headers = {},
  fetch: fetchImpl = globalThis.fetch,
}: FetchClientOptions = {}): FetchClient {
  const fetchLimit = pLimit(concurrencyLimit)
  const controller = new AbortController()

  async function get<T>(
    url: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    return fetchLimit(() =>
      retry(
        async () => {
          if (controller.signal.aborted) throw new ClientClosedError(url)
          try {
            const response = await fetchImpl(url, {
              headers: { ...headers, ...options.headers },
              signal: controller.signal,
            })
            if (!response.ok) {
              // release the connection, nothing reads the body
              await response.body?.cancel()
              throw new HttpError(response.status, url)
            }
            return await read(response)
          } catch (e) {
            if (controller.signal.aborted) throw new ClientClosedError(url)
            throw e
          }
        },
        { retryLimit, retryDelay, isFatal: (e) => e instanceof ClientClosedError },
      ),
    )
  }

  return {
    async getText(url, options = {}) {
      return get(url, options, (response) => response.text())
    },
    async getJson(url, options = {}) {
      return get(url, options, async (response) => JSON.parse(await response.text()))
    },
    async getBuffer(url, options = {}) {
      return get(url, options, async (response) => Buffer.from(await response.arrayBuffer()))
    },
    close() {
      controller.abort()
    },
    get closed() {
      return controller.signal.aborted
    },
  }
}

async function retry<T>(
  fn: () => Promise<T>,
  options: { retryLimit: number; retryDelay: number; isFatal: (e: unknown) => boolean },
): Promise<T> {
  const { retryLimit, retryDelay, isFatal } = options
  let i = 0
  while (true) {
    try {
      return await fn()
    } catch (e) {
      if (i >= retryLimit - 1 || isFatal(e)) throw e
    }
    await sleep(retryDelay * 2 ** i)
    i++
  }
}
