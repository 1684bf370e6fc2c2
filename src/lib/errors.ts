// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

/** The server answered with a status outside 200-299. */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`)
    this.name = 'HttpError'
  }
}

/** A request was issued on, or was in flight when closing, a closed client. */
export class ClientClosedError extends Error {
  constructor(public readonly url: string) {
    super(`Client closed before ${url} completed`)
    this.name = 'ClientClosedError'
  }
}

/** Precondition violation, raised before any network call is made. */
export class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidParameterError'
  }
}

export class ReprojectionUnavailableError extends Error {
  constructor() {
    super('No reprojector is available; pass one in the `reprojector` option')
    this.name = 'ReprojectionUnavailableError'
  }
}
