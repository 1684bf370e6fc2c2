// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { ReprojectionUnavailableError } from './errors.js'
import type { RawImage } from './stitch.js'

/** Lens parameters of one Look Around face */
export interface LensProjection {
  /** Phi size of the face */
  fovS: number
  /** Theta size of the face */
  fovH: number
  k2: number
  k3: number
  k4: number
  /** Theta offset */
  cx: number
  /** Phi offset */
  cy: number
  lx: number
  ly: number
}

export interface OrientedPosition {
  x: number
  y: number
  z: number
  yaw: number
  pitch: number
  roll: number
}

export interface CameraMetadata {
  lensProjection: LensProjection
  position: OrientedPosition
}

/**
 * Projects camera faces onto one equirectangular image. Implementations are
 * supplied by the caller; nothing in this package renders spherical faces.
 */
export interface Reprojector {
  readonly available: boolean
  toEquirectangular(faces: readonly RawImage[], cameras: readonly CameraMetadata[]): Promise<RawImage>
}

export const unavailableReprojector: Reprojector = {
  available: false,
  async toEquirectangular() {
    throw new ReprojectionUnavailableError()
  },
}
