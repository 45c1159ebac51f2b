// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { PanoramaRecord } from './panorama.js'
import { ConfigurationError, errorMessage } from './utils.js'

export interface ImageSize {
  width: number
  height: number
}

export const DEFAULT_FOV = 90
export const DEFAULT_SIZE: ImageSize = { width: 600, height: 400 }

/** A directional view of a panorama. Addressed by panorama id, never by location. */
export interface ImageRequest {
  panoId: string
  fov: number
  /** (0, 90, 180, 270) = (north, east, south, west) */
  heading: number
  size: ImageSize
}

export interface AcquiredImage {
  request: ImageRequest
  data: Buffer
}

export type AcquireResult =
  | { ok: true; image: AcquiredImage }
  | { ok: false; request: ImageRequest; error: unknown }

export type ImageFetcher = (request: ImageRequest) => Promise<Buffer>

export function assertValidFov(fov: number): void {
  if (!Number.isInteger(fov) || fov <= 0 || 360 % fov !== 0) {
    throw new ConfigurationError(`Field of view must evenly divide 360, got ${fov}`)
  }
}

/** One request per heading sector, starting north and going clockwise. */
export function imageRequests(
  record: PanoramaRecord,
  { fov = DEFAULT_FOV, size = DEFAULT_SIZE }: { fov?: number; size?: ImageSize } = {},
): ImageRequest[] {
  assertValidFov(fov)
  return Array.from({ length: 360 / fov }, (_, i) => ({
    panoId: record.id,
    fov,
    heading: i * fov,
    size,
  }))
}

export function describeRequest({ panoId, fov, heading }: ImageRequest): string {
  return `${panoId} (fov ${fov}, heading ${heading})`
}

/**
 * Fetches the requests one after another. A failed request is reported in its result and does
 * not stop the others.
 */
export async function acquireImages(
  requests: Iterable<ImageRequest>,
  fetchImage: ImageFetcher,
): Promise<AcquireResult[]> {
  const results: AcquireResult[] = []
  for (const request of requests) {
    console.log(`Downloading ${describeRequest(request)} ...`)
    try {
      const data = await fetchImage(request)
      results.push({ ok: true, image: { request, data } })
    } catch (error) {
      console.warn(`Got error downloading ${describeRequest(request)}: ${errorMessage(error)}.`)
      results.push({ ok: false, request, error })
    }
  }
  return results
}

export function acquiredImages(results: AcquireResult[]): AcquiredImage[] {
  return results.flatMap((result) => (result.ok ? [result.image] : []))
}
