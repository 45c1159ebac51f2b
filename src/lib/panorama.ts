// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { Coordinate } from './geo.js'
import { isFound, type MetadataLookup, type MetadataResponse } from './streetview.js'
import { errorMessage } from './utils.js'

export interface PanoramaRecord {
  id: string
  /** Where the panorama was actually captured, not the sampled point */
  location: Coordinate
}

export type Resolve = (point: Coordinate) => Promise<PanoramaRecord | null>

/**
 * Metadata responses keyed by the exact queried coordinate. Pending lookups are stored too, so
 * concurrent queries of the same point share a single request.
 */
export class ResolverCache {
  private entries = new Map<string, Promise<MetadataResponse>>()

  private static key({ lat, lng }: Coordinate) {
    return `${lat},${lng}`
  }

  get(point: Coordinate, load: () => Promise<MetadataResponse>): Promise<MetadataResponse> {
    const key = ResolverCache.key(point)
    let entry = this.entries.get(key)
    if (!entry) {
      entry = load()
      this.entries.set(key, entry)
    }
    return entry
  }

  clear(): void {
    this.entries.clear()
  }

  get size() {
    return this.entries.size
  }
}

export class PanoramaResolver {
  constructor(
    private lookup: MetadataLookup,
    readonly cache = new ResolverCache(),
  ) {}

  async resolve(point: Coordinate): Promise<PanoramaRecord | null> {
    const response = await this.cache.get(point, () => this.load(point))
    if (!isFound(response)) return null
    return { id: response.pano_id, location: response.location }
  }

  /** Runs once per distinct point; cache hits are not logged again. */
  private async load(point: Coordinate): Promise<MetadataResponse> {
    let response: MetadataResponse
    try {
      response = await this.lookup(point)
    } catch (error) {
      console.warn(`Metadata lookup failed for ${point.lat},${point.lng}: ${errorMessage(error)}`)
      response = { status: 'LOOKUP_FAILED' }
    }
    if (!isFound(response)) console.log(`Got no panorama for ${point.lat},${point.lng}.`)
    return response
  }
}

/**
 * One record per distinct panorama id, sorted by id. When several points resolve to the same
 * panorama, the location reported for the last of them is kept. Panoramas with different ids are
 * never merged, however close they are.
 */
export async function dedupePanoramas(
  points: Iterable<Coordinate>,
  resolve: Resolve,
  { onPoint }: { onPoint?: (point: Coordinate) => void } = {},
): Promise<PanoramaRecord[]> {
  const panoramas = new Map<string, Coordinate>()
  for (const point of points) {
    const record = await resolve(point)
    if (record) panoramas.set(record.id, record.location)
    onPoint?.(point)
  }
  return Array.from(panoramas, ([id, location]) => ({ id, location })).sort((a, b) =>
    a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
  )
}
