// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { beforeEach, describe, expect, it, vi } from 'vitest'
import { type Coordinate, sampleSquare } from './geo.js'
import {
  dedupePanoramas,
  type PanoramaRecord,
  PanoramaResolver,
  type Resolve,
} from './panorama.js'
import type { MetadataLookup, MetadataResponse } from './streetview.js'

function found(id: string, location: Coordinate): MetadataResponse {
  return { status: 'OK', pano_id: id, location }
}

function fakeResolve(table: [Coordinate, PanoramaRecord | null][]): Resolve {
  return async (point) => table.find(([p]) => p === point)?.[1] ?? null
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  return () => vi.restoreAllMocks()
})

describe('PanoramaResolver', () => {
  const point = { lat: 1.5, lng: 2.5 }

  it('returns the panorama id with its canonical location', async () => {
    const resolver = new PanoramaResolver(async () => found('pano-1', { lat: 1.6, lng: 2.4 }))
    expect(await resolver.resolve(point)).toEqual({
      id: 'pano-1',
      location: { lat: 1.6, lng: 2.4 },
    })
  })

  it.each<MetadataResponse>([
    { status: 'ZERO_RESULTS' },
    { status: 'OVER_QUERY_LIMIT' },
    { status: 'REQUEST_DENIED' },
    { status: 'OK' },
  ])('finds nothing for %j', async (response) => {
    const resolver = new PanoramaResolver(async () => response)
    expect(await resolver.resolve(point)).toBeNull()
  })

  it('treats a failed lookup as a miss', async () => {
    const resolver = new PanoramaResolver(async () => {
      throw new Error('socket hang up')
    })
    expect(await resolver.resolve(point)).toBeNull()
    expect(console.warn).toHaveBeenCalledWith('Metadata lookup failed for 1.5,2.5: socket hang up')
  })

  it('looks up each distinct point once', async () => {
    const lookup = vi.fn<MetadataLookup>(async (p) => found(`pano-${p.lat}`, p))
    const resolver = new PanoramaResolver(lookup)

    await resolver.resolve(point)
    await resolver.resolve({ lat: 1.5, lng: 2.5 })
    await resolver.resolve({ lat: 3, lng: 4 })

    expect(lookup).toHaveBeenCalledTimes(2)
    expect(resolver.cache.size).toBe(2)
  })

  it('reports a miss once per point', async () => {
    const resolver = new PanoramaResolver(async () => ({ status: 'ZERO_RESULTS' }))

    await resolver.resolve(point)
    await resolver.resolve({ lat: 1.5, lng: 2.5 })

    expect(console.log).toHaveBeenCalledTimes(1)
    expect(console.log).toHaveBeenCalledWith('Got no panorama for 1.5,2.5.')
  })

  it('shares a pending lookup between concurrent callers', async () => {
    const lookup = vi.fn<MetadataLookup>(async (p) => found('pano-1', p))
    const resolver = new PanoramaResolver(lookup)

    const [a, b] = await Promise.all([resolver.resolve(point), resolver.resolve(point)])

    expect(lookup).toHaveBeenCalledTimes(1)
    expect(a).toEqual(b)
  })

  it('looks up again after the cache is cleared', async () => {
    const lookup = vi.fn<MetadataLookup>(async () => ({ status: 'ZERO_RESULTS' }))
    const resolver = new PanoramaResolver(lookup)

    await resolver.resolve(point)
    resolver.cache.clear()
    await resolver.resolve(point)

    expect(lookup).toHaveBeenCalledTimes(2)
  })
})

describe('dedupePanoramas', () => {
  const p1 = { lat: 0, lng: 0 }
  const p2 = { lat: 0, lng: 1 }
  const p3 = { lat: 0, lng: 2 }
  const p4 = { lat: 0, lng: 3 }

  it('keeps one record per id, sorted by id', async () => {
    const resolve = fakeResolve([
      [p1, { id: 'c', location: p1 }],
      [p2, { id: 'a', location: p2 }],
      [p3, null],
      [p4, { id: 'b', location: p4 }],
    ])

    const records = await dedupePanoramas([p1, p2, p3, p4], resolve)

    expect(records.map(({ id }) => id)).toEqual(['a', 'b', 'c'])
  })

  it('keeps the location of the last point resolving to an id', async () => {
    const first = { lat: 10, lng: 10 }
    const last = { lat: 11, lng: 11 }
    const resolve = fakeResolve([
      [p1, { id: 'x', location: first }],
      [p2, { id: 'y', location: p2 }],
      [p3, { id: 'x', location: last }],
    ])

    const records = await dedupePanoramas([p1, p2, p3], resolve)

    expect(records).toEqual([
      { id: 'x', location: last },
      { id: 'y', location: p2 },
    ])
  })

  it('keeps distinct ids at the same place apart', async () => {
    const resolve = fakeResolve([
      [p1, { id: 'x', location: p1 }],
      [p2, { id: 'y', location: p1 }],
    ])

    expect(await dedupePanoramas([p1, p2], resolve)).toHaveLength(2)
  })

  it('reports every consumed point', async () => {
    const onPoint = vi.fn()
    await dedupePanoramas([p1, p2, p3], async () => null, { onPoint })
    expect(onPoint.mock.calls).toEqual([[p1], [p2], [p3]])
  })

  it('collapses a whole grid covered by one panorama into a single record', async () => {
    const lookup = vi.fn<MetadataLookup>(async (point) => found('A', point))
    const resolver = new PanoramaResolver(lookup)
    const points = Array.from(sampleSquare({ center: { lat: 50.0, lng: 30.0 }, side: 30 }))

    const records = await dedupePanoramas(points, (point) => resolver.resolve(point))

    expect(points).toHaveLength(4)
    expect(lookup).toHaveBeenCalledTimes(4)
    expect(records).toEqual([{ id: 'A', location: points[3] }])
  })
})
