// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, it } from 'vitest'
import { parseCrawlConfig, storageStrategy } from './config.js'
import { ConfigurationError } from './utils.js'

const required = { center: { lat: 50, lng: 30 }, output: 'out', apiKey: 'test-key' }

describe('parseCrawlConfig', () => {
  it('fills in the defaults', () => {
    expect(parseCrawlConfig(required)).toEqual({
      ...required,
      side: 2000,
      stride: 30,
      fov: 90,
      size: { width: 600, height: 400 },
      storage: 'simple',
      duplicateSeam: true,
      concurrency: 1,
    })
  })

  it('rejects a field of view that does not divide 360', () => {
    expect(() => parseCrawlConfig({ ...required, fov: 7 })).toThrow(
      'Invalid configuration\n  fov: must evenly divide 360',
    )
  })

  it('rejects glued settings whose composite cannot be written', () => {
    expect(() => parseCrawlConfig({ ...required, storage: 'glued', fov: 10 })).toThrow(
      'storage: Composite file name would be 287 bytes long, more than 255',
    )
    expect(() => parseCrawlConfig({ ...required, storage: 'glued', fov: 3 })).toThrow(
      'storage: Composite would be 72600px wide, more than the 65535px JPEG allows',
    )
    expect(parseCrawlConfig({ ...required, fov: 10 }).fov).toBe(10)
  })

  it('requires an API key', () => {
    expect(() => parseCrawlConfig({ ...required, apiKey: '' })).toThrow(ConfigurationError)
  })

  it.each([
    { center: { lat: 91, lng: 0 } },
    { side: -30 },
    { stride: 0 },
    { concurrency: 0 },
    { storage: 'tiled' },
  ])('rejects %j', (override) => {
    expect(() => parseCrawlConfig({ ...required, ...override })).toThrow(ConfigurationError)
  })
})

describe('storageStrategy', () => {
  it('selects the strategy from the configuration', () => {
    expect(storageStrategy(parseCrawlConfig(required))).toEqual({ kind: 'simple' })
    expect(
      storageStrategy(parseCrawlConfig({ ...required, storage: 'glued', duplicateSeam: false })),
    ).toEqual({ kind: 'glued', duplicateSeam: false })
  })
})
