#!/usr/bin/env node
// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import 'dotenv/config'

import cliProgress from 'cli-progress'
import dedent from 'dedent'
import { parseArgs } from 'node:util'
import { Catalogue } from './lib/catalogue.js'
import { createFetchClient } from './lib/client.js'
import { parseCrawlConfig, storageStrategy } from './lib/config.js'
import { countSamples, type GridSpec, parseCoordinate, sampleSquare } from './lib/geo.js'
import { DEFAULT_SIZE } from './lib/imagery.js'
import { dedupePanoramas, PanoramaResolver } from './lib/panorama.js'
import { createImageFetcher, createMetadataLookup } from './lib/streetview.js'
import { ConfigurationError, OutputExistsError } from './lib/utils.js'

const USAGE = dedent`
  Usage: crawl <lat,lng> <output-dir> [options]

  Options:
    --side <meters>         side of the square to sample (default 2000)
    --stride <meters>       distance between samples (default 30)
    --fov <degrees>         field of view of each image, must divide 360 (default 90)
    --width <px>            image width (default 600)
    --height <px>           image height (default 400)
    --glued                 save one stitched image per panorama
    --no-seam               do not repeat the last sector at the left edge of stitched images
    --concurrency <count>   panoramas downloaded at the same time (default 1)

  The API key is read from STREETVIEW_API_KEY.
`

function optionalNumber(value: string | undefined) {
  return value === undefined ? undefined : Number(value)
}

function loadConfig(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      side: { type: 'string' },
      stride: { type: 'string' },
      fov: { type: 'string' },
      width: { type: 'string' },
      height: { type: 'string' },
      glued: { type: 'boolean', default: false },
      'no-seam': { type: 'boolean', default: false },
      concurrency: { type: 'string' },
    },
  })
  if (positionals.length !== 2) throw new ConfigurationError('Expected <lat,lng> <output-dir>')
  const [center, output] = positionals

  return parseCrawlConfig({
    center: parseCoordinate(center),
    output,
    apiKey: process.env.STREETVIEW_API_KEY ?? '',
    side: optionalNumber(values.side),
    stride: optionalNumber(values.stride),
    fov: optionalNumber(values.fov),
    size: {
      width: optionalNumber(values.width) ?? DEFAULT_SIZE.width,
      height: optionalNumber(values.height) ?? DEFAULT_SIZE.height,
    },
    storage: values.glued ? 'glued' : 'simple',
    duplicateSeam: !values['no-seam'],
    concurrency: optionalNumber(values.concurrency),
  })
}

async function crawl(argv: string[]) {
  const config = loadConfig(argv)
  const client = createFetchClient({ concurrencyLimit: config.concurrency })
  const resolver = new PanoramaResolver(createMetadataLookup({ apiKey: config.apiKey, client }))
  const grid: GridSpec = { center: config.center, side: config.side, stride: config.stride }

  const catalogue = new Catalogue({
    directory: config.output,
    fetchImage: createImageFetcher({ apiKey: config.apiKey, client }),
    storage: storageStrategy(config),
    fov: config.fov,
    size: config.size,
    concurrency: config.concurrency,
  })

  const summary = await catalogue.add(async () => {
    console.log(`Looking for panoramas at ${countSamples(grid)} points`)
    const bar = new cliProgress.SingleBar({ etaBuffer: 1000 })
    bar.start(countSamples(grid), 0)
    try {
      return await dedupePanoramas(sampleSquare(grid), (point) => resolver.resolve(point), {
        onPoint: () => bar.increment(),
      })
    } finally {
      bar.stop()
    }
  })

  console.log(
    `Downloaded ${summary.images} images of ${summary.downloaded} / ${summary.explored} panoramas`,
  )
}

try {
  await crawl(process.argv.slice(2))
} catch (error) {
  if (!(error instanceof ConfigurationError || error instanceof OutputExistsError)) throw error
  console.error(error.message)
  if (error instanceof ConfigurationError) console.error(`\n${USAGE}`)
  process.exitCode = 1
}
