// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync } from 'node:fs'
import { appendFile, mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import pLimit from 'p-limit'
import {
  acquiredImages,
  acquireImages,
  assertValidFov,
  DEFAULT_FOV,
  DEFAULT_SIZE,
  type ImageFetcher,
  type ImageSize,
  imageRequests,
} from './imagery.js'
import type { PanoramaRecord } from './panorama.js'
import { assertGluedLayout, savePanorama, type StorageStrategy } from './storage.js'
import { Lock, OutputExistsError } from './utils.js'

export const INDEX_FILE = 'index.csv'
const INDEX_HEADER = ['pano_id', 'latitude', 'longitude']

export interface CatalogueOptions {
  directory: string
  fetchImage: ImageFetcher
  storage?: StorageStrategy
  fov?: number
  size?: ImageSize
  /** Panoramas downloaded at the same time */
  concurrency?: number
}

export interface CatalogueSummary {
  explored: number
  downloaded: number
  images: number
}

/** Records, or a deferred producer of them that only runs once the output is known to be free. */
export type PanoramaSource =
  | Iterable<PanoramaRecord>
  | (() => Promise<Iterable<PanoramaRecord>> | Iterable<PanoramaRecord>)

function csvField(value: string | number): string {
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text
}

export function csvRow(values: (string | number)[]): string {
  return values.map(csvField).join(',') + '\n'
}

export class Catalogue {
  private directory: string
  private fetchImage: ImageFetcher
  private storage: StorageStrategy
  private fov: number
  private size: ImageSize
  private concurrency: number

  constructor({
    directory,
    fetchImage,
    storage = { kind: 'simple' },
    fov = DEFAULT_FOV,
    size = DEFAULT_SIZE,
    concurrency = 1,
  }: CatalogueOptions) {
    assertValidFov(fov)
    if (storage.kind === 'glued') assertGluedLayout(fov, size, storage.duplicateSeam)
    this.directory = directory
    this.fetchImage = fetchImage
    this.storage = storage
    this.fov = fov
    this.size = size
    this.concurrency = concurrency
  }

  get indexPath() {
    return join(this.directory, INDEX_FILE)
  }

  async add(source: PanoramaSource): Promise<CatalogueSummary> {
    const indexPath = this.indexPath
    if (existsSync(indexPath)) throw new OutputExistsError(indexPath)
    await mkdir(this.directory, { recursive: true })
    await writeFile(indexPath, csvRow(INDEX_HEADER), { flag: 'wx' })

    const panoramas = Array.from(typeof source === 'function' ? await source() : source)
    console.log(`Got ${panoramas.length} panoramas to explore.`)

    const summary: CatalogueSummary = { explored: panoramas.length, downloaded: 0, images: 0 }
    const limit = pLimit(Math.max(1, this.concurrency))
    const indexLock = new Lock()
    // after a failure, panoramas still waiting are skipped and the ones in flight are awaited
    const failures: unknown[] = []
    await Promise.all(
      panoramas.map((pano, i) =>
        limit(async () => {
          if (failures.length > 0) return
          try {
            console.log(`Getting panorama ${i + 1} of ${panoramas.length}...`)
            const saved = await this.download(pano)
            if (saved === 0) return
            await indexLock.run(async () => {
              const { id, location } = pano
              await appendFile(indexPath, csvRow([id, location.lat, location.lng]))
              summary.downloaded++
              summary.images += saved
            })
          } catch (error) {
            failures.push(error)
          }
        }),
      ),
    )
    if (failures.length > 0) throw failures[0]
    return summary
  }

  /** Number of images acquired for the panorama; zero means nothing was written for it. */
  async download(pano: PanoramaRecord): Promise<number> {
    const requests = imageRequests(pano, { fov: this.fov, size: this.size })
    const images = acquiredImages(await acquireImages(requests, this.fetchImage))
    if (images.length === 0) {
      console.warn(`No image could be downloaded for ${pano.id}.`)
      return 0
    }
    const paths = await savePanorama(this.directory, pano.id, images, this.storage)
    if (paths.length === 0) {
      console.warn(`Nothing could be saved for ${pano.id}.`)
      return 0
    }
    return images.length
  }
}
