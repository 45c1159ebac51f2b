// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import sharp from 'sharp'
import type { AcquiredImage, ImageRequest, ImageSize } from './imagery.js'
import { ConfigurationError, errorMessage } from './utils.js'

/** Widest image libvips can encode as JPEG */
export const JPEG_MAX_DIMENSION = 65535
export const MAX_FILE_NAME_BYTES = 255

/**
 * - `simple`: one file per directional image.
 * - `glued`: every image of a panorama side by side in a single file. With `duplicateSeam` the
 *   last sector is repeated at the left edge so the 360 to 0 wraparound appears unbroken there.
 */
export type StorageStrategy = { kind: 'simple' } | { kind: 'glued'; duplicateSeam: boolean }

type Sector = Pick<ImageRequest, 'fov' | 'heading'>

interface DecodedImage extends AcquiredImage {
  width: number
  height: number
}

export function panoramaDirectory(directory: string, panoId: string): string {
  return join(directory, panoId)
}

export function tileName({ fov, heading }: Sector): string {
  return `${fov}-${heading}.jpg`
}

export function compositeName(sectors: Sector[]): string {
  return sectors.map(({ fov, heading }) => `${fov}-${heading}`).join('--') + '.jpg'
}

/** Why a full composite could not be written with these settings, or null when it can. */
export function gluedLayoutProblem(
  fov: number,
  size: ImageSize,
  duplicateSeam: boolean,
): string | null {
  const sectors = Array.from({ length: Math.floor(360 / fov) }, (_, i) => ({
    fov,
    heading: i * fov,
  }))
  const last = sectors.at(-1)
  const strip = duplicateSeam && last ? [last, ...sectors] : sectors

  const width = strip.length * size.width
  if (width > JPEG_MAX_DIMENSION) {
    return `Composite would be ${width}px wide, more than the ${JPEG_MAX_DIMENSION}px JPEG allows`
  }
  const nameBytes = Buffer.byteLength(compositeName(strip))
  if (nameBytes > MAX_FILE_NAME_BYTES) {
    return `Composite file name would be ${nameBytes} bytes long, more than ${MAX_FILE_NAME_BYTES}`
  }
  return null
}

export function assertGluedLayout(fov: number, size: ImageSize, duplicateSeam: boolean): void {
  const problem = gluedLayoutProblem(fov, size, duplicateSeam)
  if (problem) throw new ConfigurationError(problem)
}

/**
 * Returns the paths written, none when there is nothing to save. The panorama folder is removed
 * again when writing into it fails.
 */
export async function savePanorama(
  directory: string,
  panoId: string,
  images: AcquiredImage[],
  strategy: StorageStrategy,
): Promise<string[]> {
  if (images.length === 0) return []
  const folder = panoramaDirectory(directory, panoId)
  switch (strategy.kind) {
    case 'simple':
      return intoFolder(folder, () => saveTiles(folder, images))
    case 'glued': {
      const decoded = await decodeImages(images)
      if (decoded.length === 0) return []
      return intoFolder(folder, async () => [
        await saveComposite(folder, decoded, strategy.duplicateSeam),
      ])
    }
  }
}

async function intoFolder<T>(folder: string, write: () => Promise<T>): Promise<T> {
  const created = await mkdir(folder, { recursive: true })
  try {
    return await write()
  } catch (error) {
    if (created) await rm(folder, { recursive: true, force: true })
    throw error
  }
}

async function saveTiles(folder: string, images: AcquiredImage[]): Promise<string[]> {
  const paths: string[] = []
  for (const { request, data } of images) {
    const path = join(folder, tileName(request))
    await writeFile(path, data)
    paths.push(path)
  }
  return paths
}

/** Images sharp cannot read are left out, with a warning. */
export async function decodeImages(images: AcquiredImage[]): Promise<DecodedImage[]> {
  const decoded: DecodedImage[] = []
  for (const image of images) {
    const { panoId, heading } = image.request
    try {
      const { width, height } = await sharp(image.data).metadata()
      if (width && height) {
        decoded.push({ ...image, width, height })
        continue
      }
      console.warn(`Dropping image of ${panoId} heading ${heading}: unknown size.`)
    } catch (error) {
      console.warn(`Dropping image of ${panoId} heading ${heading}: ${errorMessage(error)}.`)
    }
  }
  return decoded
}

export function seamStrip<T extends AcquiredImage>(images: T[], duplicateSeam: boolean): T[] {
  const sorted = [...images].sort((a, b) => a.request.heading - b.request.heading)
  const last = sorted.at(-1)
  return duplicateSeam && last ? [last, ...sorted] : sorted
}

async function saveComposite(
  folder: string,
  images: DecodedImage[],
  duplicateSeam: boolean,
): Promise<string> {
  const strip = seamStrip(images, duplicateSeam)

  // Shorter images are pasted at the top and leave the background visible below them
  let left = 0
  const layers = strip.map(({ data, width }) => {
    const layer = { input: data, left, top: 0 }
    left += width
    return layer
  })

  const path = join(folder, compositeName(strip.map(({ request }) => request)))
  await sharp({
    create: {
      width: left,
      height: Math.max(...strip.map(({ height }) => height)),
      channels: 3,
      background: '#000000',
    },
  })
    .composite(layers)
    .jpeg()
    .toFile(path)
  return path
}
