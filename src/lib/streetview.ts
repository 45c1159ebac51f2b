// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { z } from 'zod'
import { createFetchClient, type FetchClient } from './client.js'
import type { Coordinate } from './geo.js'
import type { ImageFetcher, ImageRequest } from './imagery.js'

const API_BASE = 'https://maps.googleapis.com/maps/api/streetview'

const FoundMetadataSchema = z.object({
  status: z.literal('OK'),
  pano_id: z.string().min(1),
  location: z.object({ lat: z.number(), lng: z.number() }),
})

export const MetadataResponseSchema = z.union([
  FoundMetadataSchema,
  z.object({ status: z.string() }),
])

export type FoundMetadata = z.infer<typeof FoundMetadataSchema>
export type MetadataResponse = z.infer<typeof MetadataResponseSchema>

/** One metadata request per call. Callers own caching. */
export type MetadataLookup = (point: Coordinate) => Promise<MetadataResponse>

export interface StreetViewOptions {
  apiKey: string
  client?: FetchClient
}

/** `ZERO_RESULTS` and error statuses alike mean "no panorama here". */
export function isFound(response: MetadataResponse): response is FoundMetadata {
  return response.status === 'OK' && 'pano_id' in response
}

export function metadataUrl(point: Coordinate, apiKey: string): string {
  const location = encodeURIComponent(`${point.lat},${point.lng}`)
  return `${API_BASE}/metadata?location=${location}&key=${apiKey}`
}

export function imageUrl(request: ImageRequest, apiKey: string): string {
  const { panoId, fov, heading, size } = request
  return (
    `${API_BASE}?size=${size.width}x${size.height}` +
    `&pano=${encodeURIComponent(panoId)}&heading=${heading}&fov=${fov}` +
    `&key=${apiKey}&return_error_code=true`
  )
}

export function createMetadataLookup({
  apiKey,
  client = createFetchClient(),
}: StreetViewOptions): MetadataLookup {
  return async (point) => {
    const text = await client.getText(metadataUrl(point, apiKey))
    return MetadataResponseSchema.parse(JSON.parse(text))
  }
}

export function createImageFetcher({
  apiKey,
  client = createFetchClient(),
}: StreetViewOptions): ImageFetcher {
  return (request) => client.getBuffer(imageUrl(request, apiKey))
}
