// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { ConfigurationError } from './utils.js'

/** Mean earth radius in meters */
const EARTH_RADIUS = 6371008.8

/** Distance between two consecutive samples of a grid, in meters */
export const DEFAULT_STRIDE = 30

export interface Coordinate {
  readonly lat: number
  readonly lng: number
}

export interface GridSpec {
  center: Coordinate
  /** Side of the square, in meters */
  side: number
  stride?: number
}

const toRadians = (degrees: number) => degrees * (Math.PI / 180)
const toDegrees = (radians: number) => radians * (180 / Math.PI)

/**
 * Point reached by travelling `distance` meters from `origin` along the great circle starting at
 * `bearing` (0 = north, 90 = east).
 */
export function destinationPoint(origin: Coordinate, bearing: number, distance: number): Coordinate {
  const delta = distance / EARTH_RADIUS
  const theta = toRadians(bearing)
  const phi1 = toRadians(origin.lat)
  const lambda1 = toRadians(origin.lng)

  const sinPhi2 =
    Math.sin(phi1) * Math.cos(delta) + Math.cos(phi1) * Math.sin(delta) * Math.cos(theta)
  const phi2 = Math.asin(sinPhi2)
  const lambda2 =
    lambda1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(delta) * Math.cos(phi1),
      Math.cos(delta) - Math.sin(phi1) * sinPhi2,
    )

  return { lat: toDegrees(phi2), lng: ((toDegrees(lambda2) + 540) % 360) - 180 }
}

/** https://en.wikipedia.org/wiki/Haversine_formula */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const dLat = toRadians(b.lat - a.lat)
  const dLng = toRadians(b.lng - a.lng)
  const inner =
    Math.sin(dLat / 2) ** 2 +
    Math.sin(dLng / 2) ** 2 * Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat))
  return 2 * EARTH_RADIUS * Math.asin(Math.sqrt(inner))
}

export function parseCoordinate(text: string): Coordinate {
  const parts = text.split(',')
  const [lat, lng] = parts.map((part) => Number(part.trim()))
  const malformed = parts.length !== 2 || parts.some((part) => !part.trim())
  if (malformed || !Number.isFinite(lat) || !Number.isFinite(lng)) {
    throw new ConfigurationError(`Expected "lat,lng", got ${JSON.stringify(text)}`)
  }
  return { lat, lng }
}

function gridSteps({ side, stride = DEFAULT_STRIDE }: GridSpec): number {
  if (!(side >= 0)) throw new ConfigurationError(`Square side must be >= 0, got ${side}`)
  if (!(stride > 0)) throw new ConfigurationError(`Stride must be > 0, got ${stride}`)
  return Math.floor(side / stride) + 1
}

export function countSamples(spec: GridSpec): number {
  return gridSteps(spec) ** 2
}

export function upperLeftCorner({ center, side }: GridSpec): Coordinate {
  const left = destinationPoint(center, 270, side / 2)
  return destinationPoint(left, 0, side / 2)
}

/**
 * Points of a square lattice centred on `spec.center`, both edges included, row by row from the
 * north-west corner. Each point is reached from the corner by going east first, then south.
 */
export function* sampleSquare(spec: GridSpec): Generator<Coordinate> {
  const { stride = DEFAULT_STRIDE } = spec
  const steps = gridSteps(spec)
  const corner = upperLeftCorner(spec)
  for (let row = 0; row < steps; row++) {
    for (let col = 0; col < steps; col++) {
      const east = destinationPoint(corner, 90, col * stride)
      yield destinationPoint(east, 180, row * stride)
    }
  }
}
