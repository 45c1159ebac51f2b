// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { z } from 'zod'
import { DEFAULT_STRIDE } from './geo.js'
import { DEFAULT_FOV, DEFAULT_SIZE } from './imagery.js'
import { gluedLayoutProblem, type StorageStrategy } from './storage.js'
import { ConfigurationError } from './utils.js'

const CoordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
})

export const CrawlConfigSchema = z
  .object({
    center: CoordinateSchema,
    output: z.string().min(1),
    apiKey: z.string().min(1, 'STREETVIEW_API_KEY is not set'),
    side: z.number().min(0).default(2000),
    stride: z.number().positive().default(DEFAULT_STRIDE),
    fov: z
      .number()
      .int()
      .positive()
      .refine((fov) => 360 % fov === 0, 'must evenly divide 360')
      .default(DEFAULT_FOV),
    size: z
      .object({ width: z.number().int().positive(), height: z.number().int().positive() })
      .default(DEFAULT_SIZE),
    storage: z.enum(['simple', 'glued']).default('simple'),
    duplicateSeam: z.boolean().default(true),
    concurrency: z.number().int().positive().default(1),
  })
  .superRefine((config, ctx) => {
    if (config.storage !== 'glued' || 360 % config.fov !== 0) return
    const problem = gluedLayoutProblem(config.fov, config.size, config.duplicateSeam)
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['storage'], message: problem })
  })

export type CrawlConfig = z.infer<typeof CrawlConfigSchema>

export function parseCrawlConfig(input: unknown): CrawlConfig {
  const result = CrawlConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration\n  ${issues.join('\n  ')}`)
  }
  return result.data
}

export function storageStrategy(config: CrawlConfig): StorageStrategy {
  return config.storage === 'glued'
    ? { kind: 'glued', duplicateSeam: config.duplicateSeam }
    : { kind: 'simple' }
}
