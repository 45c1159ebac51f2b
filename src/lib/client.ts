// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import pLimit from 'p-limit'

export interface FetchClient {
  getText(url: string): Promise<string>
  getBuffer(url: string): Promise<Buffer>
}

export class HttpError extends Error {
  override name = 'HttpError'

  constructor(
    public status: number,
    public url: string,
  ) {
    super(`HTTP ${status}`)
  }
}

/**
 * Requests are not retried: a failed request is final for that request and
 * the caller decides what a failure means.
 */
export function createFetchClient({ concurrencyLimit = 4 } = {}): FetchClient {
  const fetchLimit = pLimit(concurrencyLimit)

  async function get(url: string) {
    const response = await fetch(url)
    if (!response.ok) throw new HttpError(response.status, url)
    return response
  }

  return {
    async getText(url: string) {
      return fetchLimit(async () => {
        const response = await get(url)
        return await response.text()
      })
    },
    async getBuffer(url: string) {
      return fetchLimit(async () => {
        const response = await get(url)
        const arrayBuffer = await response.arrayBuffer()
        return Buffer.from(arrayBuffer)
      })
    },
  }
}
