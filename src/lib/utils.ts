// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

/** Invalid crawl settings. Raised before any work starts. */
export class ConfigurationError extends Error {
  override name = 'ConfigurationError'
}

/** The output of a previous run is in the way. */
export class OutputExistsError extends Error {
  override name = 'OutputExistsError'

  constructor(public path: string) {
    super(`${path} already exists`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class Lock {
  private locked = false
  private waiting: (() => void)[] = []

  async acquire(): Promise<void> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waiting.push(resolve)
      })
    }
    this.locked = true
  }

  release(): void {
    const resolve = this.waiting.shift()
    if (resolve) {
      resolve()
    } else {
      this.locked = false
    }
  }

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}
