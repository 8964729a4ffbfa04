import { Store } from './store'

export interface StoreEntry {
  value: string
  /**
   * epoch milliseconds
   */
  expiresAt: number
}

/**
 * @public
 */
export class MemoryStore extends Store {
  protected entries = new Map<string, StoreEntry>()

  constructor() {
    super()
  }

  get(key: string): string | undefined {
    return this.liveEntry(key)?.value
  }

  set(key: string, value: string, ttl: number): void {
    this.entries.set(key, { value, expiresAt: Date.now() + ttl * 1000 })
  }

  getTtl(key: string): number | undefined {
    const entry = this.liveEntry(key)
    if (!entry) {
      return undefined
    }
    return Math.round((entry.expiresAt - Date.now()) / 1000)
  }

  protected liveEntry(key: string): StoreEntry | undefined {
    const entry = this.entries.get(key)
    if (entry && entry.expiresAt <= Date.now()) {
      this.entries.delete(key)
      return undefined
    }
    return entry
  }
}
