import * as fs from 'node:fs'
import * as promisesFs from 'node:fs/promises'
import path from 'path'
import { z } from 'zod'
import { MemoryStore } from './memstore'

const fileSchema = z.record(
  z.object({
    value: z.string(),
    expiresAt: z.number()
  })
)

/**
 * {@link MemoryStore} persisted to a JSON file, so a restarted process can pick up its token.
 * @public
 */
export class FileTokenStore extends MemoryStore {
  readonly filePath: string

  constructor(filePath: string) {
    super()
    if (!filePath) {
      throw new Error('Unknown file for read/write token')
    }
    this.filePath = filePath
    this.ensureTokenDirectory(filePath)

    const entries = this.#loadFromFile(filePath)
    if (entries) {
      for (const [key, entry] of Object.entries(entries)) {
        this.entries.set(key, entry)
      }
    }
  }

  private ensureTokenDirectory(filePath: string) {
    const dir = path.dirname(filePath)
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
  }

  override set(key: string, value: string, ttl: number) {
    super.set(key, value, ttl)
    return this.#saveToFile(this.filePath)
  }

  #loadFromFile(filePath: string) {
    if (!fs.existsSync(filePath)) {
      return null
    }
    const data = fs.readFileSync(filePath, { encoding: 'utf-8' })
    if (!data) {
      return null
    }
    let json: unknown
    try {
      json = JSON.parse(data)
    } catch (e) {
      throw new Error(`Could not parse token file ${filePath}. Please ensure it is not corrupted.`, {
        cause: e
      })
    }
    const parsed = fileSchema.safeParse(json)
    if (!parsed.success) {
      throw new Error(`Could not parse token file ${filePath}. Please ensure it is not corrupted.`)
    }
    return parsed.data
  }

  #saveToFile(filePath: string) {
    return promisesFs.writeFile(filePath, JSON.stringify(Object.fromEntries(this.entries)), {
      encoding: 'utf-8'
    })
  }
}
