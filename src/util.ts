import type { QueryParams, QueryValue } from './types'

const isList = (value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] =>
  Array.isArray(value)

/**
 * Builds query parameters, expanding arrays into repeated keys and dropping undefined values
 */
export const toSearchParams = (params?: QueryParams): URLSearchParams | undefined => {
  if (!params) {
    return undefined
  }
  const searchParams = new URLSearchParams()
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) {
      continue
    }
    const values = isList(value) ? value : [value]
    for (const item of values) {
      searchParams.append(name, String(item))
    }
  }
  return searchParams
}

/**
 * Resource paths are relative to the API base URL
 */
export const normalizePath = (resource: string) => resource.replace(/^\/+/, '')
