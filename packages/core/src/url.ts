/**
 * URL helpers shared by the transport and the SDK.
 */

export type QueryParams = Readonly<Record<string, string | number | boolean | undefined>>

/**
 * Normalize API URL (ensure no trailing slash).
 */
export const normalizeApiUrl = (url: string): string => {
  return url.replace(/\/+$/, "")
}

/**
 * Build a request URL from a base URL (which may carry a path prefix), a
 * path starting with `/`, and optional query parameters. Undefined
 * parameters are omitted.
 */
export const buildUrl = (base: string, path: string, params?: QueryParams): string => {
  const url = new URL(`${normalizeApiUrl(base)}${path}`)

  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value))
      }
    }
  }

  return url.toString()
}

/**
 * Encode a caller-supplied identifier for use as one path segment.
 */
export const pathSegment = (value: string): string => encodeURIComponent(value)
