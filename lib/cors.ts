// Restrict cross-origin access to known app origins. Same-origin requests do
// not need CORS headers; these stop third-party sites from driving traffic
// through browser-based cross-origin requests.

const DEV_ORIGIN = 'http://localhost:3000'

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Max-Age': '86400',
}

/** Comma-separated ALLOWED_ORIGINS, always including the local dev server. */
export function allowedOriginsFromEnv(env: Partial<NodeJS.ProcessEnv> = process.env): string[] {
  const configured = (env.ALLOWED_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim().replace(/\/+$/, ''))
    .filter(Boolean)
  return Array.from(new Set([...configured, DEV_ORIGIN]))
}

/**
 * The Access-Control-Allow-Origin value for a request origin: the origin itself
 * when allowed, otherwise the first allowed origin.
 */
export function corsOrigin(origin: string | null, allowed: string[]): string {
  return origin && allowed.includes(origin) ? origin : allowed[0]
}
