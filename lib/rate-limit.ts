const WINDOW_MS = 60_000
const DEFAULT_MAX_REQUESTS = 60
const SWEEP_INTERVAL_MS = 5 * 60 * 1000

export type RateLimiterOptions = {
  windowMs?: number
  maxRequests?: number
  now?: () => number
}

export type RateLimiter = {
  /**
   * Returns null if the request is allowed.
   * Returns a 429 Response if the rate limit is exceeded.
   */
  check(ip: string): Response | null
  /** Number of IPs currently tracked. */
  size(): number
}

export function maxRequestsFromEnv(env: Partial<NodeJS.ProcessEnv> = process.env): number {
  const parsed = Number(env.RATE_LIMIT_MAX_REQUESTS)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_REQUESTS
}

export function getClientIp(request: Request): string {
  const forwarded = request.headers.get('x-forwarded-for')
  if (forwarded) return forwarded.split(',')[0].trim()
  return '127.0.0.1'
}

function tooManyRequests(retryAfter: number): Response {
  return new Response(
    JSON.stringify({
      errors: [
        {
          message: 'Too many requests. Please slow down.',
          extensions: { code: 'RATE_LIMITED' },
        },
      ],
    }),
    {
      status: 429,
      headers: {
        'Content-Type': 'application/json',
        'Retry-After': String(retryAfter),
      },
    }
  )
}

export function createRateLimiter({
  windowMs = WINDOW_MS,
  maxRequests = DEFAULT_MAX_REQUESTS,
  now = Date.now,
}: RateLimiterOptions = {}): RateLimiter {
  // Map<ip, request timestamps[]> — timestamps are ms epoch values, oldest-first
  const store = new Map<string, number[]>()
  let lastSweep = now()

  // Evict IPs with no activity in the last window
  function sweep(at: number) {
    const cutoff = at - windowMs
    for (const [ip, timestamps] of store) {
      const fresh = timestamps.filter((t) => t >= cutoff)
      if (fresh.length === 0) store.delete(ip)
      else store.set(ip, fresh)
    }
    lastSweep = at
  }

  return {
    check(ip) {
      const at = now()
      if (at - lastSweep >= SWEEP_INTERVAL_MS) sweep(at)

      const cutoff = at - windowMs
      const timestamps = (store.get(ip) ?? []).filter((t) => t >= cutoff)

      if (timestamps.length >= maxRequests) {
        return tooManyRequests(Math.ceil((timestamps[0] + windowMs - at) / 1000))
      }

      timestamps.push(at)
      store.set(ip, timestamps)
      return null
    },
    size: () => store.size,
  }
}

const defaultLimiter = createRateLimiter({ maxRequests: maxRequestsFromEnv() })

export function checkRateLimit(ip: string): Response | null {
  return defaultLimiter.check(ip)
}
