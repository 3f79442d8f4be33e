import { ApolloServer } from '@apollo/server'
import { startServerAndCreateNextHandler } from '@as-integrations/next'
import { NextRequest, NextResponse } from 'next/server'
import { typeDefs } from '@/lib/graphql/typeDefs'
import { resolvers } from '@/lib/graphql/resolvers'
import { depthLimitRule } from '@/lib/graphql/depthLimit'
import { getClientIp, checkRateLimit } from '@/lib/rate-limit'
import { CORS_HEADERS, allowedOriginsFromEnv, corsOrigin } from '@/lib/cors'

// ── CORS ──────────────────────────────────────────────────────────────────────

const ALLOWED_ORIGINS = allowedOriginsFromEnv()

// Clone a Response, copying its body/status/headers, then add CORS headers.
function withCors(response: Response, request: NextRequest): NextResponse {
  const headers = new Headers(response.headers)
  headers.set('Access-Control-Allow-Origin', corsOrigin(request.headers.get('origin'), ALLOWED_ORIGINS))
  headers.set('Vary', 'Origin')
  for (const [key, value] of Object.entries(CORS_HEADERS)) {
    headers.set(key, value)
  }
  return new NextResponse(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  })
}

// ── Apollo Server ─────────────────────────────────────────────────────────────

const server = new ApolloServer({ typeDefs, resolvers, validationRules: [depthLimitRule] })

const handler = startServerAndCreateNextHandler<NextRequest>(server)

export async function OPTIONS(request: NextRequest) {
  return withCors(new Response(null, { status: 204 }), request)
}

export async function GET(request: NextRequest) {
  const limited = checkRateLimit(getClientIp(request))
  if (limited) return withCors(limited, request)
  return withCors(await handler(request), request)
}

export async function POST(request: NextRequest) {
  const limited = checkRateLimit(getClientIp(request))
  if (limited) return withCors(limited, request)
  return withCors(await handler(request), request)
}
