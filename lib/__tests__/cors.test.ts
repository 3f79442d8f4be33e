import { describe, it, expect } from 'vitest'
import { allowedOriginsFromEnv, corsOrigin } from '../cors'

describe('allowedOriginsFromEnv', () => {
  it('always allows the local dev server', () => {
    expect(allowedOriginsFromEnv({})).toEqual(['http://localhost:3000'])
  })

  it('reads a comma-separated list, trimming spaces and trailing slashes', () => {
    expect(
      allowedOriginsFromEnv({
        ALLOWED_ORIGINS: 'https://collisions.example.org/ , https://staging.example.org,,',
      })
    ).toEqual([
      'https://collisions.example.org',
      'https://staging.example.org',
      'http://localhost:3000',
    ])
  })

  it('does not repeat the dev origin', () => {
    expect(allowedOriginsFromEnv({ ALLOWED_ORIGINS: 'http://localhost:3000' })).toEqual([
      'http://localhost:3000',
    ])
  })
})

describe('corsOrigin', () => {
  const allowed = ['https://collisions.example.org', 'http://localhost:3000']

  it('echoes an allowed origin', () => {
    expect(corsOrigin('http://localhost:3000', allowed)).toBe('http://localhost:3000')
  })

  it('answers unknown or missing origins with the primary origin', () => {
    expect(corsOrigin('https://evil.example.com', allowed)).toBe('https://collisions.example.org')
    expect(corsOrigin(null, allowed)).toBe('https://collisions.example.org')
  })
})
