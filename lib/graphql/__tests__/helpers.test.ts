import { describe, it, expect } from 'vitest'
import { clampLimit, clampOffset, toPersonGroup, DEFAULT_LIMIT, MAX_LIMIT } from '../resolvers'

// ── clampLimit ──────────────────────────────────────────────────────────────

describe('clampLimit', () => {
  it('uses the default limit when none is given', () => {
    expect(clampLimit()).toBe(DEFAULT_LIMIT)
    expect(clampLimit(null)).toBe(1000)
  })

  it('caps the limit at 5000', () => {
    expect(clampLimit(50000)).toBe(MAX_LIMIT)
    expect(MAX_LIMIT).toBe(5000)
  })

  it('passes through limits inside the range', () => {
    expect(clampLimit(250)).toBe(250)
  })

  it('floors negative limits at 0', () => {
    expect(clampLimit(-5)).toBe(0)
  })
})

// ── clampOffset ─────────────────────────────────────────────────────────────

describe('clampOffset', () => {
  it('defaults to 0', () => {
    expect(clampOffset()).toBe(0)
  })

  it('reads negative offsets as 0', () => {
    expect(clampOffset(-3)).toBe(0)
  })

  it('keeps positive offsets', () => {
    expect(clampOffset(40)).toBe(40)
  })
})

// ── toPersonGroup ───────────────────────────────────────────────────────────

describe('toPersonGroup', () => {
  it('accepts the three person groups', () => {
    expect(toPersonGroup('pedestrians')).toBe('pedestrians')
    expect(toPersonGroup('cyclists')).toBe('cyclists')
    expect(toPersonGroup('motorists')).toBe('motorists')
  })

  it('falls back to pedestrians for anything else', () => {
    expect(toPersonGroup('Cyclists')).toBe('pedestrians')
    expect(toPersonGroup('')).toBe('pedestrians')
    expect(toPersonGroup(null)).toBe('pedestrians')
  })
})
