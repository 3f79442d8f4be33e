import { describe, it, expect } from 'vitest'
import {
  NO_FILTER,
  collisionSeverity,
  filterCollisions,
  isEmptyFilter,
  normalizeCollisionFilter,
} from '../filter'
import { casualties, makeCollision, threeCollisions } from './fixtures'

// ── normalizeCollisionFilter ────────────────────────────────────────────────

describe('normalizeCollisionFilter', () => {
  it('returns the no-op filter for undefined and null', () => {
    expect(normalizeCollisionFilter()).toEqual(NO_FILTER)
    expect(normalizeCollisionFilter(null)).toEqual(NO_FILTER)
  })

  it('keeps well-formed values', () => {
    expect(
      normalizeCollisionFilter({
        minInjured: 3,
        date: '2024-06-15',
        casualty: 'fatal',
        street: '  Broadway ',
        hour: 17,
      })
    ).toEqual({ minInjured: 3, date: '2024-06-15', casualty: 'fatal', street: 'Broadway', hour: 17 })
  })

  it('truncates a fractional injured threshold', () => {
    expect(normalizeCollisionFilter({ minInjured: 2.9 }).minInjured).toBe(2)
  })

  it('turns a negative or non-finite injured threshold off', () => {
    expect(normalizeCollisionFilter({ minInjured: -1 }).minInjured).toBe(0)
    expect(normalizeCollisionFilter({ minInjured: Number.NaN }).minInjured).toBe(0)
  })

  it('drops dates that are not YYYY-MM-DD calendar days', () => {
    expect(normalizeCollisionFilter({ date: '06/15/2024' }).date).toBeNull()
    expect(normalizeCollisionFilter({ date: '2024-13-01' }).date).toBeNull()
    expect(normalizeCollisionFilter({ date: '' }).date).toBeNull()
  })

  it('drops unknown casualty flags', () => {
    expect(normalizeCollisionFilter({ casualty: 'killed' }).casualty).toBeNull()
    expect(normalizeCollisionFilter({ casualty: 'injured' }).casualty).toBe('injured')
  })

  it('treats a blank street as no filter', () => {
    expect(normalizeCollisionFilter({ street: '   ' }).street).toBeNull()
  })

  it('drops out-of-range and fractional hours', () => {
    expect(normalizeCollisionFilter({ hour: 24 }).hour).toBeNull()
    expect(normalizeCollisionFilter({ hour: -1 }).hour).toBeNull()
    expect(normalizeCollisionFilter({ hour: 3.5 }).hour).toBeNull()
    expect(normalizeCollisionFilter({ hour: 0 }).hour).toBe(0)
  })
})

describe('isEmptyFilter', () => {
  it('is true only when no predicate is active', () => {
    expect(isEmptyFilter(NO_FILTER)).toBe(true)
    expect(isEmptyFilter({ ...NO_FILTER, hour: 0 })).toBe(false)
    expect(isEmptyFilter({ ...NO_FILTER, minInjured: 1 })).toBe(false)
  })
})

// ── filterCollisions ────────────────────────────────────────────────────────

describe('filterCollisions', () => {
  const records = threeCollisions()

  it('returns the dataset unchanged when no filter is active', () => {
    expect(filterCollisions(records, NO_FILTER)).toBe(records)
  })

  it('fatal filter keeps only collisions with a death', () => {
    const result = filterCollisions(records, normalizeCollisionFilter({ casualty: 'fatal' }))
    expect(result.map((r) => r.id)).toEqual(['A'])
  })

  it('injured filter keeps only collisions with an injury', () => {
    const result = filterCollisions(records, normalizeCollisionFilter({ casualty: 'injured' }))
    expect(result.map((r) => r.id)).toEqual(['C'])
  })

  it('applies the injured-persons threshold inclusively', () => {
    expect(
      filterCollisions(records, normalizeCollisionFilter({ minInjured: 2 })).map((r) => r.id)
    ).toEqual(['C'])
    expect(filterCollisions(records, normalizeCollisionFilter({ minInjured: 3 }))).toEqual([])
  })

  it('matches a single calendar day', () => {
    const result = filterCollisions(records, normalizeCollisionFilter({ date: '2024-06-15' }))
    expect(result.map((r) => r.id)).toEqual(['A', 'B'])
  })

  it('matches street names as a case-insensitive substring', () => {
    const result = filterCollisions(records, normalizeCollisionFilter({ street: 'atlantic' }))
    expect(result.map((r) => r.id)).toEqual(['B'])
  })

  it('never matches a street filter against a record without a street', () => {
    const noStreet = [makeCollision({ onStreetName: null })]
    expect(filterCollisions(noStreet, normalizeCollisionFilter({ street: 'a' }))).toEqual([])
  })

  it('returns an empty subset when no street matches', () => {
    expect(filterCollisions(records, normalizeCollisionFilter({ street: 'Nowhere Lane' }))).toEqual(
      []
    )
  })

  it('filters by hour of day', () => {
    const result = filterCollisions(records, normalizeCollisionFilter({ hour: 5 }))
    expect(result.map((r) => r.id)).toEqual(['A', 'B'])
  })

  it('ANDs predicates together and preserves input order', () => {
    const result = filterCollisions(
      records,
      normalizeCollisionFilter({ date: '2024-06-15', street: 'broad', hour: 5 })
    )
    expect(result.map((r) => r.id)).toEqual(['A'])
  })

  it('never invents records', () => {
    const result = filterCollisions(records, normalizeCollisionFilter({ hour: 5, minInjured: 0 }))
    for (const record of result) expect(records).toContain(record)
  })

  it('is idempotent for the same filter', () => {
    const filter = normalizeCollisionFilter({ casualty: 'injured', street: 'broadway' })
    expect(filterCollisions(records, filter)).toEqual(filterCollisions(records, filter))
  })
})

// ── collisionSeverity ───────────────────────────────────────────────────────

describe('collisionSeverity', () => {
  it('ranks a death above an injury', () => {
    expect(
      collisionSeverity(
        makeCollision({ killed: casualties({ persons: 1 }), injured: casualties({ persons: 3 }) })
      )
    ).toBe('Fatal')
  })

  it('reports injuries', () => {
    expect(collisionSeverity(makeCollision({ injured: casualties({ persons: 1 }) }))).toBe(
      'Injury'
    )
  })

  it('reports None when nobody was hurt', () => {
    expect(collisionSeverity(makeCollision())).toBe('None')
  })
})
