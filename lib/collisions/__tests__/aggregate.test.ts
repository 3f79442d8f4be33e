import { describe, it, expect } from 'vitest'
import {
  buildCollisionViews,
  countByBorough,
  countByBoroughFactor,
  countByDate,
  countByDateAndMinute,
  countByHour,
  countByMinute,
  countByWeekday,
  dateBounds,
  listBoroughs,
  maxInjured,
  meanPosition,
  topDangerousStreets,
} from '../aggregate'
import { casualties, makeCollision, threeCollisions } from './fixtures'

const sum = (rows: { count: number }[]) => rows.reduce((total, row) => total + row.count, 0)

// ── countByHour ─────────────────────────────────────────────────────────────

describe('countByHour', () => {
  it('always returns 24 buckets in hour order', () => {
    const result = countByHour([])
    expect(result).toHaveLength(24)
    expect(result.map((b) => b.hour)).toEqual(Array.from({ length: 24 }, (_, i) => i))
    expect(sum(result)).toBe(0)
  })

  it('counts the three-record example as {5: 2, 20: 1}', () => {
    const nonZero = countByHour(threeCollisions()).filter((b) => b.count > 0)
    expect(nonZero).toEqual([
      { hour: 5, count: 2 },
      { hour: 20, count: 1 },
    ])
  })
})

// ── countByWeekday ──────────────────────────────────────────────────────────

describe('countByWeekday', () => {
  it('returns seven Monday-first buckets', () => {
    const result = countByWeekday(threeCollisions())
    expect(result.map((b) => b.label)).toEqual([
      'Monday',
      'Tuesday',
      'Wednesday',
      'Thursday',
      'Friday',
      'Saturday',
      'Sunday',
    ])
    expect(result[5]).toEqual({ weekday: 5, label: 'Saturday', count: 2 })
    expect(result[6]).toEqual({ weekday: 6, label: 'Sunday', count: 1 })
    expect(sum(result)).toBe(3)
  })
})

// ── countByBoroughFactor ────────────────────────────────────────────────────

describe('countByBoroughFactor', () => {
  it('cross-tabulates borough and factor, busiest pair first', () => {
    expect(countByBoroughFactor(threeCollisions())).toEqual([
      { borough: 'MANHATTAN', factor: 'Driver Inattention/Distraction', count: 2 },
      { borough: 'BROOKLYN', factor: 'Driver Inattention/Distraction', count: 1 },
    ])
  })

  it('labels missing values instead of dropping them', () => {
    const result = countByBoroughFactor([
      makeCollision({ borough: null, contributingFactor: null }),
    ])
    expect(result).toEqual([{ borough: 'Unknown', factor: 'Unspecified', count: 1 }])
  })

  it('breaks count ties by borough then factor', () => {
    const result = countByBoroughFactor([
      makeCollision({ borough: 'QUEENS', contributingFactor: 'Unsafe Speed' }),
      makeCollision({ borough: 'BRONX', contributingFactor: 'Unsafe Speed' }),
      makeCollision({ borough: 'BRONX', contributingFactor: 'Backing Unsafely' }),
    ])
    expect(result.map((r) => `${r.borough}/${r.factor}`)).toEqual([
      'BRONX/Backing Unsafely',
      'BRONX/Unsafe Speed',
      'QUEENS/Unsafe Speed',
    ])
  })
})

// ── countByBorough ──────────────────────────────────────────────────────────

describe('countByBorough', () => {
  it('counts boroughs, most collisions first, skipping blanks', () => {
    const result = countByBorough([
      ...threeCollisions(),
      makeCollision({ borough: null }),
    ])
    expect(result).toEqual([
      { borough: 'MANHATTAN', count: 2 },
      { borough: 'BROOKLYN', count: 1 },
    ])
  })
})

// ── countByMinute / countByDate ─────────────────────────────────────────────

describe('countByMinute', () => {
  it('bins the selected hour into 60 minutes', () => {
    const result = countByMinute(threeCollisions(), 5)
    expect(result).toHaveLength(60)
    expect(result[10]).toEqual({ minute: 10, count: 1 })
    expect(result[45]).toEqual({ minute: 45, count: 1 })
    expect(sum(result)).toBe(2)
  })

  it('is all zeros for an hour without collisions', () => {
    expect(sum(countByMinute(threeCollisions(), 3))).toBe(0)
  })
})

describe('countByDate', () => {
  it('counts per day in ascending date order', () => {
    const result = countByDate([
      makeCollision({ crashDate: '2024-06-16' }),
      ...threeCollisions(),
    ])
    expect(result).toEqual([
      { date: '2024-06-15', count: 2 },
      { date: '2024-06-16', count: 2 },
    ])
  })
})

describe('countByDateAndMinute', () => {
  it('counts each day and minute of the selected hour', () => {
    const records = [
      makeCollision({ id: '1', crashDate: '2024-06-16', hour: 8, minute: 5 }),
      makeCollision({ id: '2', crashDate: '2024-06-15', hour: 8, minute: 40 }),
      makeCollision({ id: '3', crashDate: '2024-06-16', hour: 8, minute: 5 }),
      makeCollision({ id: '4', crashDate: '2024-06-15', hour: 8, minute: 2 }),
      makeCollision({ id: '5', crashDate: '2024-06-15', hour: 9, minute: 2 }),
    ]
    expect(countByDateAndMinute(records, 8)).toEqual([
      { date: '2024-06-15', minute: 2, count: 1 },
      { date: '2024-06-15', minute: 40, count: 1 },
      { date: '2024-06-16', minute: 5, count: 2 },
    ])
  })

  it('sums to the number of collisions in that hour', () => {
    const cells = countByDateAndMinute(threeCollisions(), 5)
    expect(sum(cells)).toBe(2)
  })

  it('is empty for an hour without collisions', () => {
    expect(countByDateAndMinute(threeCollisions(), 3)).toEqual([])
  })
})

// ── topDangerousStreets ─────────────────────────────────────────────────────

describe('topDangerousStreets', () => {
  const records = [
    makeCollision({
      onStreetName: 'BROADWAY',
      injured: casualties({ persons: 2, pedestrians: 2 }),
    }),
    makeCollision({
      onStreetName: 'BROADWAY',
      killed: casualties({ persons: 1, pedestrians: 1 }),
    }),
    makeCollision({
      onStreetName: 'CANAL STREET',
      injured: casualties({ persons: 1, pedestrians: 1 }),
    }),
    makeCollision({
      onStreetName: null,
      injured: casualties({ persons: 5, pedestrians: 5 }),
    }),
    makeCollision({
      onStreetName: 'BOWERY',
      injured: casualties({ persons: 4, motorists: 4 }),
    }),
  ]

  it('sums injured and killed per street for the chosen group', () => {
    expect(topDangerousStreets(records, 'pedestrians')).toEqual([
      { street: 'BROADWAY', injured: 2, killed: 1, affected: 3 },
      { street: 'CANAL STREET', injured: 1, killed: 0, affected: 1 },
    ])
  })

  it('only counts the chosen group', () => {
    expect(topDangerousStreets(records, 'motorists')).toEqual([
      { street: 'BOWERY', injured: 4, killed: 0, affected: 4 },
    ])
    expect(topDangerousStreets(records, 'cyclists')).toEqual([])
  })

  it('honours the limit', () => {
    expect(topDangerousStreets(records, 'pedestrians', 1).map((s) => s.street)).toEqual([
      'BROADWAY',
    ])
  })
})

// ── Dataset facts ───────────────────────────────────────────────────────────

describe('dataset facts', () => {
  it('dateBounds spans the earliest and latest crash dates', () => {
    expect(dateBounds(threeCollisions())).toEqual({ minDate: '2024-06-15', maxDate: '2024-06-16' })
    expect(dateBounds([])).toBeNull()
  })

  it('maxInjured finds the largest injured count', () => {
    expect(maxInjured(threeCollisions())).toBe(2)
    expect(maxInjured([])).toBe(0)
  })

  it('meanPosition averages coordinates', () => {
    const result = meanPosition([
      makeCollision({ latitude: 40, longitude: -74 }),
      makeCollision({ latitude: 41, longitude: -73 }),
    ])
    expect(result).toEqual({ latitude: 40.5, longitude: -73.5 })
    expect(meanPosition([])).toBeNull()
  })

  it('listBoroughs returns sorted distinct names', () => {
    expect(listBoroughs([...threeCollisions(), makeCollision({ borough: null })])).toEqual([
      'BROOKLYN',
      'MANHATTAN',
    ])
  })
})

// ── buildCollisionViews ─────────────────────────────────────────────────────

describe('buildCollisionViews', () => {
  const records = threeCollisions()

  it('returns the filtered subset with dataset-wide aggregates', () => {
    const views = buildCollisionViews(records, { casualty: 'fatal' })
    expect(views.records.map((r) => r.id)).toEqual(['A'])
    expect(sum(views.byHour)).toBe(3)
    expect(sum(views.byWeekday)).toBe(3)
    expect(sum(views.byBoroughFactor)).toBe(3)
  })

  it('keeps aggregates over the full dataset when nothing matches', () => {
    const views = buildCollisionViews(records, { street: 'Nowhere Lane' })
    expect(views.records).toEqual([])
    expect(views.byHour.filter((b) => b.count > 0)).toEqual([
      { hour: 5, count: 2 },
      { hour: 20, count: 1 },
    ])
  })

  it('returns the full dataset without a filter', () => {
    expect(buildCollisionViews(records).records).toBe(records)
  })

  it('centres on the mean position of the whole filtered subset', () => {
    const spread = [
      makeCollision({ id: 'N', latitude: 40.8, longitude: -73.9 }),
      makeCollision({ id: 'S', latitude: 40.6, longitude: -74.1 }),
      makeCollision({ id: 'X', latitude: 40.0, longitude: -75.0, onStreetName: 'ATLANTIC AVENUE' }),
    ]
    const center = buildCollisionViews(spread, { street: 'broadway' }).center
    expect(center?.latitude).toBeCloseTo(40.7)
    expect(center?.longitude).toBeCloseTo(-74.0)
  })

  it('has no centre when nothing matches', () => {
    expect(buildCollisionViews(records, { street: 'Nowhere Lane' }).center).toBeNull()
  })

  it('treats malformed filter values as no filter', () => {
    expect(buildCollisionViews(records, { date: 'yesterday', hour: 99 }).records).toBe(records)
  })

  it('returns empty outputs for an empty dataset', () => {
    const views = buildCollisionViews([], { casualty: 'fatal' })
    expect(views.records).toEqual([])
    expect(sum(views.byHour)).toBe(0)
    expect(sum(views.byWeekday)).toBe(0)
    expect(views.byBoroughFactor).toEqual([])
  })

  it('yields identical output for the same filter twice', () => {
    const filter = { minInjured: 1, street: 'broadway' }
    expect(buildCollisionViews(records, filter)).toEqual(buildCollisionViews(records, filter))
  })
})
