import { describe, it, expect } from 'vitest'
import {
  normalizeHeader,
  parseCollisionsCsv,
  parseCount,
  parseCrashTimestamp,
  toCollisionRecord,
} from '../parse'

// ── normalizeHeader ─────────────────────────────────────────────────────────

describe('normalizeHeader', () => {
  it('snake-cases open data export headers', () => {
    expect(normalizeHeader('NUMBER OF PERSONS INJURED')).toBe('number_of_persons_injured')
    expect(normalizeHeader(' CRASH DATE ')).toBe('crash_date')
  })

  it('leaves snake_case headers alone', () => {
    expect(normalizeHeader('injured_persons')).toBe('injured_persons')
  })

  it('collapses punctuation runs and trims underscores', () => {
    expect(normalizeHeader('(Borough) / Name')).toBe('borough_name')
  })
})

// ── parseCount ──────────────────────────────────────────────────────────────

describe('parseCount', () => {
  it('reads integers', () => {
    expect(parseCount('3')).toBe(3)
  })

  it('reads blank, malformed and negative values as 0', () => {
    expect(parseCount('')).toBe(0)
    expect(parseCount(undefined)).toBe(0)
    expect(parseCount('n/a')).toBe(0)
    expect(parseCount('-2')).toBe(0)
  })

  it('truncates fractions', () => {
    expect(parseCount('2.0')).toBe(2)
    expect(parseCount('1.7')).toBe(1)
  })
})

// ── parseCrashTimestamp ─────────────────────────────────────────────────────

describe('parseCrashTimestamp', () => {
  it('parses month/day/year with a short time', () => {
    expect(parseCrashTimestamp('09/11/2021', '2:39')).toEqual({
      crashDate: '2021-09-11',
      time: '02:39',
      hour: 2,
      minute: 39,
      weekday: 5, // Saturday
    })
  })

  it('parses ISO dates with a time suffix', () => {
    expect(parseCrashTimestamp('2022-07-04T00:00:00.000', '23:05')).toEqual({
      crashDate: '2022-07-04',
      time: '23:05',
      hour: 23,
      minute: 5,
      weekday: 0, // Monday
    })
  })

  it('accepts times with seconds', () => {
    expect(parseCrashTimestamp('2022-07-04', '08:15:30')?.time).toBe('08:15')
  })

  it('reads a blank time as midnight', () => {
    expect(parseCrashTimestamp('2022-07-04', '')?.hour).toBe(0)
  })

  it('rejects impossible dates and garbage', () => {
    expect(parseCrashTimestamp('13/45/2022', '10:00')).toBeNull()
    expect(parseCrashTimestamp('', '10:00')).toBeNull()
    expect(parseCrashTimestamp('2022-07-04', 'noon')).toBeNull()
  })
})

// ── toCollisionRecord ───────────────────────────────────────────────────────

describe('toCollisionRecord', () => {
  const row = {
    crash_date: '2024-06-15',
    crash_time: '14:30',
    latitude: '40.7',
    longitude: '-74.0',
    borough: ' MANHATTAN ',
    on_street_name: 'BROADWAY',
    injured_persons: '1',
    killed_persons: '0',
    injured_pedestrians: '1',
    contributing_factor_vehicle_1: 'Unsafe Speed',
    vehicle_type_1: 'Taxi',
  }

  it('accepts underscore-style headers', () => {
    const record = toCollisionRecord(row, 4)
    expect(record).toMatchObject({
      id: '5',
      crashDate: '2024-06-15',
      hour: 14,
      borough: 'MANHATTAN',
      onStreetName: 'BROADWAY',
      contributingFactor: 'Unsafe Speed',
      vehicleType: 'Taxi',
      injured: { persons: 1, pedestrians: 1, cyclists: 0, motorists: 0 },
      killed: { persons: 0, pedestrians: 0, cyclists: 0, motorists: 0 },
    })
  })

  it('drops rows without coordinates', () => {
    expect(toCollisionRecord({ ...row, latitude: '' }, 0)).toBeNull()
    expect(toCollisionRecord({ ...row, longitude: 'x' }, 0)).toBeNull()
  })

  it('drops rows without a usable date', () => {
    expect(toCollisionRecord({ ...row, crash_date: '' }, 0)).toBeNull()
  })

  it('reads blank text cells as null', () => {
    expect(toCollisionRecord({ ...row, borough: '  ' }, 0)?.borough).toBeNull()
  })
})

// ── parseCollisionsCsv ──────────────────────────────────────────────────────

describe('parseCollisionsCsv', () => {
  const csv = [
    'CRASH DATE,CRASH TIME,BOROUGH,LATITUDE,LONGITUDE,NUMBER OF PERSONS INJURED,COLLISION_ID',
    '01/02/2023,9:05,QUEENS,40.7,-73.8,1,100',
    '',
    '01/03/2023,10:10,BRONX,,,0,101',
    '01/04/2023,11:15,"STATEN ISLAND",40.6,-74.1,0,102',
  ].join('\n')

  it('parses rows, skips blank lines and counts dropped rows', () => {
    const { records, skippedRows } = parseCollisionsCsv(csv)
    expect(records.map((r) => r.id)).toEqual(['100', '102'])
    expect(records[1].borough).toBe('STATEN ISLAND')
    expect(skippedRows).toBe(1)
  })

  it('stops after maxRows data rows', () => {
    const { records, skippedRows } = parseCollisionsCsv(csv, { maxRows: 1 })
    expect(records.map((r) => r.id)).toEqual(['100'])
    expect(skippedRows).toBe(0)
  })

  it('returns nothing for an empty file', () => {
    expect(parseCollisionsCsv('')).toEqual({ records: [], skippedRows: 0 })
  })
})
