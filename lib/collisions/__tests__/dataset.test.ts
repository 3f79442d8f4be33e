import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import {
  DEFAULT_MAX_ROWS,
  DatasetLoadError,
  datasetConfigFromEnv,
  getCollisionDataset,
  loadCollisionDataset,
} from '../dataset'

const FIXTURE = fileURLToPath(new URL('./fixtures/collisions.csv', import.meta.url))
const MISSING = fileURLToPath(new URL('./fixtures/does-not-exist.csv', import.meta.url))

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {})
  Reflect.deleteProperty(globalThis, 'collisionDataset')
})

afterEach(() => {
  vi.restoreAllMocks()
  vi.unstubAllEnvs()
})

// ── datasetConfigFromEnv ────────────────────────────────────────────────────

describe('datasetConfigFromEnv', () => {
  it('defaults to data/collisions.csv under the working directory', () => {
    expect(datasetConfigFromEnv({})).toEqual({
      csvPath: path.join(process.cwd(), 'data', 'collisions.csv'),
      maxRows: DEFAULT_MAX_ROWS,
    })
  })

  it('reads the path and row limit from the environment', () => {
    expect(
      datasetConfigFromEnv({ COLLISIONS_CSV_PATH: '/srv/crashes.csv', COLLISIONS_MAX_ROWS: '500' })
    ).toEqual({ csvPath: '/srv/crashes.csv', maxRows: 500 })
  })

  it('falls back to the default row limit for malformed values', () => {
    expect(datasetConfigFromEnv({ COLLISIONS_MAX_ROWS: 'lots' }).maxRows).toBe(DEFAULT_MAX_ROWS)
    expect(datasetConfigFromEnv({ COLLISIONS_MAX_ROWS: '-5' }).maxRows).toBe(DEFAULT_MAX_ROWS)
    expect(datasetConfigFromEnv({ COLLISIONS_MAX_ROWS: '2.5' }).maxRows).toBe(DEFAULT_MAX_ROWS)
  })
})

// ── loadCollisionDataset ────────────────────────────────────────────────────

describe('loadCollisionDataset', () => {
  it('loads placeable rows from the CSV fixture', async () => {
    const dataset = await loadCollisionDataset({ csvPath: FIXTURE, maxRows: 100 })

    expect(dataset.source).toBe(FIXTURE)
    expect(dataset.skippedRows).toBe(2)
    expect(dataset.records.map((r) => r.id)).toEqual(['4455765', '4513547', '4542000'])
    expect(dataset.records[0]).toEqual({
      id: '4455765',
      crashDate: '2021-09-11',
      time: '02:39',
      hour: 2,
      minute: 39,
      weekday: 5,
      latitude: 40.667202,
      longitude: -73.8665,
      borough: null,
      onStreetName: 'WHITESTONE EXPRESSWAY',
      contributingFactor: 'Aggressive Driving/Road Rage',
      vehicleType: 'Sedan',
      injured: { persons: 2, pedestrians: 0, cyclists: 0, motorists: 2 },
      killed: { persons: 0, pedestrians: 0, cyclists: 0, motorists: 0 },
    })
    expect(dataset.records[1].onStreetName).toBe('PENNSYLVANIA AVENUE')
    expect(dataset.records[2].killed.pedestrians).toBe(1)
  })

  it('honours the row limit', async () => {
    const dataset = await loadCollisionDataset({ csvPath: FIXTURE, maxRows: 2 })
    expect(dataset.records).toHaveLength(2)
    expect(dataset.skippedRows).toBe(0)
  })

  it('freezes the record list', async () => {
    const dataset = await loadCollisionDataset({ csvPath: FIXTURE, maxRows: 100 })
    expect(Object.isFrozen(dataset.records)).toBe(true)
  })

  it('logs what it loaded', async () => {
    await loadCollisionDataset({ csvPath: FIXTURE, maxRows: 100 })
    expect(console.info).toHaveBeenCalledWith(
      `Loaded 3 collisions from ${FIXTURE} (2 rows skipped)`
    )
  })

  it('rejects with DatasetLoadError when the file is missing', async () => {
    const load = loadCollisionDataset({ csvPath: MISSING, maxRows: 100 })
    await expect(load).rejects.toBeInstanceOf(DatasetLoadError)
    await expect(load).rejects.toMatchObject({ path: MISSING })
  })
})

// ── getCollisionDataset ─────────────────────────────────────────────────────

describe('getCollisionDataset', () => {
  it('loads once and shares the handle', async () => {
    vi.stubEnv('COLLISIONS_CSV_PATH', FIXTURE)
    const first = await getCollisionDataset()
    const second = await getCollisionDataset()
    expect(second).toBe(first)
    expect(console.info).toHaveBeenCalledTimes(1)
  })

  it('retries after a failed load', async () => {
    vi.stubEnv('COLLISIONS_CSV_PATH', MISSING)
    await expect(getCollisionDataset()).rejects.toBeInstanceOf(DatasetLoadError)

    vi.stubEnv('COLLISIONS_CSV_PATH', FIXTURE)
    const dataset = await getCollisionDataset()
    expect(dataset.records).toHaveLength(3)
  })
})
