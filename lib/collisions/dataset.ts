import fs from 'node:fs/promises'
import path from 'node:path'
import { parseCollisionsCsv } from './parse'
import type { CollisionRecord } from './types'

export const DEFAULT_MAX_ROWS = 100_000

export interface DatasetConfig {
  csvPath: string
  maxRows: number
}

export interface CollisionDataset {
  readonly records: ReadonlyArray<CollisionRecord>
  readonly source: string
  readonly skippedRows: number
  readonly loadedAt: Date
}

export class DatasetLoadError extends Error {
  readonly path: string

  constructor(filePath: string, cause: unknown) {
    super(`Unable to read collision data from ${filePath}`, { cause })
    this.name = 'DatasetLoadError'
    this.path = filePath
  }
}

export function datasetConfigFromEnv(env: Partial<NodeJS.ProcessEnv> = process.env): DatasetConfig {
  const rawMaxRows = Number(env.COLLISIONS_MAX_ROWS)
  return {
    csvPath: env.COLLISIONS_CSV_PATH || path.join(process.cwd(), 'data', 'collisions.csv'),
    maxRows: Number.isInteger(rawMaxRows) && rawMaxRows > 0 ? rawMaxRows : DEFAULT_MAX_ROWS,
  }
}

export async function loadCollisionDataset(config: DatasetConfig): Promise<CollisionDataset> {
  let text: string
  try {
    text = await fs.readFile(config.csvPath, 'utf8')
  } catch (err) {
    throw new DatasetLoadError(config.csvPath, err)
  }

  const { records, skippedRows } = parseCollisionsCsv(text, { maxRows: config.maxRows })
  console.info(
    `Loaded ${records.length} collisions from ${config.csvPath} (${skippedRows} rows skipped)`
  )
  return {
    records: Object.freeze(records),
    source: config.csvPath,
    skippedRows,
    loadedAt: new Date(),
  }
}

// Loaded once per process and shared read-only. Kept on globalThis so Next.js
// dev hot reloads don't re-read the file on every module refresh.
const globalForDataset = globalThis as unknown as {
  collisionDataset: Promise<CollisionDataset> | undefined
}

export function getCollisionDataset(): Promise<CollisionDataset> {
  if (!globalForDataset.collisionDataset) {
    globalForDataset.collisionDataset = loadCollisionDataset(datasetConfigFromEnv()).catch(
      (err: unknown) => {
        // Drop the failed promise so the next request retries the read.
        globalForDataset.collisionDataset = undefined
        throw err
      }
    )
  }
  return globalForDataset.collisionDataset
}
