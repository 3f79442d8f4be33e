import Papa from 'papaparse'
import { format, getISODay, isValid, parse } from 'date-fns'
import type { Casualties, CollisionRecord } from './types'

// ── Headers ───────────────────────────────────────────────────────────────────
// The NYC Open Data export uses "NUMBER OF PERSONS INJURED"-style headers; older
// extracts use "injured_persons". Both normalize to snake_case and then resolve
// through COLUMN_ALIASES.

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
}

type CanonicalColumn =
  | 'id'
  | 'crashDate'
  | 'crashTime'
  | 'latitude'
  | 'longitude'
  | 'borough'
  | 'onStreetName'
  | 'contributingFactor'
  | 'vehicleType'
  | 'injuredPersons'
  | 'injuredPedestrians'
  | 'injuredCyclists'
  | 'injuredMotorists'
  | 'killedPersons'
  | 'killedPedestrians'
  | 'killedCyclists'
  | 'killedMotorists'

const COLUMN_ALIASES: Record<CanonicalColumn, string[]> = {
  id: ['collision_id', 'unique_key'],
  crashDate: ['crash_date'],
  crashTime: ['crash_time'],
  latitude: ['latitude'],
  longitude: ['longitude'],
  borough: ['borough'],
  onStreetName: ['on_street_name'],
  contributingFactor: ['contributing_factor_vehicle_1'],
  vehicleType: ['vehicle_type_1', 'vehicle_type_code_1'],
  injuredPersons: ['injured_persons', 'number_of_persons_injured'],
  injuredPedestrians: ['injured_pedestrians', 'number_of_pedestrians_injured'],
  injuredCyclists: ['injured_cyclists', 'number_of_cyclist_injured', 'number_of_cyclists_injured'],
  injuredMotorists: ['injured_motorists', 'number_of_motorist_injured', 'number_of_motorists_injured'],
  killedPersons: ['killed_persons', 'number_of_persons_killed'],
  killedPedestrians: ['killed_pedestrians', 'number_of_pedestrians_killed'],
  killedCyclists: ['killed_cyclists', 'number_of_cyclist_killed', 'number_of_cyclists_killed'],
  killedMotorists: ['killed_motorists', 'number_of_motorist_killed', 'number_of_motorists_killed'],
}

type CsvRow = Record<string, string | undefined>

function cell(row: CsvRow, column: CanonicalColumn): string | undefined {
  for (const alias of COLUMN_ALIASES[column]) {
    const value = row[alias]
    if (value !== undefined) return value
  }
  return undefined
}

// ── Cell parsers ──────────────────────────────────────────────────────────────

function parseText(value: string | undefined): string | null {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

function parseCoordinate(value: string | undefined): number | null {
  const trimmed = value?.trim()
  if (!trimmed) return null
  const n = Number(trimmed)
  return Number.isFinite(n) ? n : null
}

/** Blank, non-numeric and negative counts all read as 0. */
export function parseCount(value: string | undefined): number {
  const n = Number(value?.trim() || 0)
  if (!Number.isFinite(n) || n < 0) return 0
  return Math.trunc(n)
}

const DATE_FORMATS = ['M/d/yyyy', 'yyyy-MM-dd']
const TIME_FORMATS = ['H:mm', 'H:mm:ss']
const REFERENCE_DATE = new Date(2000, 0, 1)

export type CrashTimestamp = Pick<CollisionRecord, 'crashDate' | 'time' | 'hour' | 'minute' | 'weekday'>

/**
 * Parse the CRASH DATE / CRASH TIME pair into wall-clock fields.
 * ISO dates may carry a time suffix ("2021-09-11T00:00:00.000"); only the
 * calendar day is used from it. A blank time is midnight.
 */
export function parseCrashTimestamp(date: string, time: string): CrashTimestamp | null {
  const datePart = date.trim().split(/[T ]/)[0]
  const timePart = time.trim() || '0:00'
  if (!datePart) return null

  for (const dateFormat of DATE_FORMATS) {
    for (const timeFormat of TIME_FORMATS) {
      const parsed = parse(`${datePart} ${timePart}`, `${dateFormat} ${timeFormat}`, REFERENCE_DATE)
      if (isValid(parsed)) {
        return {
          crashDate: format(parsed, 'yyyy-MM-dd'),
          time: format(parsed, 'HH:mm'),
          hour: parsed.getHours(),
          minute: parsed.getMinutes(),
          weekday: getISODay(parsed) - 1,
        }
      }
    }
  }
  return null
}

// ── Rows ──────────────────────────────────────────────────────────────────────

function casualties(row: CsvRow, kind: 'injured' | 'killed'): Casualties {
  return kind === 'injured'
    ? {
        persons: parseCount(cell(row, 'injuredPersons')),
        pedestrians: parseCount(cell(row, 'injuredPedestrians')),
        cyclists: parseCount(cell(row, 'injuredCyclists')),
        motorists: parseCount(cell(row, 'injuredMotorists')),
      }
    : {
        persons: parseCount(cell(row, 'killedPersons')),
        pedestrians: parseCount(cell(row, 'killedPedestrians')),
        cyclists: parseCount(cell(row, 'killedCyclists')),
        motorists: parseCount(cell(row, 'killedMotorists')),
      }
}

/**
 * Convert one header-normalized CSV row. Returns null for rows the dashboard
 * cannot place: no coordinates, or an unparseable date/time.
 */
export function toCollisionRecord(row: CsvRow, index: number): CollisionRecord | null {
  const latitude = parseCoordinate(cell(row, 'latitude'))
  const longitude = parseCoordinate(cell(row, 'longitude'))
  if (latitude === null || longitude === null) return null

  const timestamp = parseCrashTimestamp(cell(row, 'crashDate') ?? '', cell(row, 'crashTime') ?? '')
  if (!timestamp) return null

  return {
    id: parseText(cell(row, 'id')) ?? String(index + 1),
    ...timestamp,
    latitude,
    longitude,
    borough: parseText(cell(row, 'borough')),
    onStreetName: parseText(cell(row, 'onStreetName')),
    contributingFactor: parseText(cell(row, 'contributingFactor')),
    vehicleType: parseText(cell(row, 'vehicleType')),
    injured: casualties(row, 'injured'),
    killed: casualties(row, 'killed'),
  }
}

export type ParsedCollisions = {
  records: CollisionRecord[]
  skippedRows: number
}

export function parseCollisionsCsv(text: string, options: { maxRows?: number } = {}): ParsedCollisions {
  const result = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: normalizeHeader,
    ...(options.maxRows ? { preview: options.maxRows } : {}),
  })

  const records: CollisionRecord[] = []
  let skippedRows = 0
  result.data.forEach((row, index) => {
    const record = toCollisionRecord(row, index)
    if (record) records.push(record)
    else skippedRows++
  })
  return { records, skippedRows }
}
