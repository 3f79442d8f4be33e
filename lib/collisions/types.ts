// ── Records ───────────────────────────────────────────────────────────────────

export type Casualties = {
  persons: number
  pedestrians: number
  cyclists: number
  motorists: number
}

export type PersonGroup = 'pedestrians' | 'cyclists' | 'motorists'

export const PERSON_GROUPS: PersonGroup[] = ['pedestrians', 'cyclists', 'motorists']

export interface CollisionRecord {
  id: string
  crashDate: string // YYYY-MM-DD
  time: string // HH:mm
  hour: number
  minute: number
  weekday: number // 0 = Monday … 6 = Sunday
  latitude: number
  longitude: number
  borough: string | null
  onStreetName: string | null
  contributingFactor: string | null
  vehicleType: string | null
  injured: Casualties
  killed: Casualties
}

export type Severity = 'Fatal' | 'Injury' | 'None'

// ── Filters ───────────────────────────────────────────────────────────────────

export type CasualtyFilter = 'fatal' | 'injured'

// Raw widget values as they arrive from the UI or GraphQL variables.
export type CollisionFilterInput = {
  minInjured?: number | null
  date?: string | null
  casualty?: string | null
  street?: string | null
  hour?: number | null
}

// Normalized filter: every field is either an active predicate or its no-op value.
export interface CollisionFilter {
  minInjured: number
  date: string | null
  casualty: CasualtyFilter | null
  street: string | null
  hour: number | null
}

// ── Aggregates ────────────────────────────────────────────────────────────────

export type HourCount = { hour: number; count: number }
export type WeekdayCount = { weekday: number; label: string; count: number }
export type BoroughFactorCount = { borough: string; factor: string; count: number }
export type BoroughCount = { borough: string; count: number }
export type DateCount = { date: string; count: number }
export type MinuteCount = { minute: number; count: number }
export type DateMinuteCount = { date: string; minute: number; count: number }

export type StreetCasualties = {
  street: string
  injured: number
  killed: number
  affected: number
}

export type Position = { latitude: number; longitude: number }

export interface CollisionViews {
  records: ReadonlyArray<CollisionRecord>
  center: Position | null // mean position of the whole filtered subset
  byHour: HourCount[]
  byWeekday: WeekdayCount[]
  byBoroughFactor: BoroughFactorCount[]
}
