import { GraphQLError } from 'graphql'
import { getCollisionDataset, type CollisionDataset } from '@/lib/collisions/dataset'
import {
  WEEKDAY_LABELS,
  buildCollisionViews,
  countByBorough,
  countByDate,
  countByDateAndMinute,
  countByMinute,
  dateBounds,
  listBoroughs,
  maxInjured,
  topDangerousStreets,
} from '@/lib/collisions/aggregate'
import {
  collisionSeverity,
  filterCollisions,
  normalizeCollisionFilter,
} from '@/lib/collisions/filter'
import {
  PERSON_GROUPS,
  type CollisionFilterInput,
  type CollisionRecord,
  type PersonGroup,
} from '@/lib/collisions/types'
import { FilterNumber } from './scalars'

// ── Argument helpers ──────────────────────────────────────────────────────────

export const DEFAULT_LIMIT = 1000
export const MAX_LIMIT = 5000

export function clampLimit(limit?: number | null): number {
  return Math.min(Math.max(limit ?? DEFAULT_LIMIT, 0), MAX_LIMIT)
}

export function clampOffset(offset?: number | null): number {
  return Math.max(offset ?? 0, 0)
}

export function toPersonGroup(group?: string | null): PersonGroup {
  return PERSON_GROUPS.find((g) => g === group) ?? 'pedestrians'
}

function page<T>(items: ReadonlyArray<T>, limit?: number | null, offset?: number | null): T[] {
  const start = clampOffset(offset)
  return items.slice(start, start + clampLimit(limit))
}

// ── Dataset access ────────────────────────────────────────────────────────────

async function requireDataset(): Promise<CollisionDataset> {
  try {
    return await getCollisionDataset()
  } catch (err) {
    console.error('Collision dataset failed to load:', err)
    throw new GraphQLError('Collision data is unavailable.', {
      extensions: { code: 'DATASET_UNAVAILABLE' },
    })
  }
}

// ── Resolvers ─────────────────────────────────────────────────────────────────

type FilterArgs = {
  filter?: CollisionFilterInput | null
  limit?: number | null
  offset?: number | null
}

export const resolvers = {
  FilterNumber,

  Query: {
    collisionViews: async (_: unknown, { filter, limit, offset }: FilterArgs) => {
      const dataset = await requireDataset()
      const { records, center, byHour, byWeekday, byBoroughFactor } = buildCollisionViews(
        dataset.records,
        filter
      )
      return {
        items: page(records, limit, offset),
        totalCount: records.length,
        points: records,
        center,
        byHour,
        byWeekday,
        byBoroughFactor,
      }
    },

    collisions: async (_: unknown, { filter, limit, offset }: FilterArgs) => {
      const dataset = await requireDataset()
      const records = filterCollisions(dataset.records, normalizeCollisionFilter(filter))
      return { items: page(records, limit, offset), totalCount: records.length }
    },

    // Unpaged: the map draws every match, so only the point fields are exposed.
    collisionPoints: async (_: unknown, { filter }: Pick<FilterArgs, 'filter'>) => {
      const dataset = await requireDataset()
      return filterCollisions(dataset.records, normalizeCollisionFilter(filter))
    },

    collision: async (_: unknown, { id }: { id: string }) => {
      const dataset = await requireDataset()
      return dataset.records.find((record) => record.id === id) ?? null
    },

    boroughCounts: async () => countByBorough((await requireDataset()).records),

    hourBreakdown: async (_: unknown, { hour }: { hour: number }) => {
      const dataset = await requireDataset()
      const selectedHour = normalizeCollisionFilter({ hour }).hour ?? 0
      const inHour = filterCollisions(
        dataset.records,
        normalizeCollisionFilter({ hour: selectedHour })
      )
      return {
        hour: selectedHour,
        totalCollisions: inHour.length,
        byMinute: countByMinute(inHour, selectedHour),
        byDate: countByDate(inHour),
        byDateAndMinute: countByDateAndMinute(inHour, selectedHour),
      }
    },

    dangerousStreets: async (
      _: unknown,
      { group, limit }: { group: string; limit?: number | null }
    ) => {
      const dataset = await requireDataset()
      return topDangerousStreets(dataset.records, toPersonGroup(group), Math.max(limit ?? 10, 0))
    },

    filterOptions: async () => {
      const dataset = await requireDataset()
      const bounds = dateBounds(dataset.records)
      return {
        boroughs: listBoroughs(dataset.records),
        minDate: bounds?.minDate ?? null,
        maxDate: bounds?.maxDate ?? null,
        maxInjured: maxInjured(dataset.records),
        personGroups: PERSON_GROUPS,
      }
    },
  },

  // ── Collision field resolvers ─────────────────────────────────────────────
  // Flat fields (id, crashDate, hour, latitude, …) resolve by name. Casualty
  // counts are nested on the record and flattened here.

  Collision: {
    weekday: (parent: CollisionRecord) => WEEKDAY_LABELS[parent.weekday],
    severity: (parent: CollisionRecord) => collisionSeverity(parent),
    injuredPersons: (parent: CollisionRecord) => parent.injured.persons,
    killedPersons: (parent: CollisionRecord) => parent.killed.persons,
    injuredPedestrians: (parent: CollisionRecord) => parent.injured.pedestrians,
    killedPedestrians: (parent: CollisionRecord) => parent.killed.pedestrians,
    injuredCyclists: (parent: CollisionRecord) => parent.injured.cyclists,
    killedCyclists: (parent: CollisionRecord) => parent.killed.cyclists,
    injuredMotorists: (parent: CollisionRecord) => parent.injured.motorists,
    killedMotorists: (parent: CollisionRecord) => parent.killed.motorists,
  },

  MapPoint: {
    severity: (parent: CollisionRecord) => collisionSeverity(parent),
  },
}
