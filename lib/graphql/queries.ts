import { gql } from '@apollo/client'

// ── Query result types ─────────────────────────────────────────────────────────

export type CollisionPoint = {
  id: string
  latitude: number
  longitude: number
  severity: string
  crashDate: string
  time: string
  borough?: string | null
  onStreetName?: string | null
  contributingFactor?: string | null
  vehicleType?: string | null
  injuredPersons: number
  killedPersons: number
}

export type MapPoint = {
  id: string
  latitude: number
  longitude: number
  severity: string
}

export type GetCollisionViewsQuery = {
  collisionViews: {
    items: CollisionPoint[]
    totalCount: number
    points: MapPoint[]
    center: { latitude: number; longitude: number } | null
    byHour: Array<{ hour: number; count: number }>
    byWeekday: Array<{ weekday: number; label: string; count: number }>
    byBoroughFactor: Array<{ borough: string; factor: string; count: number }>
  }
}

export type GetHourCollisionsQuery = {
  collisionPoints: Array<{ id: string; latitude: number; longitude: number }>
}

export type GetCollisionQuery = {
  collision: CollisionPoint | null
}

export type GetFilterOptionsQuery = {
  filterOptions: {
    boroughs: string[]
    minDate: string | null
    maxDate: string | null
    maxInjured: number
    personGroups: string[]
  }
}

export type GetBoroughCountsQuery = {
  boroughCounts: Array<{ borough: string; count: number }>
}

export type GetHourBreakdownQuery = {
  hourBreakdown: {
    hour: number
    totalCollisions: number
    byMinute: Array<{ minute: number; count: number }>
    byDate: Array<{ date: string; count: number }>
    byDateAndMinute: Array<{ date: string; minute: number; count: number }>
  }
}

export type GetDangerousStreetsQuery = {
  dangerousStreets: Array<{ street: string; injured: number; killed: number; affected: number }>
}

// ── Query documents ────────────────────────────────────────────────────────────

export const GET_FILTER_OPTIONS = gql`
  query GetFilterOptions {
    filterOptions {
      boroughs
      minDate
      maxDate
      maxInjured
      personGroups
    }
  }
`

export const GET_COLLISION_VIEWS = gql`
  query GetCollisionViews($filter: CollisionFilter, $limit: Int) {
    collisionViews(filter: $filter, limit: $limit) {
      items {
        id
        latitude
        longitude
        severity
        crashDate
        time
        borough
        onStreetName
        contributingFactor
        vehicleType
        injuredPersons
        killedPersons
      }
      totalCount
      points {
        id
        latitude
        longitude
        severity
      }
      center {
        latitude
        longitude
      }
      byHour {
        hour
        count
      }
      byWeekday {
        weekday
        label
        count
      }
      byBoroughFactor {
        borough
        factor
        count
      }
    }
  }
`

export const GET_HOUR_COLLISIONS = gql`
  query GetHourCollisions($filter: CollisionFilter) {
    collisionPoints(filter: $filter) {
      id
      latitude
      longitude
    }
  }
`

export const GET_COLLISION = gql`
  query GetCollision($id: ID!) {
    collision(id: $id) {
      id
      latitude
      longitude
      severity
      crashDate
      time
      borough
      onStreetName
      contributingFactor
      vehicleType
      injuredPersons
      killedPersons
    }
  }
`

export const GET_BOROUGH_COUNTS = gql`
  query GetBoroughCounts {
    boroughCounts {
      borough
      count
    }
  }
`

export const GET_HOUR_BREAKDOWN = gql`
  query GetHourBreakdown($hour: Int!) {
    hourBreakdown(hour: $hour) {
      hour
      totalCollisions
      byMinute {
        minute
        count
      }
      byDate {
        date
        count
      }
      byDateAndMinute {
        date
        minute
        count
      }
    }
  }
`

export const GET_DANGEROUS_STREETS = gql`
  query GetDangerousStreets($group: String!, $limit: Int) {
    dangerousStreets(group: $group, limit: $limit) {
      street
      injured
      killed
      affected
    }
  }
`

export const GET_COLLISIONS_EXPORT = gql`
  query GetCollisionsExport($filter: CollisionFilter, $limit: Int) {
    collisions(filter: $filter, limit: $limit) {
      items {
        id
        crashDate
        time
        weekday
        severity
        borough
        onStreetName
        contributingFactor
        vehicleType
        injuredPersons
        killedPersons
        injuredPedestrians
        killedPedestrians
        injuredCyclists
        killedCyclists
        injuredMotorists
        killedMotorists
        latitude
        longitude
      }
      totalCount
    }
  }
`

export type GetCollisionsExportQuery = {
  collisions: {
    items: Array<{
      id: string
      crashDate: string
      time: string
      weekday: string
      severity: string
      borough?: string | null
      onStreetName?: string | null
      contributingFactor?: string | null
      vehicleType?: string | null
      injuredPersons: number
      killedPersons: number
      injuredPedestrians: number
      killedPedestrians: number
      injuredCyclists: number
      killedCyclists: number
      injuredMotorists: number
      killedMotorists: number
      latitude: number
      longitude: number
    }>
    totalCount: number
  }
}
