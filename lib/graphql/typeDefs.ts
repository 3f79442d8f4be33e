export const typeDefs = `#graphql
  # ── Core collision record ───────────────────────────────────────────────────

  type Collision {
    id: ID!
    crashDate: String!      # YYYY-MM-DD
    time: String!           # HH:mm
    hour: Int!
    weekday: String!        # Monday … Sunday
    severity: String!       # Fatal | Injury | None
    borough: String
    onStreetName: String
    contributingFactor: String
    vehicleType: String
    latitude: Float!
    longitude: Float!
    injuredPersons: Int!
    killedPersons: Int!
    injuredPedestrians: Int!
    killedPedestrians: Int!
    injuredCyclists: Int!
    killedCyclists: Int!
    injuredMotorists: Int!
    killedMotorists: Int!
  }

  # Just enough of a collision to draw it on a map.
  type MapPoint {
    id: ID!
    latitude: Float!
    longitude: Float!
    severity: String!
  }

  type Position {
    latitude: Float!
    longitude: Float!
  }

  # ── Filters ──────────────────────────────────────────────────────────────────
  # Out-of-range or malformed values switch that predicate off instead of failing.

  scalar FilterNumber

  input CollisionFilter {
    minInjured: FilterNumber    # Keep collisions with at least this many people injured (truncated)
    date: String                # "YYYY-MM-DD"
    casualty: String            # "fatal" | "injured"
    street: String              # Case-insensitive substring of the on-street name
    hour: FilterNumber          # Whole hour 0–23
  }

  # ── Query return types ────────────────────────────────────────────────────────

  type CollisionResult {
    items: [Collision!]!
    totalCount: Int!
  }

  type HourCount {
    hour: Int!
    count: Int!
  }

  type WeekdayCount {
    weekday: Int!
    label: String!
    count: Int!
  }

  type BoroughFactorCount {
    borough: String!
    factor: String!
    count: Int!
  }

  type BoroughCount {
    borough: String!
    count: Int!
  }

  type MinuteCount {
    minute: Int!
    count: Int!
  }

  type DateCount {
    date: String!
    count: Int!
  }

  type DateMinuteCount {
    date: String!
    minute: Int!
    count: Int!
  }

  # Filtered subset plus aggregates over the whole dataset (never the subset).
  # items is paged; points and center always cover every matching collision.
  type CollisionViews {
    items: [Collision!]!
    totalCount: Int!
    points: [MapPoint!]!
    center: Position
    byHour: [HourCount!]!
    byWeekday: [WeekdayCount!]!
    byBoroughFactor: [BoroughFactorCount!]!
  }

  type HourBreakdown {
    hour: Int!
    totalCollisions: Int!
    byMinute: [MinuteCount!]!
    byDate: [DateCount!]!
    byDateAndMinute: [DateMinuteCount!]!
  }

  type StreetCasualties {
    street: String!
    injured: Int!
    killed: Int!
    affected: Int!
  }

  type FilterOptions {
    boroughs: [String!]!
    minDate: String
    maxDate: String
    maxInjured: Int!
    personGroups: [String!]!
  }

  # ── Queries ───────────────────────────────────────────────────────────────────

  type Query {
    collisionViews(filter: CollisionFilter, limit: Int = 1000, offset: Int = 0): CollisionViews!
    collisions(filter: CollisionFilter, limit: Int = 1000, offset: Int = 0): CollisionResult!
    collisionPoints(filter: CollisionFilter): [MapPoint!]!
    collision(id: ID!): Collision
    boroughCounts: [BoroughCount!]!
    hourBreakdown(hour: Int!): HourBreakdown!
    dangerousStreets(group: String!, limit: Int = 10): [StreetCasualties!]!
    filterOptions: FilterOptions!
  }
`
