import type { Casualties, CollisionRecord } from '../types'

export function casualties(overrides: Partial<Casualties> = {}): Casualties {
  return { persons: 0, pedestrians: 0, cyclists: 0, motorists: 0, ...overrides }
}

export function makeCollision(overrides: Partial<CollisionRecord> = {}): CollisionRecord {
  return {
    id: 'C-001',
    crashDate: '2024-06-15',
    time: '14:30',
    hour: 14,
    minute: 30,
    weekday: 5,
    latitude: 40.7128,
    longitude: -74.006,
    borough: 'MANHATTAN',
    onStreetName: 'BROADWAY',
    contributingFactor: 'Driver Inattention/Distraction',
    vehicleType: 'Sedan',
    injured: casualties(),
    killed: casualties(),
    ...overrides,
  }
}

// One fatal collision at 05:xx, one harmless at 05:xx, one injury at 20:xx.
export function threeCollisions(): CollisionRecord[] {
  return [
    makeCollision({
      id: 'A',
      hour: 5,
      minute: 10,
      time: '05:10',
      killed: casualties({ persons: 1, pedestrians: 1 }),
    }),
    makeCollision({ id: 'B', hour: 5, minute: 45, time: '05:45', onStreetName: 'ATLANTIC AVENUE' }),
    makeCollision({
      id: 'C',
      hour: 20,
      minute: 0,
      time: '20:00',
      crashDate: '2024-06-16',
      weekday: 6,
      borough: 'BROOKLYN',
      injured: casualties({ persons: 2, cyclists: 2 }),
    }),
  ]
}
