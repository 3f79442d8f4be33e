import type { GetCollisionsExportQuery } from '@/lib/graphql/queries'

export type CollisionExportRow = GetCollisionsExportQuery['collisions']['items'][number]

const HEADERS = [
  'Collision ID',
  'Date',
  'Time',
  'Weekday',
  'Severity',
  'Borough',
  'On Street',
  'Contributing Factor',
  'Vehicle Type',
  'Persons Injured',
  'Persons Killed',
  'Pedestrians Injured',
  'Pedestrians Killed',
  'Cyclists Injured',
  'Cyclists Killed',
  'Motorists Injured',
  'Motorists Killed',
  'Latitude',
  'Longitude',
]

function escapeCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function generateCsv(items: CollisionExportRow[]): string {
  const rows = items.map((item) => [
    item.id,
    item.crashDate,
    item.time,
    item.weekday,
    item.severity,
    item.borough ?? '',
    item.onStreetName ?? '',
    item.contributingFactor ?? '',
    item.vehicleType ?? '',
    String(item.injuredPersons),
    String(item.killedPersons),
    String(item.injuredPedestrians),
    String(item.killedPedestrians),
    String(item.injuredCyclists),
    String(item.killedCyclists),
    String(item.injuredMotorists),
    String(item.killedMotorists),
    String(item.latitude),
    String(item.longitude),
  ])

  const lines = [HEADERS, ...rows].map((row) => row.map(escapeCell).join(','))
  return '\ufeff' + lines.join('\r\n') // BOM prefix for Excel compatibility
}

export function downloadCsv(content: string, filename: string): void {
  const blob = new Blob([content], { type: 'text/csv;charset=utf-8;' })
  const url = URL.createObjectURL(blob)
  const link = document.createElement('a')
  link.href = url
  link.download = filename
  document.body.appendChild(link)
  link.click()
  document.body.removeChild(link)
  URL.revokeObjectURL(url)
}
