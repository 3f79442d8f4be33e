import type { BoroughFactorCount } from '@/lib/collisions/types'

export const OTHER_FACTOR = 'Other'

export type SankeyData = {
  nodes: Array<{ name: string }>
  links: Array<{ source: number; target: number; value: number }>
}

function rankedTotals(entries: Array<[string, number]>): string[] {
  const totals = new Map<string, number>()
  for (const [name, count] of entries) totals.set(name, (totals.get(name) ?? 0) + count)
  return Array.from(totals.entries())
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([name]) => name)
}

/**
 * Borough → contributing factor flows for the Sankey chart. Borough nodes come
 * first, then the `maxFactors` largest factors; every other factor is folded
 * into a single "Other" node.
 */
export function toSankeyData(rows: BoroughFactorCount[], maxFactors = 8): SankeyData {
  const boroughs = rankedTotals(rows.map((r) => [r.borough, r.count]))
  const factors = rankedTotals(rows.map((r) => [r.factor, r.count]))
  const kept = factors.slice(0, Math.max(0, maxFactors))
  const factorNames = kept.length < factors.length ? [...kept, OTHER_FACTOR] : kept

  const keptSet = new Set(kept)
  const flows = new Map<string, number>()
  for (const row of rows) {
    const factor = keptSet.has(row.factor) ? row.factor : OTHER_FACTOR
    const key = `${row.borough}\n${factor}`
    flows.set(key, (flows.get(key) ?? 0) + row.count)
  }

  const links: SankeyData['links'] = []
  boroughs.forEach((borough, source) => {
    factorNames.forEach((factor, i) => {
      const value = flows.get(`${borough}\n${factor}`) ?? 0
      if (value > 0) links.push({ source, target: boroughs.length + i, value })
    })
  })

  return { nodes: [...boroughs, ...factorNames].map((name) => ({ name })), links }
}
