import type { Severity } from '@/lib/collisions/types'

/**
 * Severity palette, rendered bottom-to-top: None → Injury → Fatal.
 * Paul Tol Muted hues, distinguishable under common color vision deficiencies.
 */
export const SEVERITY_COLORS: Record<Severity, string> = {
  None: '#44AA99',
  Injury: '#DDCC77',
  Fatal: '#882255',
}

export const SEVERITY_ORDER: Severity[] = ['None', 'Injury', 'Fatal']

// Series colors for the charts, defined per theme in globals.css.
export const CHART_COLORS = [
  'var(--chart-1)',
  'var(--chart-2)',
  'var(--chart-3)',
  'var(--chart-4)',
  'var(--chart-5)',
]
