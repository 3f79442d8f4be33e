import { ExternalLink } from 'lucide-react'
import { SEVERITY_COLORS, SEVERITY_ORDER } from '@/lib/collisionColors'
import type { Severity } from '@/lib/collisions/types'

const SEVERITY_LABELS: Record<Severity, { label: string; size: number }> = {
  Fatal: { label: 'At least one person killed', size: 14 },
  Injury: { label: 'At least one person injured', size: 12 },
  None: { label: 'No injuries reported', size: 10 },
}

export function InfoPanelContent() {
  return (
    <div className="space-y-6">
      <section>
        <p className="text-sm text-muted-foreground leading-relaxed">
          Explore motor vehicle collisions reported in New York City: where they happen, at what
          time of day, on which streets, and who gets hurt.
        </p>
      </section>

      <section>
        <h3 className="text-sm font-semibold mb-2">The Data</h3>
        <p className="text-sm text-muted-foreground leading-relaxed">
          Each record is a police-reported collision with a known location, from the{' '}
          <a
            href="https://data.cityofnewyork.us/Public-Safety/Motor-Vehicle-Collisions-Crashes/h9gi-nx95"
            target="_blank"
            rel="noopener noreferrer"
            className="text-primary hover:underline inline-flex items-center gap-0.5"
          >
            NYC Open Data collisions export
            <ExternalLink className="size-3 flex-shrink-0" />
          </a>
          . Rows without coordinates or a readable date are left out.
        </p>
        <p className="text-sm text-muted-foreground leading-relaxed mt-3">
          The filters narrow the map, the raw data and the export. The hour, weekday and borough
          charts always cover the whole dataset.
        </p>
      </section>

      <section>
        <h3 className="text-sm font-semibold mb-3">Map Key</h3>
        <ul className="space-y-2">
          {[...SEVERITY_ORDER].reverse().map((severity) => (
            <li key={severity} className="flex items-center gap-2.5">
              <span
                className="flex-shrink-0 rounded-full"
                style={{
                  width: SEVERITY_LABELS[severity].size,
                  height: SEVERITY_LABELS[severity].size,
                  backgroundColor: SEVERITY_COLORS[severity],
                }}
              />
              <span className="text-sm text-muted-foreground">{SEVERITY_LABELS[severity].label}</span>
            </li>
          ))}
        </ul>
      </section>

      <section>
        <h3 className="text-sm font-semibold mb-2">Data Disclaimer</h3>
        <p className="text-sm text-muted-foreground leading-relaxed">
          Reports may be incomplete, contain errors, or lag behind the most recent collisions. They
          should not be used as the sole basis for safety decisions or policy.
        </p>
      </section>
    </div>
  )
}
