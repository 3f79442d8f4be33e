'use client'

import { useState, useCallback } from 'react'
import { Popup } from 'react-map-gl/mapbox'
import { Check, Copy, Loader2 } from 'lucide-react'
import { useQuery } from '@apollo/client/react'
import {
  GET_COLLISION,
  type CollisionPoint,
  type GetCollisionQuery,
  type MapPoint,
} from '@/lib/graphql/queries'
import { SEVERITY_COLORS, SEVERITY_ORDER } from '@/lib/collisionColors'

function formatDate(dateStr: string): string {
  const [year, month, day] = dateStr.split('-').map(Number)
  return new Date(year, month - 1, day).toLocaleDateString('en-US', {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
  })
}

function severityColor(severity: string): string {
  const match = SEVERITY_ORDER.find((s) => s === severity)
  return match ? SEVERITY_COLORS[match] : '#999'
}

function casualtyLine(collision: CollisionPoint): string {
  const parts: string[] = []
  if (collision.killedPersons > 0) parts.push(`${collision.killedPersons} killed`)
  if (collision.injuredPersons > 0) parts.push(`${collision.injuredPersons} injured`)
  return parts.length > 0 ? parts.join(', ') : 'No injuries reported'
}

type CollisionPopupProps = {
  point: MapPoint
  onClose: () => void
}

// The map only carries positions; details are fetched for the clicked point.
export function CollisionPopup({ point, onClose }: CollisionPopupProps) {
  const [copied, setCopied] = useState(false)
  const { data, error } = useQuery<GetCollisionQuery>(GET_COLLISION, {
    variables: { id: point.id },
  })

  if (error) console.error('CollisionPopup query error:', error)
  const collision = data?.collision

  const handleCopyId = useCallback((id: string) => {
    navigator.clipboard
      .writeText(id)
      .then(() => {
        setCopied(true)
        setTimeout(() => setCopied(false), 2000)
      })
      .catch((err: unknown) => console.error('Copy failed:', err))
  }, [])

  return (
    <Popup
      longitude={point.longitude}
      latitude={point.latitude}
      onClose={onClose}
      closeButton
      closeOnClick={false}
      anchor="bottom"
      offset={10}
      maxWidth="240px"
    >
      {collision ? (
        <CollisionDetails collision={collision} copied={copied} onCopyId={handleCopyId} />
      ) : (
        <div className="flex items-center gap-1.5 px-1 py-1.5 text-[13px] text-muted-foreground">
          {error ? (
            'Details unavailable.'
          ) : (
            <>
              <Loader2 className="size-3 animate-spin" aria-hidden="true" />
              Loading…
            </>
          )}
        </div>
      )}
    </Popup>
  )
}

function CollisionDetails({
  collision,
  copied,
  onCopyId,
}: {
  collision: CollisionPoint
  copied: boolean
  onCopyId: (id: string) => void
}) {
  return (
    <div className="px-1 py-1.5 text-[13px] leading-relaxed">
      <div className="mb-0.5 font-semibold">{formatDate(collision.crashDate)}</div>
      <div className="mb-1" style={{ color: 'var(--muted-foreground)' }}>
        {collision.time}
      </div>
      <div className="flex items-center gap-1.5">
        <span
          style={{
            width: 10,
            height: 10,
            borderRadius: '50%',
            backgroundColor: severityColor(collision.severity),
            flexShrink: 0,
            border: '1px solid rgba(0,0,0,0.15)',
          }}
        />
        {casualtyLine(collision)}
      </div>
      {(collision.onStreetName || collision.borough) && (
        <div style={{ color: 'var(--muted-foreground)' }}>
          {[collision.onStreetName, collision.borough].filter(Boolean).join(', ')}
        </div>
      )}
      {collision.contributingFactor && <div>{collision.contributingFactor}</div>}
      {collision.vehicleType && (
        <div style={{ color: 'var(--muted-foreground)' }}>{collision.vehicleType}</div>
      )}
      <div
        className="mt-1 flex items-center gap-1 text-[11px]"
        style={{ color: 'var(--muted-foreground)' }}
      >
        <span>Collision ID: {collision.id}</span>
        <button
          onClick={() => onCopyId(collision.id)}
          title="Copy collision ID"
          style={{ color: 'var(--muted-foreground)', lineHeight: 1 }}
        >
          {copied ? <Check size={11} /> : <Copy size={11} />}
        </button>
      </div>
      <div className="mt-2 border-t pt-1.5" style={{ borderColor: 'var(--border)' }}>
        <a
          href={`https://www.google.com/maps/@?api=1&map_action=pano&viewpoint=${collision.latitude},${collision.longitude}`}
          target="_blank"
          rel="noopener noreferrer"
          className="text-[12px]"
          style={{ color: 'var(--primary)', textDecoration: 'underline' }}
        >
          Open Street View
        </a>
      </div>
    </div>
  )
}
