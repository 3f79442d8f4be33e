'use client'

import { forwardRef, useState, useCallback, useRef } from 'react'
import Map from 'react-map-gl/mapbox'
import type { MapRef } from 'react-map-gl/mapbox'
import { useTheme } from 'next-themes'
import { CollisionLayer, COLLISION_LAYER_IDS } from './CollisionLayer'
import { CollisionPopup } from './CollisionPopup'
import { useFilterContext } from '@/context/FilterContext'
import { useCollisionViews } from '@/hooks/useCollisionViews'
import type { MapPoint } from '@/lib/graphql/queries'

type SavedViewport = {
  center: [number, number]
  zoom: number
  bearing: number
  pitch: number
}

export const NYC_VIEW = { longitude: -73.94, latitude: 40.7, zoom: 10 }

export function useMapStyle(): string {
  const { resolvedTheme } = useTheme()
  return resolvedTheme === 'dark'
    ? 'mapbox://styles/mapbox/dark-v11'
    : 'mapbox://styles/mapbox/light-v11'
}

export const MapContainer = forwardRef<MapRef>(function MapContainer(_, ref) {
  const mapStyle = useMapStyle()
  const { filterState } = useFilterContext()
  const { data } = useCollisionViews()

  // Internal ref for viewport capture/restore; forwarded externally for map.resize()
  const internalMapRef = useRef<MapRef | null>(null)
  const setMapRef = useCallback(
    (instance: MapRef | null) => {
      internalMapRef.current = instance
      if (typeof ref === 'function') ref(instance)
      else if (ref) ref.current = instance
    },
    [ref]
  )

  const savedViewportRef = useRef<SavedViewport | null>(null)

  const [selected, setSelected] = useState<MapPoint | null>(null)

  const closePopup = useCallback(() => {
    setSelected(null)
    const saved = savedViewportRef.current
    if (saved && internalMapRef.current) {
      internalMapRef.current.getMap().flyTo({
        center: saved.center,
        zoom: saved.zoom,
        bearing: saved.bearing,
        pitch: saved.pitch,
        duration: 800,
        essential: true,
      })
      savedViewportRef.current = null
    }
  }, [])

  const handleMapClick = useCallback(
    (e: Parameters<NonNullable<React.ComponentProps<typeof Map>['onClick']>>[0]) => {
      const id: unknown = e.features?.[0]?.properties?.id
      const collision =
        typeof id === 'string' ? data?.collisionViews.points.find((c) => c.id === id) : undefined
      if (!collision) {
        closePopup()
        return
      }

      const map = internalMapRef.current?.getMap()
      // Save viewport only once — clicking collision-to-collision keeps the original
      if (map && !savedViewportRef.current) {
        const center = map.getCenter()
        savedViewportRef.current = {
          center: [center.lng, center.lat],
          zoom: map.getZoom(),
          bearing: map.getBearing(),
          pitch: map.getPitch(),
        }
      }

      setSelected(collision)

      map?.flyTo({
        center: [collision.longitude, collision.latitude],
        zoom: 15.5,
        pitch: 45,
        duration: 800,
        essential: true,
      })
    },
    [closePopup, data]
  )

  return (
    <Map
      ref={setMapRef}
      mapboxAccessToken={process.env.NEXT_PUBLIC_MAPBOX_TOKEN}
      initialViewState={NYC_VIEW}
      style={{ width: '100%', height: '100%' }}
      mapStyle={mapStyle}
      interactiveLayerIds={COLLISION_LAYER_IDS}
      onClick={handleMapClick}
    >
      <CollisionLayer />

      {filterState.totalCount === 0 && (
        <div className="absolute inset-x-0 top-4 z-10 flex justify-center pointer-events-none">
          <p className="rounded-md border bg-background/90 px-3 py-1.5 text-sm text-muted-foreground shadow-sm">
            No collisions match the current filters.
          </p>
        </div>
      )}

      {selected && <CollisionPopup point={selected} onClose={closePopup} />}
    </Map>
  )
})
