'use client'

import { useEffect } from 'react'
import { Source, Layer, useMap } from 'react-map-gl/mapbox'
import type { LayerProps } from 'react-map-gl/mapbox'
import type { FeatureCollection, Point } from 'geojson'
import { useFilterContext } from '@/context/FilterContext'
import { useCollisionViews } from '@/hooks/useCollisionViews'
import { SEVERITY_COLORS } from '@/lib/collisionColors'

export const COLLISION_LAYER_IDS = ['collisions-none', 'collisions-injury', 'collisions-fatal']

// Layers are rendered bottom-to-top: None → Injury → Fatal
// so higher-severity dots always appear on top of lower-severity ones.
const noneLayer: LayerProps = {
  id: 'collisions-none',
  type: 'circle',
  filter: ['==', ['get', 'severity'], 'None'],
  paint: {
    'circle-color': SEVERITY_COLORS.None,
    'circle-opacity': 0.5,
    'circle-radius': ['interpolate', ['linear'], ['zoom'], 9, 1.5, 12, 4, 16, 9],
    'circle-stroke-width': 0,
  },
}

const injuryLayer: LayerProps = {
  id: 'collisions-injury',
  type: 'circle',
  filter: ['==', ['get', 'severity'], 'Injury'],
  paint: {
    'circle-color': SEVERITY_COLORS.Injury,
    'circle-opacity': 0.7,
    'circle-radius': ['interpolate', ['linear'], ['zoom'], 9, 2, 12, 5, 16, 12],
    'circle-stroke-width': 0,
  },
}

const fatalLayer: LayerProps = {
  id: 'collisions-fatal',
  type: 'circle',
  filter: ['==', ['get', 'severity'], 'Fatal'],
  paint: {
    'circle-color': SEVERITY_COLORS.Fatal,
    'circle-opacity': 0.85,
    'circle-radius': ['interpolate', ['linear'], ['zoom'], 9, 3, 12, 7, 16, 16],
    'circle-stroke-width': 0,
  },
}

export function CollisionLayer() {
  const { current: map } = useMap()
  const { dispatch } = useFilterContext()
  const { data, previousData, error, loading } = useCollisionViews()

  // Keep the last result on screen while a refetch is in flight.
  const displayData = data ?? previousData

  // Surface loading state so SummaryBar can show a refetch indicator.
  useEffect(() => {
    dispatch({ type: 'SET_LOADING', payload: loading })
  }, [loading, dispatch])

  // Surface the true total count to the filter context so SummaryBar can display it.
  useEffect(() => {
    if (!loading) {
      dispatch({ type: 'SET_TOTAL_COUNT', payload: data?.collisionViews.totalCount ?? null })
    }
  }, [data, loading, dispatch])

  useEffect(() => {
    if (!map) return
    const enter = () => {
      map.getCanvas().style.cursor = 'pointer'
    }
    const leave = () => {
      map.getCanvas().style.cursor = ''
    }
    for (const id of COLLISION_LAYER_IDS) {
      map.on('mouseenter', id, enter)
      map.on('mouseleave', id, leave)
    }
    return () => {
      for (const id of COLLISION_LAYER_IDS) {
        map.off('mouseenter', id, enter)
        map.off('mouseleave', id, leave)
      }
    }
  }, [map])

  // Re-centre on the mean position of every new result, computed server-side
  // over the whole filtered subset.
  useEffect(() => {
    if (loading || !map || !data) return
    const { center } = data.collisionViews
    if (!center) return
    map.easeTo({ center: [center.longitude, center.latitude], duration: 800 })
  }, [data, loading, map])

  if (error) {
    console.error('CollisionLayer query error:', error)
    return null
  }

  if (!displayData) return null

  const geojson: FeatureCollection<Point> = {
    type: 'FeatureCollection',
    features: displayData.collisionViews.points.map((collision) => ({
      type: 'Feature' as const,
      geometry: {
        type: 'Point' as const,
        coordinates: [collision.longitude, collision.latitude],
      },
      properties: {
        id: collision.id,
        severity: collision.severity,
      },
    })),
  }

  return (
    <Source id="collisions" type="geojson" data={geojson}>
      <Layer {...noneLayer} />
      <Layer {...injuryLayer} />
      <Layer {...fatalLayer} />
    </Source>
  )
}
