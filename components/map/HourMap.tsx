'use client'

import { useQuery } from '@apollo/client/react'
import Map, { Source, Layer } from 'react-map-gl/mapbox'
import type { LayerProps } from 'react-map-gl/mapbox'
import type { FeatureCollection, Point } from 'geojson'
import { GET_HOUR_COLLISIONS, type GetHourCollisionsQuery } from '@/lib/graphql/queries'
import { NYC_VIEW, useMapStyle } from './MapContainer'

const heatmapLayer: LayerProps = {
  id: 'hour-heatmap',
  type: 'heatmap',
  paint: {
    'heatmap-weight': 1,
    'heatmap-intensity': ['interpolate', ['linear'], ['zoom'], 9, 1, 15, 3],
    'heatmap-radius': ['interpolate', ['linear'], ['zoom'], 9, 6, 15, 24],
    'heatmap-opacity': 0.8,
    'heatmap-color': [
      'interpolate',
      ['linear'],
      ['heatmap-density'],
      0,
      'rgba(0,0,0,0)',
      0.2,
      'rgba(254,224,144,0.5)',
      0.5,
      'rgba(253,141,60,0.65)',
      0.8,
      'rgba(240,59,32,0.8)',
      1,
      'rgba(189,0,38,0.9)',
    ],
  },
}

/** Density of every collision in the selected hour, across the whole dataset. */
export function HourMap({ hour }: { hour: number }) {
  const mapStyle = useMapStyle()
  const { data, previousData, error } = useQuery<GetHourCollisionsQuery>(GET_HOUR_COLLISIONS, {
    variables: { filter: { hour } },
  })

  if (error) console.error('HourMap query error:', error)

  const items = (data ?? previousData)?.collisionPoints ?? []
  const geojson: FeatureCollection<Point> = {
    type: 'FeatureCollection',
    features: items.map((c) => ({
      type: 'Feature' as const,
      geometry: { type: 'Point' as const, coordinates: [c.longitude, c.latitude] },
      properties: {},
    })),
  }

  return (
    <Map
      mapboxAccessToken={process.env.NEXT_PUBLIC_MAPBOX_TOKEN}
      initialViewState={{ ...NYC_VIEW, pitch: 40 }}
      style={{ width: '100%', height: '100%' }}
      mapStyle={mapStyle}
    >
      <Source id="hour-collisions" type="geojson" data={geojson}>
        <Layer {...heatmapLayer} />
      </Source>
    </Map>
  )
}
