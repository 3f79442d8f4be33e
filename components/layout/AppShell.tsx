'use client'

import { useRef, useEffect, useState } from 'react'
import { Info, Loader2, Minus, Plus, SlidersHorizontal } from 'lucide-react'
import type { MapRef } from 'react-map-gl/mapbox'
import { useQuery } from '@apollo/client/react'
import { toast } from 'sonner'
import { MapContainer } from '@/components/map/MapContainer'
import { Sidebar, FilterContent } from '@/components/sidebar/Sidebar'
import { MobileOverlay } from '@/components/overlay/MobileOverlay'
import { InfoSidePanel, APP_TITLE } from '@/components/info/InfoSidePanel'
import { InfoPanelContent } from '@/components/info/InfoPanelContent'
import { SummaryBar } from '@/components/summary/SummaryBar'
import { ExportButton } from '@/components/export/ExportButton'
import { DatasetCharts } from '@/components/dashboard/DatasetCharts'
import { TimeOfDaySection } from '@/components/dashboard/TimeOfDaySection'
import { DangerousStreets } from '@/components/dashboard/DangerousStreets'
import { RawDataTable } from '@/components/dashboard/RawDataTable'
import { Button } from '@/components/ui/button'
import { ThemeToggle } from '@/components/ui/theme-toggle'
import { useFilterContext, getActiveFilterLabels } from '@/context/FilterContext'
import { ErrorBoundary } from '@/components/ErrorBoundary'
import { GET_FILTER_OPTIONS, type GetFilterOptionsQuery } from '@/lib/graphql/queries'

const mapFallback = (
  <div className="flex h-full w-full items-center justify-center bg-background">
    <div className="space-y-3 text-center">
      <p className="text-sm text-muted-foreground">Map failed to load.</p>
      <Button variant="outline" size="sm" onClick={() => window.location.reload()}>
        Refresh
      </Button>
    </div>
  </div>
)

const sectionFallback = (
  <p className="rounded-lg border p-4 text-sm text-muted-foreground">
    This section failed to load.
  </p>
)

export function AppShell() {
  const [sidebarOpen, setSidebarOpen] = useState(true)
  const [overlayOpen, setOverlayOpen] = useState(false)
  const [infoPanelOpen, setInfoPanelOpen] = useState(false)
  const [infoOverlayOpen, setInfoOverlayOpen] = useState(false)
  const mapRef = useRef<MapRef>(null)
  const { filterState, dispatch } = useFilterContext()

  const { data: optionsData, error: optionsError } =
    useQuery<GetFilterOptionsQuery>(GET_FILTER_OPTIONS)

  // Slider and calendar bounds come from the loaded dataset.
  useEffect(() => {
    if (!optionsData) return
    const { minDate, maxDate, maxInjured } = optionsData.filterOptions
    dispatch({
      type: 'SET_FILTER_OPTIONS',
      payload: {
        dataBounds: minDate && maxDate ? { minDate, maxDate } : null,
        maxInjured,
      },
    })
  }, [optionsData, dispatch])

  // A failed dataset load fails every query; one toast covers them all.
  useEffect(() => {
    if (!optionsError) return
    console.error('Filter options query error:', optionsError)
    toast.error('Collision data is unavailable. Check the server logs.', {
      id: 'dataset-unavailable',
      duration: Infinity,
    })
  }, [optionsError])

  // Call resize() after any panel transition so Mapbox recomputes canvas size.
  useEffect(() => {
    const id = setTimeout(() => mapRef.current?.resize(), 0)
    return () => clearTimeout(id)
  }, [sidebarOpen, overlayOpen, infoPanelOpen, infoOverlayOpen])

  const filterIcon = filterState.isLoading ? (
    <Loader2 className="size-4 animate-spin" aria-hidden="true" />
  ) : (
    <SlidersHorizontal className="size-4" suppressHydrationWarning />
  )

  return (
    <div className="flex w-full h-full">
      {/* Left: info panel (desktop, pinned) */}
      {infoPanelOpen && <InfoSidePanel onClose={() => setInfoPanelOpen(false)} />}

      {/* Center: map on top, dashboard sections below */}
      <div className="flex-1 overflow-y-auto" style={{ minWidth: 0 }}>
        <header className="flex items-center gap-2 border-b px-4 py-3">
          <Button
            variant="outline"
            size="icon"
            className="hidden md:inline-flex"
            onClick={() => setInfoPanelOpen((open) => !open)}
            aria-label="Toggle about panel"
          >
            <Info className="size-4" />
          </Button>
          <Button
            variant="outline"
            size="icon"
            className="md:hidden"
            onClick={() => setInfoOverlayOpen(true)}
            aria-label="Open about"
          >
            <Info className="size-4" />
          </Button>
          <h1 className="flex-1 text-lg font-semibold">{APP_TITLE}</h1>
          <ThemeToggle />
          {/* Sidebar toggle — desktop only */}
          <Button
            variant="outline"
            size="icon"
            className="hidden md:inline-flex"
            onClick={() => setSidebarOpen(true)}
            aria-label="Open filters"
          >
            {filterIcon}
          </Button>
          {/* Filter overlay toggle — mobile only */}
          <Button
            variant="outline"
            size="icon"
            className="md:hidden"
            onClick={() => setOverlayOpen(true)}
            aria-label="Open filters"
          >
            {filterIcon}
          </Button>
        </header>

        <div className="relative h-[60vh] min-h-80">
          <ErrorBoundary fallback={mapFallback} section="map">
            <MapContainer ref={mapRef} />
          </ErrorBoundary>

          {/* Bottom-left: zoom controls */}
          <div className="absolute bottom-20 left-4 z-10 flex flex-col gap-2 md:bottom-6">
            <Button
              variant="outline"
              size="icon"
              className="dark:bg-zinc-900 dark:border-zinc-700"
              onClick={() => mapRef.current?.getMap().zoomIn()}
              aria-label="Zoom in"
            >
              <Plus className="size-4" />
            </Button>
            <Button
              variant="outline"
              size="icon"
              className="dark:bg-zinc-900 dark:border-zinc-700"
              onClick={() => mapRef.current?.getMap().zoomOut()}
              aria-label="Zoom out"
            >
              <Minus className="size-4" />
            </Button>
          </div>

          <SummaryBar
            collisionCount={filterState.totalCount}
            activeFilters={getActiveFilterLabels(filterState)}
            isLoading={filterState.isLoading}
            actions={<ExportButton variant="icon" />}
          />
        </div>

        <main className="space-y-10 px-4 py-6">
          <ErrorBoundary fallback={sectionFallback} section="raw-data">
            <RawDataTable />
          </ErrorBoundary>
          <ErrorBoundary fallback={sectionFallback} section="dataset-charts">
            <DatasetCharts />
          </ErrorBoundary>
          <ErrorBoundary fallback={sectionFallback} section="time-of-day">
            <TimeOfDaySection />
          </ErrorBoundary>
          <ErrorBoundary fallback={sectionFallback} section="dangerous-streets">
            <DangerousStreets />
          </ErrorBoundary>
        </main>
      </div>

      {/* Right: filter panel (desktop, pinned) */}
      {sidebarOpen && <Sidebar onClose={() => setSidebarOpen(false)} />}

      {/* Mobile overlays */}
      <MobileOverlay title="Filters" isOpen={overlayOpen} onClose={() => setOverlayOpen(false)}>
        <FilterContent />
      </MobileOverlay>
      <MobileOverlay
        title={APP_TITLE}
        isOpen={infoOverlayOpen}
        onClose={() => setInfoOverlayOpen(false)}
      >
        <div className="px-4 py-4">
          <InfoPanelContent />
        </div>
      </MobileOverlay>
    </div>
  )
}
