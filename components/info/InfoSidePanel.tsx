'use client'

import { X } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { InfoPanelContent } from './InfoPanelContent'

export const APP_TITLE = 'NYC Collisions'

interface InfoSidePanelProps {
  onClose: () => void
}

export function InfoSidePanel({ onClose }: InfoSidePanelProps) {
  return (
    <div className="hidden md:flex flex-col w-80 flex-shrink-0 border-r bg-background h-full overflow-hidden">
      <div className="flex items-center gap-1 border-b px-4 py-3">
        <h2 className="text-base font-semibold flex-1">{APP_TITLE}</h2>
        <Button variant="ghost" size="icon" onClick={onClose} aria-label="Close">
          <X className="size-4" />
        </Button>
      </div>
      <div className="flex-1 overflow-y-auto px-4 py-4">
        <InfoPanelContent />
      </div>
    </div>
  )
}
