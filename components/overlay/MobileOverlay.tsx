'use client'

import type { ReactNode } from 'react'
import { X } from 'lucide-react'
import { Button } from '@/components/ui/button'

interface MobileOverlayProps {
  isOpen: boolean
  onClose: () => void
  title: string
  children: ReactNode
}

/** Full-screen panel used on small screens in place of the pinned side panels. */
export function MobileOverlay({ isOpen, onClose, title, children }: MobileOverlayProps) {
  if (!isOpen) return null

  return (
    <div
      className="fixed inset-0 z-20 flex flex-col bg-background md:hidden"
      role="dialog"
      aria-modal="true"
      aria-label={title}
    >
      <div className="flex items-center justify-between border-b px-4 py-3">
        <h2 className="text-base font-semibold">{title}</h2>
        <Button variant="ghost" size="icon" onClick={onClose} aria-label={`Close ${title.toLowerCase()}`}>
          <X className="size-4" />
        </Button>
      </div>

      <div className="flex-1 overflow-y-auto">{children}</div>
    </div>
  )
}
