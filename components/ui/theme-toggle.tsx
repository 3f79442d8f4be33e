'use client'

import { Moon, Sun } from 'lucide-react'
import { useTheme } from 'next-themes'
import { Button } from '@/components/ui/button'

export function ThemeToggle({ className }: { className?: string }) {
  const { resolvedTheme, setTheme } = useTheme()
  const next = resolvedTheme === 'dark' ? 'light' : 'dark'
  return (
    <Button
      variant="outline"
      size="icon"
      className={className}
      onClick={() => setTheme(next)}
      aria-label={`Switch to ${next} map and charts`}
      title={`Switch to ${next} theme`}
      suppressHydrationWarning
    >
      <Sun className="size-4 dark:hidden" suppressHydrationWarning />
      <Moon className="size-4 hidden dark:block" suppressHydrationWarning />
    </Button>
  )
}
