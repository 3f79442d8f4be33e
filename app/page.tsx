import { AppShell } from '@/components/layout/AppShell'

export default function Home() {
  return (
    <div style={{ position: 'relative', width: '100%', height: '100dvh' }}>
      <AppShell />
    </div>
  )
}
