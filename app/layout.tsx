import type { Metadata } from 'next'
import { Suspense } from 'react'
import { GeistSans } from 'geist/font/sans'
import { GeistMono } from 'geist/font/mono'
import { Toaster } from 'sonner'
import { ApolloProvider } from './apollo-provider'
import { ThemeProvider } from '@/components/theme-provider'
import { FilterProvider } from '@/context/FilterContext'
import { FilterUrlSync } from '@/components/FilterUrlSync'
import 'mapbox-gl/dist/mapbox-gl.css'
import 'react-day-picker/style.css'
import './globals.css'

export const metadata: Metadata = {
  title: 'NYC Collisions',
  description: 'Motor vehicle collisions in New York City, mapped and charted',
  icons: {
    icon: "data:image/svg+xml,<svg xmlns='http://www.w3.org/2000/svg' viewBox='0 0 100 100'><text y='.9em' font-size='90'>🚦</text></svg>",
  },
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className={`${GeistSans.variable} ${GeistMono.variable} antialiased`}>
        <ThemeProvider
          attribute="class"
          defaultTheme="system"
          enableSystem
          disableTransitionOnChange
        >
          <ApolloProvider>
            <FilterProvider>
              <Suspense fallback={null}>
                <FilterUrlSync />
              </Suspense>
              {children}
              <Toaster richColors position="top-center" />
            </FilterProvider>
          </ApolloProvider>
        </ThemeProvider>
      </body>
    </html>
  )
}
