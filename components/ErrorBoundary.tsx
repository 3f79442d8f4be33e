'use client'

import { Component, type ErrorInfo, type ReactNode } from 'react'
import * as Sentry from '@sentry/nextjs'

type Props = {
  children: ReactNode
  fallback: ReactNode
  // Tags the Sentry event and the log line with the section that failed.
  section?: string
}

type State = {
  hasError: boolean
}

export class ErrorBoundary extends Component<Props, State> {
  state: State = { hasError: false }

  static getDerivedStateFromError(): State {
    return { hasError: true }
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    const section = this.props.section ?? 'unknown'
    console.error(`ErrorBoundary (${section}) caught:`, error)
    Sentry.captureException(error, {
      tags: { section },
      extra: { componentStack: info.componentStack },
    })
  }

  render() {
    if (this.state.hasError) return this.props.fallback
    return this.props.children
  }
}
