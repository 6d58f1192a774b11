// Main entry — mounts the React app and loads global styles.
import React from 'react'
import { createRoot } from 'react-dom/client'
import App from './App'
import './styles.css'

interface BoundaryState {
  hasError: boolean
  error?: unknown
}

// Simple error boundary to surface runtime errors instead of a blank page
class ErrorBoundary extends React.Component<{ children: React.ReactNode }, BoundaryState> {
  constructor(props: { children: React.ReactNode }) {
    super(props)
    this.state = { hasError: false }
  }
  static getDerivedStateFromError(error: unknown): BoundaryState {
    return { hasError: true, error }
  }
  componentDidCatch(error: unknown, info: React.ErrorInfo) {
    console.error('[IFCT Explorer] App crashed:', error, info.componentStack)
  }
  render() {
    if (this.state.hasError) {
      return (
        <div style={{ padding: 24, fontFamily: 'ui-sans-serif, system-ui' }}>
          <h2>Something went wrong.</h2>
          <pre style={{ whiteSpace: 'pre-wrap' }}>{String(this.state.error ?? '')}</pre>
          <p className="muted">Open the browser console for the full stack.</p>
        </div>
      )
    }
    return this.props.children
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element')
createRoot(container).render(
  <React.StrictMode>
    <ErrorBoundary>
      <App />
    </ErrorBoundary>
  </React.StrictMode>,
)
