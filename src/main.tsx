import { StrictMode, Component } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App'
import { AuditRequestError } from './engine/schema/AuditRequestSchema'

interface AuditBoundaryState { error: Error | null; attempt: number }

// Keeps a failed audit from blanking the page; "Start over" remounts App.
class AuditErrorBoundary extends Component<{ children: ReactNode }, AuditBoundaryState> {
  state: AuditBoundaryState = { error: null, attempt: 0 }

  static getDerivedStateFromError(error: Error): Partial<AuditBoundaryState> {
    return { error }
  }

  render() {
    const { error, attempt } = this.state
    if (!error) return <div key={attempt}>{this.props.children}</div>

    const invalidRequest = error instanceof AuditRequestError
    return (
      <div className="stepper-container">
        <div className="result-section">
          <h3 style={{ color: '#c53030' }}>
            {invalidRequest ? 'This audit request is not valid' : 'The audit could not be completed'}
          </h3>
          <p style={{ color: '#4a5568', fontSize: '0.875rem' }}>
            {invalidRequest
              ? 'Fix the fields listed below and run the audit again.'
              : 'The engine stopped before it could assemble a report for this home.'}
          </p>
          <pre style={{
            padding: '0.75rem', background: '#fff5f5', border: '1px solid #fed7d7', borderRadius: 6,
            fontSize: '0.75rem', color: '#c53030', whiteSpace: 'pre-wrap',
          }}>
            {error.message}
          </pre>
          <button className="cta-btn" onClick={() => this.setState({ error: null, attempt: attempt + 1 })}>
            Start over
          </button>
        </div>
      </div>
    )
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element in index.html')

createRoot(container).render(
  <StrictMode>
    <AuditErrorBoundary>
      <App />
    </AuditErrorBoundary>
  </StrictMode>,
)
