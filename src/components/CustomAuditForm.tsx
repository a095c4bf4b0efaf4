import { useState } from 'react';
import { DEMO_HOMES } from '../demo/demoHomes';
import { parseAuditRequest } from '../engine/schema/AuditRequestSchema';

interface Props {
  onBack: () => void;
  onAudit: (title: string, request: unknown) => void;
}

const STARTER = JSON.stringify(DEMO_HOMES[0].request, null, 2);

export default function CustomAuditForm({ onBack, onAudit }: Props) {
  const [text, setText] = useState(STARTER);
  const [error, setError] = useState<string | null>(null);

  function submit() {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      setError(err instanceof Error ? `Not valid JSON: ${err.message}` : 'Not valid JSON');
      return;
    }
    try {
      onAudit('Custom Request', parseAuditRequest(parsed));
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    }
  }

  return (
    <div className="stepper-container">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">Custom Request</span>
      </div>
      <div className="result-section">
        <h3>🧾 Audit Request</h3>
        <p style={{ fontSize: '0.8rem', color: '#718096', margin: '0 0 0.5rem' }}>
          A <code>profile</code> and a predicted <code>breakdown</code> (kBTU/yr) are required;
          {' '}<code>customRates</code> and <code>benchmarks</code> are optional.
        </p>
        <textarea
          value={text}
          onChange={e => { setText(e.target.value); setError(null); }}
          spellCheck={false}
          style={{
            width: '100%', minHeight: 360, boxSizing: 'border-box',
            fontFamily: 'ui-monospace, SFMono-Regular, Menlo, monospace', fontSize: '0.78rem',
            padding: 10, border: '1.5px solid #e2e8f0', borderRadius: 8,
          }}
        />
        {error && (
          <div style={{
            marginTop: 8, padding: '8px 12px',
            background: '#fff5f5', border: '1px solid #fed7d7', borderRadius: 6,
            color: '#c53030', fontSize: '0.8rem', whiteSpace: 'pre-wrap',
          }}>
            {error}
          </div>
        )}
        <button className="cta-btn" style={{ marginTop: 12 }} onClick={submit}>Run Audit →</button>
      </div>
    </div>
  );
}
