import { useMemo, useState } from 'react';
import AuditReportView from './components/AuditReportView';
import CustomAuditForm from './components/CustomAuditForm';
import Footer from './components/Footer';
import MethodologyPage from './components/MethodologyPage';
import { DEMO_HOMES } from './demo/demoHomes';
import { runAudit } from './engine/Engine';
import { parseAuditRequest } from './engine/schema/AuditRequestSchema';
import './App.css';

type Journey =
  | { kind: 'landing' }
  | { kind: 'custom' }
  | { kind: 'methodology' }
  | { kind: 'report'; title: string; request: unknown };

// Runs during render so validation and engine failures reach the error boundary.
function ReportRoute({ title, request, onBack }: { title: string; request: unknown; onBack: () => void }) {
  const report = useMemo(() => runAudit(parseAuditRequest(request)), [request]);
  return <AuditReportView title={title} report={report} onBack={onBack} />;
}

export default function App() {
  const [journey, setJourney] = useState<Journey>({ kind: 'landing' });
  const home = () => setJourney({ kind: 'landing' });

  function openReport(title: string, request: unknown) {
    setJourney({ kind: 'report', title, request });
  }

  if (journey.kind === 'report') return <ReportRoute title={journey.title} request={journey.request} onBack={home} />;
  if (journey.kind === 'custom') return <CustomAuditForm onBack={home} onAudit={openReport} />;
  if (journey.kind === 'methodology') return <MethodologyPage onBack={home} />;

  return (
    <div className="landing">
      <div className="hero">
        <h1>🏠 Home Energy Audit</h1>
        <p className="subtitle">Recommendation Engine</p>
        <p className="tagline">
          Ranked, costed upgrades for a household from its survey answers and a
          predicted breakdown of where its energy goes.
        </p>
      </div>
      <div className="journey-cards">
        {DEMO_HOMES.map(demo => (
          <div key={demo.id} className="journey-card" onClick={() => openReport(demo.name, demo.request)}>
            <div className="card-icon">{demo.icon}</div>
            <h2>{demo.name}</h2>
            <p className="card-time">{demo.request.profile.division ?? 'Location unknown'}</p>
            <p>{demo.blurb}</p>
            <button className="cta-btn">Run Audit →</button>
          </div>
        ))}
        <div className="journey-card custom" onClick={() => setJourney({ kind: 'custom' })}>
          <div className="card-icon">🧾</div>
          <h2>Custom Request</h2>
          <p className="card-time">JSON</p>
          <p>Paste a profile and usage breakdown to audit any home.</p>
          <button className="cta-btn">Open Editor →</button>
        </div>
      </div>
      <Footer onMethodology={() => setJourney({ kind: 'methodology' })} />
    </div>
  );
}
