import type { FinancialSummaryV1, RoadmapPhaseV1, RoadmapV1 } from '../contracts/AuditReportV1';
import { formatUsd } from './reportFormat';

function PhaseColumn({ title, phase, color }: { title: string; phase: RoadmapPhaseV1; color: string }) {
  return (
    <div style={{
      flex: 1, minWidth: 180,
      background: '#fff', border: `1.5px solid ${color}`, borderRadius: 10,
      padding: '12px 16px',
    }}>
      <div style={{ fontSize: '0.8rem', fontWeight: 700, color }}>{title}</div>
      <div style={{ fontSize: '0.72rem', color: '#718096', marginBottom: 6 }}>{phase.timeline}</div>
      <div style={{ fontSize: '0.8rem', color: '#2d3748' }}>
        {phase.count} item{phase.count === 1 ? '' : 's'} · {formatUsd(phase.cost)} → {formatUsd(phase.savings)}/yr
      </div>
      <ul style={{ margin: '6px 0 0', paddingLeft: 18, fontSize: '0.78rem', color: '#4a5568' }}>
        {phase.items.map((item) => <li key={item}>{item}</li>)}
      </ul>
    </div>
  );
}

export default function RoadmapPanel({ roadmap, summary }: { roadmap: RoadmapV1; summary: FinancialSummaryV1 }) {
  const cards = [
    { label: 'Total Investment', value: formatUsd(summary.totalInvestment) },
    { label: 'Likely Rebates', value: formatUsd(summary.availableRebates) },
    { label: 'Annual Savings', value: formatUsd(summary.totalAnnualSavings) },
    { label: 'Average Payback', value: `${summary.averagePayback.toFixed(1)} yrs` },
  ];

  return (
    <div className="result-section">
      <h3>🗺️ Implementation Roadmap</h3>
      <div style={{ display: 'flex', gap: '1rem', flexWrap: 'wrap', marginBottom: '1rem' }}>
        {cards.map(card => (
          <div key={card.label} style={{
            flex: 1, minWidth: 130,
            background: '#fff', border: '1.5px solid #e2e8f0', borderRadius: 10,
            padding: '12px 16px', textAlign: 'center',
          }}>
            <div style={{ fontSize: '0.72rem', color: '#718096', marginBottom: 4 }}>{card.label}</div>
            <div style={{ fontSize: '1.3rem', fontWeight: 800, color: '#2c5282' }}>{card.value}</div>
          </div>
        ))}
      </div>
      <div style={{ display: 'flex', gap: '1rem', flexWrap: 'wrap' }}>
        <PhaseColumn title="Phase 1 · Quick wins" phase={roadmap.phase1Immediate} color="#38a169" />
        <PhaseColumn title="Phase 2 · Short term" phase={roadmap.phase2ShortTerm} color="#3182ce" />
        <PhaseColumn title="Phase 3 · Medium term" phase={roadmap.phase3MediumTerm} color="#9f7aea" />
      </div>
    </div>
  );
}
