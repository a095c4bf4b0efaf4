/**
 * AuditReportView
 *
 * Full report for one audited home: score, usage, recommendations, roadmap
 * and the assumptions the engine made along the way.
 */
import type { AuditReportV1 } from '../contracts/AuditReportV1';
import EnergyScoreCard from './EnergyScoreCard';
import UsageBreakdownChart from './UsageBreakdownChart';
import RecommendationTable from './RecommendationTable';
import RoadmapPanel from './RoadmapPanel';
import { formatKbtu, formatUsd } from './reportFormat';

interface Props {
  title: string;
  report: AuditReportV1;
  onBack: () => void;
}

export default function AuditReportView({ title, report, onBack }: Props) {
  const { homeProfile, currentUsage, meta } = report;

  const usageCards = [
    { label: 'Annual Energy', value: formatKbtu(currentUsage.totalKbtu) },
    { label: 'Annual Cost', value: formatUsd(currentUsage.annualCost) },
    { label: 'Monthly Average', value: formatUsd(currentUsage.monthlyAvg) },
    { label: 'Carbon', value: `${currentUsage.carbonTons.toFixed(1)} t CO₂` },
  ];

  return (
    <div className="stepper-container">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">{title}</span>
      </div>

      <div className="result-section">
        <h3>🏠 {homeProfile.location}</h3>
        <p style={{ fontSize: '0.85rem', color: '#4a5568', margin: '0 0 0.75rem' }}>
          {homeProfile.type} · {homeProfile.sizeSqft.toLocaleString('en-US')} sq ft · built {homeProfile.yearBuilt}
          {' '}· {homeProfile.occupants} occupants · {homeProfile.climate.hdd} HDD / {homeProfile.climate.cdd} CDD
        </p>
        <div style={{ display: 'flex', gap: '1rem', flexWrap: 'wrap' }}>
          {usageCards.map(card => (
            <div key={card.label} style={{
              flex: 1, minWidth: 130,
              background: '#f7fafc', border: '1.5px solid #e2e8f0', borderRadius: 10,
              padding: '10px 14px', textAlign: 'center',
            }}>
              <div style={{ fontSize: '0.72rem', color: '#718096', marginBottom: 4 }}>{card.label}</div>
              <div style={{ fontSize: '1.1rem', fontWeight: 700, color: '#2d3748' }}>{card.value}</div>
            </div>
          ))}
        </div>
      </div>

      <EnergyScoreCard
        score={report.energyScore}
        benchmark={report.benchmarkComparison}
        eui={currentUsage.eui}
        projected={report.projectedUsage}
      />
      <UsageBreakdownChart breakdown={report.usageBreakdown} />
      <RecommendationTable recommendations={report.recommendations} />
      <RoadmapPanel roadmap={report.implementationRoadmap} summary={report.financialSummary} />

      <div className="result-section">
        <h3>📋 Assumptions ({meta.assumptions.length})</h3>
        <p style={{ fontSize: '0.8rem', color: '#718096', margin: '0 0 0.5rem' }}>
          {meta.inputCoverage.providedFields.length} profile fields supplied ({meta.inputCoverage.coveragePct.toFixed(0)}% coverage).
        </p>
        <ul style={{ margin: 0, paddingLeft: 20, fontSize: '0.8rem', color: '#4a5568' }}>
          {meta.assumptions.map(a => (
            <li key={a.id} style={{ marginBottom: 4 }}>
              <strong>{a.title}.</strong> {a.detail}
              {a.improveBy && <em style={{ color: '#2c5282' }}> {a.improveBy}</em>}
            </li>
          ))}
        </ul>
        <details style={{ marginTop: '0.75rem' }}>
          <summary style={{ fontSize: '0.8rem', color: '#718096', cursor: 'pointer' }}>Engine trace</summary>
          <ul style={{ margin: '0.5rem 0 0', paddingLeft: 20, fontSize: '0.75rem', color: '#718096' }}>
            {meta.trace.notes.map((note, i) => <li key={i}>{note}</li>)}
          </ul>
        </details>
      </div>
    </div>
  );
}
