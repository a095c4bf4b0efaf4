/**
 * RecommendationTable
 *
 * Recommendations in payback order. Clicking a row expands implementation
 * steps, incentives and contractor guidance.
 */
import { useState } from 'react';
import type { ProfessionalRecommendation } from '../contracts/AuditReportV1';
import { formatPayback, formatUsd, priorityBadge } from './reportFormat';

function DetailList({ title, items, color }: { title: string; items: string[]; color: string }) {
  if (items.length === 0) return null;
  return (
    <div style={{ marginBottom: 6 }}>
      <strong style={{ color }}>{title}</strong>
      <ul style={{ margin: '4px 0 0 0', paddingLeft: 20 }}>
        {items.map((item, i) => (
          <li key={i} style={{ color: '#4a5568', marginBottom: 2 }}>{item}</li>
        ))}
      </ul>
    </div>
  );
}

function RecommendationRow({ rec }: { rec: ProfessionalRecommendation }) {
  const [expanded, setExpanded] = useState(false);
  const badge = priorityBadge(rec.priority);
  const guidance = rec.implementation.contractorGuidance;

  return (
    <>
      <tr
        onClick={() => setExpanded(prev => !prev)}
        style={{ cursor: 'pointer', background: expanded ? '#f7fafc' : undefined }}
      >
        <td style={{ padding: '10px 8px', fontWeight: 600, fontSize: '0.85rem' }}>
          {rec.title}
          <div style={{ fontWeight: 400, fontSize: '0.75rem', color: '#718096' }}>{rec.category}</div>
        </td>
        <td style={{ padding: '10px 8px', textAlign: 'center' }}>
          <span style={{
            padding: '2px 8px', borderRadius: 12,
            background: badge.bg, color: badge.color,
            fontSize: '0.75rem', fontWeight: 700,
          }}>{badge.label}</span>
        </td>
        <td style={{ padding: '10px 8px', fontSize: '0.82rem' }}>{formatUsd(rec.cost.estimate)}</td>
        <td style={{ padding: '10px 8px', fontSize: '0.82rem' }}>{formatUsd(rec.savings.annualDollars)}/yr</td>
        <td style={{ padding: '10px 8px', fontSize: '0.82rem' }}>{formatPayback(rec.financial.paybackYears)}</td>
        <td style={{ padding: '10px 8px', textAlign: 'center', fontSize: '0.8rem', color: '#718096' }}>
          {rec.environmental.co2ReductionTons.toFixed(2)} t {expanded ? '▲' : '▼'}
        </td>
      </tr>
      {expanded && (
        <tr style={{ background: '#f7fafc' }}>
          <td colSpan={6} style={{ padding: '8px 16px', fontSize: '0.8rem' }}>
            <p style={{ margin: '0 0 6px', color: '#2d3748' }}>{rec.description}</p>
            <p style={{ margin: '0 0 6px', color: '#4a5568' }}>
              <strong>Now:</strong> {rec.currentCondition} &nbsp;→&nbsp;
              <strong>Do:</strong> {rec.recommendedAction}
            </p>
            <p style={{ margin: '0 0 6px', color: '#4a5568' }}>
              {rec.implementation.difficulty} · {rec.implementation.estimatedTime} ·{' '}
              {rec.implementation.seasonalTiming}
            </p>
            <p style={{ margin: '0 0 6px', color: '#276749' }}>{rec.financial.roiAnalysis.summary}</p>
            <DetailList title="Steps:" items={rec.implementation.steps} color="#2c5282" />
            <DetailList title="Rebates & credits:" items={[...rec.incentives.rebates, ...rec.incentives.taxCredits]} color="#276749" />
            {guidance.contractorRequired ? (
              <>
                <p style={{ margin: '0 0 6px', color: '#4a5568' }}>
                  Typical contractor price: {guidance.typicalCostRange}
                </p>
                <DetailList title="Red flags:" items={guidance.redFlags} color="#c53030" />
              </>
            ) : (
              <DetailList title="DIY tips:" items={guidance.tips} color="#2c5282" />
            )}
          </td>
        </tr>
      )}
    </>
  );
}

export default function RecommendationTable({ recommendations }: { recommendations: ProfessionalRecommendation[] }) {
  return (
    <div className="result-section" style={{ overflowX: 'auto' }}>
      <h3>🛠️ Recommendations (Fastest Payback First)</h3>
      {recommendations.length === 0 ? (
        <p style={{ color: '#718096', fontSize: '0.875rem' }}>
          No upgrades clear their savings thresholds for this home.
        </p>
      ) : (
        <table style={{ width: '100%', borderCollapse: 'collapse', fontSize: '0.85rem' }}>
          <thead>
            <tr style={{ background: '#f7fafc', borderBottom: '2px solid #e2e8f0' }}>
              <th style={{ padding: '8px', textAlign: 'left' }}>Measure</th>
              <th style={{ padding: '8px' }}>Priority</th>
              <th style={{ padding: '8px' }}>Cost</th>
              <th style={{ padding: '8px' }}>Savings</th>
              <th style={{ padding: '8px' }}>Payback</th>
              <th style={{ padding: '8px' }}>CO₂/yr</th>
            </tr>
          </thead>
          <tbody>
            {recommendations.map(rec => (
              <RecommendationRow key={rec.id} rec={rec} />
            ))}
          </tbody>
        </table>
      )}
      <p style={{ fontSize: '0.75rem', color: '#a0aec0', marginTop: '0.5rem' }}>
        Click any row for steps, incentives and contractor guidance.
      </p>
    </div>
  );
}
