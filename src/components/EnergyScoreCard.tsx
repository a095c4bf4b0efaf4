/**
 * EnergyScoreCard
 *
 * Headline score, grade and benchmark position for one audited home, with
 * the projected grade after all recommendations.
 */
import type {
  BenchmarkComparisonV1,
  EnergyScoreV1,
  Grade,
  ProjectedGrade,
  ProjectedUsageV1,
} from '../contracts/AuditReportV1';
import { gradeColour } from './reportFormat';

interface Props {
  score: EnergyScoreV1;
  benchmark: BenchmarkComparisonV1;
  eui: number;
  projected: ProjectedUsageV1;
}

function GradeBadge({ grade, size }: { grade: Grade | ProjectedGrade; size: number }) {
  return (
    <div style={{
      width: size, height: size, borderRadius: '50%',
      background: gradeColour(grade), color: '#fff',
      display: 'flex', alignItems: 'center', justifyContent: 'center',
      fontSize: size * 0.4, fontWeight: 800,
    }}>
      {grade}
    </div>
  );
}

export default function EnergyScoreCard({ score, benchmark, eui, projected }: Props) {
  const after = projected.afterAllRecommendations;

  return (
    <div className="result-section">
      <h3>⚡ Energy Score</h3>
      <div style={{ display: 'flex', alignItems: 'center', gap: '1.5rem', flexWrap: 'wrap' }}>
        <GradeBadge grade={score.grade} size={88} />
        <div style={{ flex: 1, minWidth: 180 }}>
          <div style={{ fontSize: '2rem', fontWeight: 800, color: '#2d3748' }}>
            {score.overall}<span style={{ fontSize: '1rem', color: '#718096' }}>/100</span>
          </div>
          <div style={{ color: '#4a5568', fontWeight: 600 }}>{score.label}</div>
          <div style={{ fontSize: '0.8rem', color: '#718096', marginTop: 4 }}>
            EUI {eui.toFixed(1)} vs regional benchmark {benchmark.targetEui.toFixed(1)} kBTU/sq ft
            &nbsp;·&nbsp; {benchmark.yourRank}
          </div>
        </div>
        <div style={{ textAlign: 'center' }}>
          <div style={{ fontSize: '0.72rem', color: '#718096', marginBottom: 4 }}>After upgrades</div>
          <GradeBadge grade={after.grade} size={56} />
          <div style={{ fontSize: '0.75rem', color: '#276749', marginTop: 4 }}>
            −{after.reductionPct.toFixed(0)}% energy
          </div>
        </div>
      </div>
    </div>
  );
}
