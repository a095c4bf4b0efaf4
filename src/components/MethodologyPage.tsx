import { ASSUMPTION_CATALOG } from '../engine/assumptions.catalog';
import { BENCHMARK_EUI } from '../engine/ReportAssembler';

export default function MethodologyPage({ onBack }: { onBack: () => void }) {
  return (
    <div className="governance-page">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">Methodology</span>
      </div>

      <div className="governance-content">
        <h1>Audit Methodology</h1>
        <p className="governance-lead">
          Every figure is modelled from the survey and a predicted usage breakdown, never measured.
        </p>

        <h2>1. Savings</h2>
        <ul>
          <li>Insulation: area × heating degree days ÷ (R + 0.1), old R-value minus new, capped at the heating load</li>
          <li>Equipment upgrades: delivered load ÷ old efficiency − delivered load ÷ new efficiency</li>
          <li>Savings are priced at the fuel the measure displaces; whole-home costs use a 60/40 gas/electric blend</li>
          <li>Whole-home carbon counts the total once as electricity and once as gas</li>
          <li>A measure is only recommended when its annual savings clear a per-category minimum</li>
        </ul>

        <h2>2. Financials</h2>
        <ul>
          <li>Cost range of ±20% around the estimate; 15% of cost assumed recoverable through rebates</li>
          <li>Simple payback = cost ÷ annual savings; ROI over a 10-year horizon</li>
          <li>Lifetime savings discounted at 3% over the measure's service life</li>
          <li>Recommendations are ranked fastest payback first</li>
        </ul>

        <h2>3. Energy Score</h2>
        <ul>
          <li>EUI (kBTU per sq ft per year) compared with the regional benchmark below</li>
          <li>Score falls by 50 points for every full benchmark above half of it, clamped to 0–100</li>
          <li>Projected grades after upgrades use a coarser scale: A+, A-, B+, B, with C+ below 60</li>
        </ul>
        <table style={{ borderCollapse: 'collapse', fontSize: '0.85rem', marginBottom: '1rem' }}>
          <tbody>
            {Object.entries(BENCHMARK_EUI).map(([region, eui]) => (
              <tr key={region}>
                <td style={{ padding: '2px 16px 2px 0' }}>{region}</td>
                <td>{eui} kBTU/sq ft</td>
              </tr>
            ))}
          </tbody>
        </table>

        <h2>4. Assumptions When Answers Are Missing</h2>
        <ul>
          {Object.entries(ASSUMPTION_CATALOG).map(([id, entry]) => (
            <li key={id}><strong>{entry.title}.</strong> {entry.detail}</li>
          ))}
        </ul>
      </div>
    </div>
  );
}
