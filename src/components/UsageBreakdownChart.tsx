import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
} from 'recharts';
import type { EndUseKey, UsageBreakdownSectionV1 } from '../contracts/AuditReportV1';

const END_USE_LABELS: Record<EndUseKey, string> = {
  heating: 'Heating',
  cooling: 'Cooling',
  waterHeating: 'Water',
  appliances: 'Appliances',
  lighting: 'Lighting',
  other: 'Other',
};

const END_USE_ORDER: EndUseKey[] = ['heating', 'cooling', 'waterHeating', 'appliances', 'lighting', 'other'];

export default function UsageBreakdownChart({ breakdown }: { breakdown: UsageBreakdownSectionV1 }) {
  const data = END_USE_ORDER.map((key) => ({
    name: END_USE_LABELS[key],
    'Annual cost ($)': Math.round(breakdown[key].cost),
    share: breakdown[key].pct,
  }));

  return (
    <div className="result-section">
      <h3>📊 Where the Energy Goes</h3>
      <div style={{ width: '100%', height: 240 }}>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
            <XAxis dataKey="name" tick={{ fontSize: 10 }} />
            <YAxis tick={{ fontSize: 10 }} />
            <Tooltip
              contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
              formatter={(value: number | undefined, name: string | undefined) => [
                value !== undefined ? `$${value.toLocaleString('en-US')}` : '',
                name ?? '',
              ]}
            />
            <Bar dataKey="Annual cost ($)" fill="#3182ce" radius={[4, 4, 0, 0]} />
          </BarChart>
        </ResponsiveContainer>
      </div>
      <p style={{ fontSize: '0.75rem', color: '#a0aec0', margin: '0.25rem 0 0' }}>
        {data.map((d) => `${d.name} ${d.share.toFixed(0)}%`).join(' · ')}
      </p>
    </div>
  );
}
