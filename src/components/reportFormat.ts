import type { Grade, Priority, ProjectedGrade } from '../contracts/AuditReportV1';

// ─── Colours ──────────────────────────────────────────────────────────────────

const GRADE_COLOURS: Record<Grade | ProjectedGrade, string> = {
  'A+': '#276749',
  A: '#38a169',
  'A-': '#48bb78',
  'B+': '#68d391',
  B: '#d69e2e',
  'C+': '#ed8936',
  C: '#dd6b20',
  D: '#e53e3e',
  F: '#c53030',
};

export function gradeColour(grade: Grade | ProjectedGrade): string {
  return GRADE_COLOURS[grade];
}

export function priorityBadge(priority: Priority): { label: string; color: string; bg: string } {
  if (priority === 'High') return { label: 'HIGH', color: '#c53030', bg: '#fff5f5' };
  if (priority === 'Medium') return { label: 'MEDIUM', color: '#c05621', bg: '#fffaf0' };
  return { label: 'LOW', color: '#2c5282', bg: '#ebf8ff' };
}

// ─── Text ─────────────────────────────────────────────────────────────────────

export function formatUsd(n: number): string {
  return `$${Math.round(n).toLocaleString('en-US')}`;
}

export function formatKbtu(n: number): string {
  return `${Math.round(n).toLocaleString('en-US')} kBTU`;
}

/** "Immediate" for free measures, "Never" when savings do not cover the cost. */
export function formatPayback(years: number): string {
  if (!Number.isFinite(years)) return 'Never';
  if (years <= 0) return 'Immediate';
  return `${years.toFixed(1)} yrs`;
}
