import { SORT_LOCALE } from '../services/gradebook';
import { StudentReport, StudentSummary } from '../types';

const NAME_WIDTH = 20;

export function formatAverage(average: number): string {
  return average.toFixed(2);
}

export function formatReport(report: StudentReport): string[] {
  const subjects = Object.entries(report.subjects).sort(([a], [b]) => a.localeCompare(b, SORT_LOCALE));

  return [
    '--- Report Card ---',
    `Name: ${report.name}`,
    ...(subjects.length > 0
      ? subjects.map(([subject, score]) => `  ${subject}: ${score}`)
      : ['  (no subjects entered)']),
    `Average: ${formatAverage(report.average)}`,
    `Grade: ${report.grade}`,
    '-------------------',
  ];
}

export function formatSummaryTable(rows: StudentSummary[]): string[] {
  if (rows.length === 0) return ['No students yet.'];

  const header = `${'Name'.padEnd(NAME_WIDTH)} | Subj | Avg    | Grade`;
  return [
    header,
    '-'.repeat(header.length),
    ...rows.map((row) => [
      row.name.padEnd(NAME_WIDTH),
      String(row.subject_count).padStart(4),
      formatAverage(row.average).padStart(6),
      row.grade,
    ].join(' | ')),
  ];
}
