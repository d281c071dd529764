import type { AlertDescription, AlertRow } from '../alerts/types.js';
import { fitColumn } from '../utils/format.js';

const COLUMNS: Array<{ title: string; width: number; value: (row: AlertRow) => string }> = [
  { title: 'PRIO', width: 6, value: (row) => row.priority },
  { title: 'STATUS', width: 14, value: (row) => row.status },
  { title: 'AGE', width: 5, value: (row) => row.age },
  { title: 'ACKED BY', width: 18, value: (row) => row.acknowledgedBy },
  { title: 'TAGS', width: 10, value: (row) => row.tagsDisplay },
];

/** Plain-text table for `jsm-alerts list`. */
export function formatRows(rows: AlertRow[]): string {
  const header = [...COLUMNS.map((column) => fitColumn(column.title, column.width)), 'MESSAGE'].join(' ');
  const lines = rows.map((row) =>
    [...COLUMNS.map((column) => fitColumn(column.value(row), column.width)), row.message].join(' '),
  );
  return [header, ...lines].join('\n');
}

export function formatDescription(details: AlertDescription): string {
  return [
    `Alert ${details.alertId}: ${details.title}`,
    `Prio ${details.priority}  |  Age ${details.age}  |  Acked By ${details.acknowledgedBy}  |  Tags ${details.tagsDisplay}`,
    `Status: ${details.status.toUpperCase()}`,
    '',
    details.description,
  ].join('\n');
}
