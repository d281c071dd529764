import { describe, it, expect } from 'vitest';
import { formatDescription, formatRows } from '../../../src/cli/output.js';

describe('formatRows', () => {
  it('should print a header and one fixed-width line per alert', () => {
    const output = formatRows([
      {
        id: 'a-1',
        priority: 'P1',
        status: 'open',
        age: '2h',
        acknowledgedBy: '-',
        tagsDisplay: 'payments, prod',
        message: 'Payments API 5xx',
      },
    ]);

    expect(output.split('\n')).toEqual([
      'PRIO   STATUS         AGE   ACKED BY           TAGS       MESSAGE',
      'P1     open           2h    -                  payment... Payments API 5xx',
    ]);
  });

  it('should print only the header without alerts', () => {
    expect(formatRows([]).split('\n')).toHaveLength(1);
  });
});

describe('formatDescription', () => {
  it('should print the detail block', () => {
    expect(
      formatDescription({
        alertId: 'a-1',
        title: 'Payments API 5xx',
        description: 'Error rate above 5%',
        status: 'acknowledged',
        priority: 'P1',
        age: '2h',
        acknowledgedBy: 'jane',
        tagsDisplay: 'payments',
      })
    ).toBe(
      [
        'Alert a-1: Payments API 5xx',
        'Prio P1  |  Age 2h  |  Acked By jane  |  Tags payments',
        'Status: ACKNOWLEDGED',
        '',
        'Error rate above 5%',
      ].join('\n')
    );
  });
});
