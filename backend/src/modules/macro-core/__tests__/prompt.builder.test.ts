import { describe, it, expect } from 'vitest';
import type { ChangeSet } from '../contracts/macro.contracts.js';
import type { SeriesContextWindow } from '../synthesis/context.window.js';
import { buildSynthesisPrompt, SYSTEM_PROMPT } from '../synthesis/prompt.builder.js';
import { seriesOf, testCatalog } from './fixtures.js';

const catalog = testCatalog();

const changeSet: ChangeSet = {
  id: 'cs-9',
  createdAt: new Date('2024-02-15T12:00:00.000Z'),
  entries: [
    { seriesKey: 'CPIAUCSL', period: '2023-12', oldValue: 103, newValue: 103.2, changeKind: 'revised', revision: 1 },
    { seriesKey: 'CPIAUCSL', period: '2024-01', newValue: 104, changeKind: 'new', revision: 0 },
  ],
  unchangedCount: 4,
  skipped: [],
};

function cpiWindow(overrides: Partial<SeriesContextWindow> = {}): SeriesContextWindow {
  return {
    series: seriesOf(catalog, 'CPIAUCSL'),
    entries: changeSet.entries,
    olderEntries: [],
    points: [
      { period: '2023-12', value: 103.2, revision: 1, previousValue: 103 },
      { period: '2024-01', value: 104, revision: 0 },
    ],
    earlierRevisions: [],
    ...overrides,
  };
}

describe('buildSynthesisPrompt', () => {
  it('should use the fixed analyst system prompt', () => {
    const prompt = buildSynthesisPrompt(changeSet, [cpiWindow()]);

    expect(prompt.system).toBe(SYSTEM_PROMPT);
  });

  it('should render changes, history and units for each series', () => {
    const prompt = buildSynthesisPrompt(changeSet, [cpiWindow()]);

    expect(prompt.user.split('\n')).toEqual([
      'Change-set cs-9 (2024-02-15T12:00:00.000Z): 1 new, 1 revised observations across 1 series.',
      '',
      '### CPIAUCSL - CPI (Headline)',
      'cadence: monthly; unit: index 1982-84=100; scale: units; source: FRED',
      '',
      'Changes:',
      '- 2023-12: revised 103 -> 103.2 (revision 1)',
      '- 2024-01: new 104',
      '',
      'History (period, value, value before latest revision):',
      '2023-12, 103.2, 103',
      '2024-01, 104,',
      '',
      'Write the narrative now.',
    ]);
  });

  it('should list earlier revisions when there are any', () => {
    const window = cpiWindow({
      earlierRevisions: [
        { period: '2023-10', value: 101.5, previousValue: 101, revision: 1, revisedAt: new Date('2024-02-13T13:30:00.000Z') },
      ],
    });

    const lines = buildSynthesisPrompt(changeSet, [window]).user.split('\n');

    expect(lines.slice(12, 16)).toEqual([
      '',
      'Earlier periods revised recently:',
      '- 2023-10: 101 -> 101.5 (revision 1)',
      '',
    ]);
  });

  it('should summarize changes older than the window in one line', () => {
    const window = cpiWindow({
      olderEntries: [
        { seriesKey: 'CPIAUCSL', period: '1990-01', newValue: 127.5, changeKind: 'new', revision: 0 },
        { seriesKey: 'CPIAUCSL', period: '2001-06', oldValue: 176.9, newValue: 177.1, changeKind: 'revised', revision: 1 },
        { seriesKey: 'CPIAUCSL', period: '2023-11', newValue: 102, changeKind: 'new', revision: 0 },
      ],
    });

    const lines = buildSynthesisPrompt(changeSet, [window]).user.split('\n');

    expect(lines.slice(5, 9)).toEqual([
      'Changes:',
      '- 3 earlier changes (2 new, 1 revised) from 1990-01 (127.5) to 2023-11 (102)',
      '- 2023-12: revised 103 -> 103.2 (revision 1)',
      '- 2024-01: new 104',
    ]);
  });

  it('should trim floating-point noise from values', () => {
    const window = cpiWindow({ points: [{ period: '2024-01', value: 0.1 + 0.2, revision: 0 }] });

    const lines = buildSynthesisPrompt(changeSet, [window]).user.split('\n');

    expect(lines).toContain('2024-01, 0.3,');
  });

  it('should separate multiple series with a blank line', () => {
    const gdp: SeriesContextWindow = {
      series: seriesOf(catalog, 'GDP'),
      entries: [{ seriesKey: 'GDP', period: '2023-Q4', newValue: 27944.6, changeKind: 'new', revision: 0 }],
      olderEntries: [],
      points: [{ period: '2023-Q4', value: 27944.6, revision: 0 }],
      earlierRevisions: [],
    };
    const merged: ChangeSet = { ...changeSet, entries: [...changeSet.entries, ...gdp.entries] };

    const lines = buildSynthesisPrompt(merged, [cpiWindow(), gdp]).user.split('\n');

    expect(lines[0]).toBe('Change-set cs-9 (2024-02-15T12:00:00.000Z): 2 new, 1 revised observations across 2 series.');
    expect(lines.slice(12, 15)).toEqual(['', '### GDP - Gross Domestic Product', 'cadence: quarterly; unit: dollars (SAAR); scale: billions; source: FRED']);
    expect(lines[lines.length - 1]).toBe('Write the narrative now.');
  });
});
