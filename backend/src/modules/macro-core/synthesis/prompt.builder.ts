/**
 * Synthesis prompt: what changed, the history around it, and how to read
 * each series (unit, scale, cadence).
 */

import type { ChangeSet, ChangeSetEntry } from '../contracts/macro.contracts.js';
import type { SeriesContextWindow } from './context.window.js';

export const SYSTEM_PROMPT = [
  'You are a macroeconomic analyst writing for an informed general audience.',
  'You receive newly published and revised data points together with their recent history.',
  'Explain what changed, how it compares with the recent trend, and call out revisions explicitly.',
  'Use only the numbers provided. Do not invent figures, forecasts or sources.',
  'Answer in plain prose, at most four short paragraphs.',
].join(' ');

export interface SynthesisPrompt {
  system: string;
  user: string;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(10)));
}

function describeEntry(entry: ChangeSetEntry): string {
  if (entry.changeKind === 'revised' && entry.oldValue !== undefined) {
    return `${entry.period}: revised ${formatNumber(entry.oldValue)} -> ${formatNumber(entry.newValue)} (revision ${entry.revision})`;
  }
  return `${entry.period}: new ${formatNumber(entry.newValue)}`;
}

function summarizeOlder(entries: readonly ChangeSetEntry[]): string[] {
  if (entries.length === 0) return [];
  const first = entries[0];
  const last = entries[entries.length - 1];
  const revised = entries.filter((e) => e.changeKind === 'revised').length;
  return [
    `- ${entries.length} earlier changes (${entries.length - revised} new, ${revised} revised) from ${first.period} (${formatNumber(first.newValue)}) to ${last.period} (${formatNumber(last.newValue)})`,
  ];
}

function renderWindow(w: SeriesContextWindow): string {
  const s = w.series;
  const lines: string[] = [
    `### ${s.key} - ${s.displayName}`,
    `cadence: ${s.cadence}; unit: ${s.unit}; scale: ${s.scale}; source: ${s.provider}`,
    '',
    'Changes:',
    ...summarizeOlder(w.olderEntries),
    ...w.entries.map((e) => `- ${describeEntry(e)}`),
    '',
    'History (period, value, value before latest revision):',
    ...w.points.map((p) =>
      p.previousValue !== undefined
        ? `${p.period}, ${formatNumber(p.value)}, ${formatNumber(p.previousValue)}`
        : `${p.period}, ${formatNumber(p.value)},`,
    ),
  ];

  if (w.earlierRevisions.length > 0) {
    lines.push('', 'Earlier periods revised recently:');
    for (const r of w.earlierRevisions) {
      lines.push(`- ${r.period}: ${formatNumber(r.previousValue)} -> ${formatNumber(r.value)} (revision ${r.revision})`);
    }
  }
  return lines.join('\n');
}

export function buildSynthesisPrompt(changeSet: ChangeSet, windows: readonly SeriesContextWindow[]): SynthesisPrompt {
  const newCount = changeSet.entries.filter((e) => e.changeKind === 'new').length;
  const revisedCount = changeSet.entries.length - newCount;

  const user = [
    `Change-set ${changeSet.id} (${changeSet.createdAt.toISOString()}): ${newCount} new, ${revisedCount} revised observations across ${windows.length} series.`,
    '',
    ...windows.map(renderWindow).flatMap((block) => [block, '']),
    'Write the narrative now.',
  ].join('\n');

  return { system: SYSTEM_PROMPT, user };
}
