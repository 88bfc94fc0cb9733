// Detection report rendering (table, json, yaml).

import * as yaml from 'js-yaml';
import { rankCandidates } from './catalog';
import { banner, bulletList, statusLine } from './format';
import { DetectionAttempt, DetectionOutcome } from './types';

export type ReportFormat = 'table' | 'json' | 'yaml';
export const REPORT_FORMATS: readonly ReportFormat[] = ['table', 'json', 'yaml'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(f => f === value);
}

export const MANUAL_STEPS = [
  'Check dmesg: dmesg | grep -i brcm',
  'Check firmware: ls /lib/firmware/brcm/',
  'Check lspci: lspci | grep -i network',
  'Compare the chip against the supported device list'
];

export const NEXT_STEPS = [
  'Navigate to the recommended patch directory',
  'Run: source setup_env.sh',
  'Run: make',
  'Run: make install-firmware'
];

export interface ReportData {
  detected: boolean;
  strategy?: string;
  confidence?: string;
  chips: {
    chipId: string;
    displayName: string;
    evidence: string;
    recommendations: { versionId: string; path: string; rank: number; note: string }[];
  }[];
  attempts: {
    strategy: string;
    label: string;
    outcome: 'matched' | 'declined';
    reason?: string;
    details: string[];
  }[];
  manualSteps?: string[];
  nextSteps?: string[];
}

export function buildReportData(outcome: DetectionOutcome): ReportData {
  const result = outcome.result;
  const data: ReportData = {
    detected: !!result,
    chips: (result?.matches || []).map(m => ({
      chipId: m.profile.chipId,
      displayName: m.profile.displayName,
      evidence: m.evidence,
      recommendations: rankCandidates(m.profile).map(c => ({ versionId: c.versionId, path: c.relativePatchPath, rank: c.rank, note: c.note }))
    })),
    // reason is left out rather than undefined: yaml.dump rejects undefined values
    attempts: outcome.attempts.map((a): ReportData['attempts'][number] => ({
      strategy: a.strategy,
      label: a.label,
      outcome: a.result ? 'matched' : 'declined',
      ...(a.declinedReason ? { reason: a.declinedReason } : {}),
      details: a.details
    }))
  };
  if (result) {
    data.strategy = result.strategy;
    data.confidence = result.confidence;
    data.nextSteps = NEXT_STEPS;
  } else {
    data.manualSteps = MANUAL_STEPS;
  }
  return data;
}

function renderAttempt(index: number, attempt: DetectionAttempt): string[] {
  const lines = ['', `[${index + 1}] ${attempt.label}`];
  lines.push(...attempt.details.map(d => `   ${d}`));
  if (!attempt.result) {
    lines.push(`   ${statusLine('warning', `Declined: ${attempt.declinedReason || 'no signal'}`)}`);
    return lines;
  }
  const suffix = attempt.result.confidence === 'likely' ? ' (likely)' : '';
  for (const match of attempt.result.matches) {
    lines.push(`   ${statusLine('success', `Chip: ${match.profile.chipId}${suffix} - ${match.profile.displayName}`)}`);
  }
  return lines;
}

export function renderTable(outcome: DetectionOutcome): string {
  const lines = [...banner('BROADCOM WIFI CHIP DETECTION')];
  outcome.attempts.forEach((attempt, i) => lines.push(...renderAttempt(i, attempt)));
  lines.push('', '-'.repeat(60));

  const result = outcome.result;
  if (!result) {
    lines.push(statusLine('warning', 'Could not automatically detect device'), '');
    lines.push(statusLine('info', 'Manual detection steps:'));
    lines.push(...MANUAL_STEPS.map((s, i) => `  ${i + 1}. ${s}`));
    return lines.join('\n');
  }

  if (result.confidence === 'likely') {
    lines.push(statusLine('warning', 'Best-effort guess: confirm the chip before building patches'));
  }
  if (result.matches.length > 1) {
    lines.push(statusLine('warning', `${result.matches.length} different chips matched; pick the one on this board`));
  }
  for (const match of result.matches) {
    lines.push('', statusLine('info', `Recommended firmware patches for ${match.profile.chipId}:`));
    lines.push(...bulletList(rankCandidates(match.profile).map(c => (c.note ? `${c.relativePatchPath} (${c.note})` : c.relativePatchPath))));
  }
  lines.push('', 'Next steps:');
  lines.push(...NEXT_STEPS.map((s, i) => `${i + 1}. ${s}`));
  return lines.join('\n');
}

export function renderDetectionReport(outcome: DetectionOutcome, format: ReportFormat = 'table'): string {
  if (format === 'json') return JSON.stringify(buildReportData(outcome), null, 2);
  if (format === 'yaml') return yaml.dump(buildReportData(outcome));
  return renderTable(outcome);
}
