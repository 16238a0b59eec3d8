import { PILLAR_KEYS, PillarScoreSet } from '../healthScore/healthScore.types';
import { PILLAR_DEFINITIONS } from '../healthScore/pillars';
import { formatReportDate } from '../reports/pdf.service';

export const CHART_CID = 'health-score-chart';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function reportSubject(suffix: string): string {
  return `Your Health Score Report - ${suffix}`;
}

export function reportBody(userName: string): string {
  return `Hello ${userName},\n\nThank you for using our Health Score service. Your health score report is attached.\n\nBest regards,\nThe Health Score Team`;
}

export function renderReportHtml(input: { userName: string; scores: PillarScoreSet; withChart: boolean; date?: Date }): string {
  const labels = new Map(PILLAR_DEFINITIONS.map((pillar) => [pillar.key, pillar.label]));
  const rows = PILLAR_KEYS.map(
    (key) => `<p>${escapeHtml(labels.get(key) ?? key)}: <strong>${input.scores.pillar(key)}</strong></p>`
  ).join('\n        ');

  return `
      <div style="font-family: Arial, sans-serif; line-height:1.6">
        <h2 style="color:#2c3e50">Your Health Score Report</h2>
        <p>User: ${escapeHtml(input.userName)}</p>
        <p>Date: ${formatReportDate(input.date ?? new Date())}</p>

        ${input.withChart ? `<div><img src="cid:${CHART_CID}" style="max-width:500px;width:100%;height:auto" alt="Health Score Chart" /></div>` : ''}

        <h3>Health Scores</h3>
        ${rows}
        <p>Overall Score: <strong>${input.scores.overall}</strong></p>

        <hr />

        <p style="font-size:12px;color:#888">
          This report was generated automatically. Please do not reply to this email.
        </p>
      </div>
    `;
}
