/**
 * Markdown report builder for the pull request comment
 */

import type { MetricsSnapshot, MetricValue, QualityGateStatus } from './types.js';

/**
 * Hidden token that identifies comments written by this action.
 * Invisible in rendered markdown, searchable in the raw body.
 */
export const COMMENT_MARKER = '<!-- sonar-pr-summary -->';

export const NOT_AVAILABLE = 'not available';

/**
 * Get human-readable label for a quality gate status
 */
export function formatQualityGate(status: QualityGateStatus): string {
  switch (status) {
    case 'OK': return '✅ Passed';
    case 'WARN': return '⚠️ Warning';
    case 'ERROR': return '❌ Failed';
    case 'NONE': return '➖ Not computed';
  }
}

function formatMetricValue(value: MetricValue): string {
  return value ?? NOT_AVAILABLE;
}

/**
 * Render a snapshot as the comment body.
 *
 * Pure: the same snapshot always yields the same bytes, which is what lets
 * the publisher skip writes when nothing changed. Rows keep snapshot order.
 */
export function renderReport(snapshot: MetricsSnapshot): string {
  const lines = [`## 📊 SonarQube metrics for [${snapshot.projectKey}](${snapshot.dashboardUrl})`, ''];

  if (snapshot.qualityGate) {
    lines.push(`**Quality gate:** ${formatQualityGate(snapshot.qualityGate)}`, '');
  }

  for (const measure of snapshot.measures) {
    lines.push(`- ${measure.key}: ${formatMetricValue(measure.value)}`);
  }

  lines.push('', COMMENT_MARKER);
  return lines.join('\n');
}
