// Plain-text output for the terminal

import {
  AI_MATURITY_LABELS,
  GOAL_LABELS,
  ORGANIZATION_SIZE_LABELS,
  PRIORITY_LABELS
} from '../../models/types.js';
import { RoadmapResult, RoadmapSummary } from '../../models/roadmap.js';

export function formatRoadmapText(result: RoadmapResult, includeChart = true): string {
  const { request } = result;
  const lines = [
    `Roadmap #${result.id}: ${request.organizationName}`,
    `  Size:     ${ORGANIZATION_SIZE_LABELS[request.organizationSize]}`,
    `  Industry: ${request.industry}`,
    `  Maturity: ${AI_MATURITY_LABELS[request.aiMaturity]}`,
    `  Goals:    ${request.goals.map(goal => GOAL_LABELS[goal]).join(', ')}`,
    `  Created:  ${result.createdAt.toISOString()}`
  ];

  result.phases.forEach((phase, index) => {
    lines.push('', `Phase ${index + 1}: ${phase.label} (${phase.timeframe})`);
    for (const initiative of phase.initiatives) {
      lines.push(`  - [${PRIORITY_LABELS[initiative.priority]}] ${initiative.title}`);
      if (initiative.description) {
        lines.push(`      ${initiative.description}`);
      }
    }
  });

  if (includeChart) {
    lines.push('', 'Timeline:', result.chart);
  }
  return lines.join('\n');
}

export function formatSummaryTable(summaries: RoadmapSummary[]): string {
  if (summaries.length === 0) {
    return 'No roadmaps stored yet.';
  }
  const rows = summaries.map(summary =>
    `${String(summary.id).padEnd(6)} ${summary.createdAt.toISOString().slice(0, 10)}  ${summary.organizationName} (${summary.industry})`
  );
  return [`${'ID'.padEnd(6)} ${'Created'.padEnd(10)}  Organization`, ...rows].join('\n');
}
