// Tests for terminal output formatting

import { describe, it, expect } from 'vitest';
import { formatRoadmapText, formatSummaryTable } from './format.js';
import { acmeDraft } from '../../testing/fixtures.js';

describe('formatRoadmapText', () => {
  it('should list phases and initiatives in stored order', () => {
    const text = formatRoadmapText({ ...acmeDraft(), id: 3 }, false);

    expect(text).toBe([
      'Roadmap #3: Acme',
      '  Size:     Medium (51-500 employees)',
      '  Industry: Retail',
      '  Maturity: Piloting - running first projects',
      '  Goals:    Process automation, Operational efficiency',
      '  Created:  2025-03-01T10:00:00.000Z',
      '',
      'Phase 1: Short-term (0-6 months)',
      '  - [High] Short initiative',
      '      Automate store inventory counts',
      '',
      'Phase 2: Medium-term (6-12 months)',
      '  - [Medium] Medium initiative',
      '      Forecast demand per region',
      '',
      'Phase 3: Long-term (12-24 months)',
      '  - [Low] Long initiative',
      '      Personalize pricing'
    ].join('\n'));
  });

  it('should append the chart when asked', () => {
    const draft = acmeDraft();
    const text = formatRoadmapText({ ...draft, id: 3 });
    expect(text.endsWith(`\n\nTimeline:\n${draft.chart}`)).toBe(true);
  });
});

describe('formatSummaryTable', () => {
  it('should print a header and one row per roadmap', () => {
    const text = formatSummaryTable([
      { id: 12, organizationName: 'Acme', organizationSize: 'medium', industry: 'Retail', aiMaturity: 'piloting', createdAt: new Date('2025-03-01T10:00:00.000Z') }
    ]);

    expect(text).toBe('ID     Created     Organization\n12     2025-03-01  Acme (Retail)');
  });

  it('should say so when nothing is stored', () => {
    expect(formatSummaryTable([])).toBe('No roadmaps stored yet.');
  });
});
