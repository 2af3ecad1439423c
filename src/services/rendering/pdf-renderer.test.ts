// Tests for the PDF renderer

import { describe, it, expect } from 'vitest';
import { buildPdfLayout, renderPdf } from './pdf-renderer.js';
import { RoadmapResult } from '../../models/roadmap.js';
import { ACME_CHART, acmeDraft } from '../../testing/fixtures.js';
import { extractPdfText } from '../../testing/pdf-text.js';

function acmeResult(): RoadmapResult {
  return { ...acmeDraft(), id: 7 };
}

describe('buildPdfLayout', () => {
  it('should keep phases and initiatives in stored order', () => {
    const blocks = buildPdfLayout(acmeResult());
    const sequence = blocks.flatMap(block => {
      if (block.kind === 'phase') return [block.text];
      if (block.kind === 'initiative') return [block.title];
      return [];
    });

    expect(sequence).toEqual([
      'Phase 1: Short-term (0-6 months)',
      'Short initiative',
      'Phase 2: Medium-term (6-12 months)',
      'Medium initiative',
      'Phase 3: Long-term (12-24 months)',
      'Long initiative'
    ]);
  });

  it('should open with the title and organization details', () => {
    const blocks = buildPdfLayout(acmeResult());

    expect(blocks.slice(0, 6)).toEqual([
      { kind: 'title', text: 'AI Roadmap: Acme' },
      { kind: 'meta', text: 'Organization size: Medium (51-500 employees)' },
      { kind: 'meta', text: 'Industry: Retail' },
      { kind: 'meta', text: 'AI maturity: Piloting - running first projects' },
      { kind: 'meta', text: 'Goals: Process automation, Operational efficiency' },
      { kind: 'meta', text: 'Generated: 2025-03-01' }
    ]);
  });

  it('should end with the chart text verbatim', () => {
    const blocks = buildPdfLayout(acmeResult());
    expect(blocks[blocks.length - 1]).toEqual({ kind: 'chart', text: ACME_CHART });
  });

  it('should carry priorities onto initiative blocks', () => {
    const priorities = buildPdfLayout(acmeResult()).flatMap(block =>
      block.kind === 'initiative' ? [block.priority] : []
    );
    expect(priorities).toEqual(['high', 'medium', 'low']);
  });
});

describe('renderPdf', () => {
  it('should produce a PDF document', async () => {
    const pdf = await renderPdf(acmeResult());

    expect(Buffer.isBuffer(pdf)).toBe(true);
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('should name the document after the organization', async () => {
    const pdf = await renderPdf(acmeResult());
    expect(pdf.toString('latin1')).toContain('(AI Roadmap: Acme)');
  });

  it('should draw phases and initiatives in stored order', async () => {
    const result = acmeResult();
    result.phases[0].initiatives = [
      { title: 'Zeta pilot', description: '', priority: 'low' },
      { title: 'Alpha rollout', description: '', priority: 'high' }
    ];

    const text = extractPdfText(await renderPdf(result));
    const positions = ['Phase 1: Short-term', 'Zeta pilot', 'Alpha rollout', 'Phase 2: Medium-term', 'Medium initiative', 'Long initiative']
      .map(fragment => text.indexOf(fragment));

    expect(positions.every(position => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('should keep non-Latin names and titles readable', async () => {
    const result = acmeResult();
    result.request.organizationName = 'Tōkyō 株式会社';
    result.phases[0].initiatives[0].title = 'Cloud → Edge';

    const text = extractPdfText(await renderPdf(result));

    expect(text).toContain('AI Roadmap: Tōkyō 株式会社');
    expect(text).toContain('Cloud → Edge');
  });

  it('should print the chart source', async () => {
    const text = extractPdfText(await renderPdf(acmeResult()));
    expect(text).toContain('gantt');
  });
});
