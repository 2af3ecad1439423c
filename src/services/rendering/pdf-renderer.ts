/**
 * PDF renderer
 *
 * Lays a roadmap out as an ordered list of blocks, then draws the blocks on
 * fixed A4 pages with pdfkit. The Gantt chart is printed as its source text.
 * Text is set in embedded Unicode fonts, never the built-in WinAnsi ones.
 */

import PDFDocument from 'pdfkit';
import {
  AI_MATURITY_LABELS,
  GOAL_LABELS,
  ORGANIZATION_SIZE_LABELS,
  Priority,
  PRIORITY_LABELS
} from '../../models/types.js';
import { RoadmapResult } from '../../models/roadmap.js';
import { FontFace, FontStack, loadFontStack, splitRuns } from './fonts.js';

export type PdfBlock =
  | { kind: 'title'; text: string }
  | { kind: 'meta'; text: string }
  | { kind: 'phase'; text: string }
  | { kind: 'initiative'; title: string; priority: Priority; description: string }
  | { kind: 'heading'; text: string }
  | { kind: 'chart'; text: string };

const PAGE_MARGIN = 56;

const PRIORITY_COLORS: Record<Priority, string> = {
  high: '#991b1b',
  medium: '#92400e',
  low: '#166534'
};

export function pdfTitle(result: RoadmapResult): string {
  return `AI Roadmap: ${result.request.organizationName}`;
}

/**
 * Flattens a roadmap into the blocks the PDF writer draws, in reading order
 */
export function buildPdfLayout(result: RoadmapResult): PdfBlock[] {
  const { request } = result;
  const blocks: PdfBlock[] = [
    { kind: 'title', text: pdfTitle(result) },
    { kind: 'meta', text: `Organization size: ${ORGANIZATION_SIZE_LABELS[request.organizationSize]}` },
    { kind: 'meta', text: `Industry: ${request.industry}` },
    { kind: 'meta', text: `AI maturity: ${AI_MATURITY_LABELS[request.aiMaturity]}` },
    { kind: 'meta', text: `Goals: ${request.goals.map(goal => GOAL_LABELS[goal]).join(', ')}` },
    { kind: 'meta', text: `Generated: ${result.createdAt.toISOString().slice(0, 10)}` }
  ];

  result.phases.forEach((phase, index) => {
    blocks.push({ kind: 'phase', text: `Phase ${index + 1}: ${phase.label} (${phase.timeframe})` });
    for (const initiative of phase.initiatives) {
      blocks.push({
        kind: 'initiative',
        title: initiative.title,
        priority: initiative.priority,
        description: initiative.description
      });
    }
  });

  blocks.push({ kind: 'heading', text: 'Timeline' });
  blocks.push({ kind: 'chart', text: result.chart });
  return blocks;
}

type TextOptions = PDFKit.Mixins.TextOptions;

/**
 * Writes text in as many font runs as its characters need.
 * With `continued`, the next call carries on the same line.
 */
function writeText(
  doc: PDFKit.PDFDocument,
  registered: Set<string>,
  faces: FontFace[],
  text: string,
  options: TextOptions = {}
): void {
  const runs = splitRuns(text, faces);
  runs.forEach((run, index) => {
    if (!registered.has(run.face.name)) {
      doc.registerFont(run.face.name, run.face.data);
      registered.add(run.face.name);
    }
    const last = index === runs.length - 1;
    doc.font(run.face.name).text(run.text, { ...options, continued: last ? options.continued ?? false : true });
  });
}

function drawBlock(doc: PDFKit.PDFDocument, fonts: FontStack, registered: Set<string>, block: PdfBlock): void {
  const write = (faces: FontFace[], text: string, options?: TextOptions): void =>
    writeText(doc, registered, faces, text, options);

  switch (block.kind) {
    case 'title':
      doc.fontSize(20).fillColor('#111827');
      write(fonts.bold, block.text);
      doc.moveDown(0.5);
      break;
    case 'meta':
      doc.fontSize(10).fillColor('#4b5563');
      write(fonts.regular, block.text);
      break;
    case 'phase':
    case 'heading':
      doc.moveDown(1);
      doc.fontSize(14).fillColor('#111827');
      write(fonts.bold, block.text);
      doc.moveDown(0.3);
      break;
    case 'initiative':
      doc.fontSize(11).fillColor('#111827');
      write(fonts.bold, block.title, { continued: true });
      doc.fillColor(PRIORITY_COLORS[block.priority]);
      write(fonts.regular, `  [${PRIORITY_LABELS[block.priority]}]`);
      if (block.description) {
        doc.fontSize(10).fillColor('#374151');
        write(fonts.regular, block.description);
      }
      doc.moveDown(0.4);
      break;
    case 'chart':
      doc.fontSize(8).fillColor('#111827');
      write(fonts.mono, block.text, { lineBreak: true });
      break;
  }
}

/**
 * Renders a roadmap as an A4 PDF document
 */
export function renderPdf(result: RoadmapResult): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const fonts = loadFontStack();
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: PAGE_MARGIN, bottom: PAGE_MARGIN, left: PAGE_MARGIN, right: PAGE_MARGIN },
      info: {
        Title: pdfTitle(result),
        CreationDate: result.createdAt
      }
    });

    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const registered = new Set<string>();
    for (const block of buildPdfLayout(result)) {
      drawBlock(doc, fonts, registered, block);
    }
    doc.end();
  });
}
