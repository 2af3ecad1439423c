// Export command - write a stored roadmap to a PDF or HTML file

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { ValidationError } from '../../core/errors.js';
import { validateRoadmapId } from '../../core/validation.js';
import { renderPage } from '../../services/rendering/html-renderer.js';
import { renderPdf } from '../../services/rendering/pdf-renderer.js';
import { GlobalOptions, withServices } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

const EXPORT_FORMATS = ['pdf', 'html'] as const;
type ExportFormat = typeof EXPORT_FORMATS[number];

function parseFormat(value: string): ExportFormat {
  const format = EXPORT_FORMATS.find(f => f === value.toLowerCase());
  if (!format) {
    throw new ValidationError(`Unknown format: ${value} (expected ${EXPORT_FORMATS.join(' or ')})`, 'format');
  }
  return format;
}

export const exportCommand = new Command('export')
  .description('Export a stored roadmap')
  .argument('<id>', 'Roadmap ID')
  .argument('[output]', 'Output file path (default: roadmap-<id>.<format>)')
  .option('-f, --format <format>', 'Export format (pdf, html)', 'pdf')
  .action(withErrorHandling(async (id: string, output: string | undefined, options: { format: string }, command: Command) => {
    const roadmapId = validateRoadmapId(id);
    const format = parseFormat(options.format);

    await withServices(command.optsWithGlobals<GlobalOptions>(), async ({ store }) => {
      const result = await store.get(roadmapId);
      const content = format === 'pdf' ? await renderPdf(result) : renderPage(result);
      const target = output ?? `roadmap-${result.id}.${format}`;

      await fs.writeFile(target, content);
      success(`Exported roadmap #${result.id} to ${target}`);
    });
  }));
