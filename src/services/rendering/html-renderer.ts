/**
 * HTML renderer
 *
 * Builds complete HTML documents for the submission form, the roadmap
 * listing and a single roadmap. The Gantt chart is drawn in the browser by
 * Mermaid; everything else is static markup.
 */

import {
  AI_MATURITY_LABELS,
  AI_MATURITY_LEVELS,
  GOAL_LABELS,
  GOALS,
  ORGANIZATION_SIZE_LABELS,
  ORGANIZATION_SIZES,
  PRIORITY_LABELS
} from '../../models/types.js';
import { Initiative, RoadmapPhase, RoadmapResult, RoadmapSummary } from '../../models/roadmap.js';

const MERMAID_SCRIPT = 'https://cdn.jsdelivr.net/npm/mermaid@10/dist/mermaid.min.js';

export type FlashCategory = 'error' | 'info';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

/**
 * Raw form values echoed back into the form after a failed submission
 */
export interface FormValues {
  organization_name?: string;
  organization_size?: string;
  industry?: string;
  ai_maturity?: string;
  goals?: string[];
}

export interface FormError {
  field?: string;
  message: string;
}

export interface FormPageOptions {
  values?: FormValues;
  error?: FormError;
  flash?: FlashMessage[];
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ') + ' UTC';
}

const baseStyles = `
  * { box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.5; color: #1f2937; max-width: 960px; margin: 0 auto; padding: 24px; }
  nav { display: flex; gap: 16px; margin-bottom: 24px; }
  nav a { color: #2563eb; text-decoration: none; }
  h1 { margin-bottom: 4px; }
  .meta { color: #6b7280; margin-top: 0; }
  .flash { padding: 12px 16px; border-radius: 6px; margin-bottom: 16px; }
  .flash-error { background: #fee2e2; color: #991b1b; }
  .flash-info { background: #dbeafe; color: #1e40af; }
  .phase { border: 1px solid #e5e7eb; border-radius: 8px; padding: 16px; margin-bottom: 16px; }
  .phase h2 { margin-top: 0; }
  .initiative { margin-bottom: 12px; }
  .badge { display: inline-block; padding: 2px 8px; border-radius: 9999px; font-size: 12px; font-weight: 600; margin-left: 8px; }
  .badge-high { background: #fee2e2; color: #991b1b; }
  .badge-medium { background: #fef3c7; color: #92400e; }
  .badge-low { background: #dcfce7; color: #166534; }
  .chart { overflow-x: auto; }
  form label { display: block; font-weight: 600; margin-top: 16px; }
  form input[type=text], form select { width: 100%; padding: 8px; margin-top: 4px; }
  .goals label { font-weight: normal; margin-top: 4px; }
  .field-error { color: #b91c1c; font-size: 14px; }
  table { width: 100%; border-collapse: collapse; }
  th, td { text-align: left; padding: 8px; border-bottom: 1px solid #e5e7eb; }
  .actions { margin-top: 24px; }
`;

function layout(title: string, body: string, head = ''): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${baseStyles}</style>${head}
</head>
<body>
  <nav><a href="/">New roadmap</a><a href="/roadmaps">All roadmaps</a></nav>
${body}
</body>
</html>`;
}

function renderFlash(messages: FlashMessage[]): string {
  return messages
    .map(flash => `  <div class="flash flash-${flash.category}" role="alert">${escapeHtml(flash.message)}</div>`)
    .join('\n');
}

function renderInitiative(initiative: Initiative): string {
  const description = initiative.description
    ? `\n        <p>${escapeHtml(initiative.description)}</p>`
    : '';
  return `      <li class="initiative">
        <strong>${escapeHtml(initiative.title)}</strong><span class="badge badge-${initiative.priority}">${PRIORITY_LABELS[initiative.priority]}</span>${description}
      </li>`;
}

function renderPhase(phase: RoadmapPhase, index: number): string {
  return `  <section class="phase">
    <h2>Phase ${index + 1}: ${escapeHtml(phase.label)} <small>(${escapeHtml(phase.timeframe)})</small></h2>
    <ul>
${phase.initiatives.map(renderInitiative).join('\n')}
    </ul>
  </section>`;
}

/**
 * Renders a stored roadmap as a complete HTML document
 */
export function renderPage(result: RoadmapResult): string {
  const { request } = result;
  const goals = request.goals.map(goal => escapeHtml(GOAL_LABELS[goal])).join(', ');
  const title = `AI Roadmap: ${request.organizationName}`;

  const body = `  <h1>${escapeHtml(title)}</h1>
  <p class="meta">Generated ${formatDate(result.createdAt)}</p>
  <dl>
    <dt>Organization size</dt><dd>${escapeHtml(ORGANIZATION_SIZE_LABELS[request.organizationSize])}</dd>
    <dt>Industry</dt><dd>${escapeHtml(request.industry)}</dd>
    <dt>AI maturity</dt><dd>${escapeHtml(AI_MATURITY_LABELS[request.aiMaturity])}</dd>
    <dt>Goals</dt><dd>${goals}</dd>
  </dl>
${result.phases.map(renderPhase).join('\n')}
  <section class="chart">
    <h2>Timeline</h2>
    <pre class="mermaid">${escapeHtml(result.chart)}</pre>
  </section>
  <p class="actions"><a href="/roadmaps/${result.id}/pdf">Download PDF</a></p>`;

  const head = `
  <script src="${MERMAID_SCRIPT}"></script>
  <script>mermaid.initialize({ startOnLoad: true });</script>`;

  return layout(title, body, head);
}

/**
 * Renders the listing page, in the order given
 */
export function renderList(summaries: RoadmapSummary[]): string {
  const rows = summaries.map(summary => `      <tr>
        <td><a href="/roadmaps/${summary.id}">${escapeHtml(summary.organizationName)}</a></td>
        <td>${escapeHtml(summary.industry)}</td>
        <td>${escapeHtml(ORGANIZATION_SIZE_LABELS[summary.organizationSize])}</td>
        <td>${escapeHtml(AI_MATURITY_LABELS[summary.aiMaturity])}</td>
        <td>${formatDate(summary.createdAt)}</td>
      </tr>`);

  const content = summaries.length === 0
    ? '  <p>No roadmaps yet. <a href="/">Generate the first one.</a></p>'
    : `  <table>
    <thead><tr><th>Organization</th><th>Industry</th><th>Size</th><th>AI maturity</th><th>Created</th></tr></thead>
    <tbody>
${rows.join('\n')}
    </tbody>
  </table>`;

  return layout('Roadmaps', `  <h1>Roadmaps</h1>\n${content}`);
}

function fieldError(error: FormError | undefined, field: string): string {
  return error?.field === field
    ? `\n    <div class="field-error" id="${field}-error">${escapeHtml(error.message)}</div>`
    : '';
}

function renderOptions(
  choices: readonly string[],
  labels: Record<string, string>,
  selected: string | undefined,
  placeholder: string
): string {
  const options = choices.map(choice => {
    const attr = choice === selected ? ' selected' : '';
    return `      <option value="${choice}"${attr}>${escapeHtml(labels[choice] ?? choice)}</option>`;
  });
  return [`      <option value="">${placeholder}</option>`, ...options].join('\n');
}

/**
 * Renders the submission form with sticky values and inline errors
 */
export function renderForm(options: FormPageOptions = {}): string {
  const values = options.values ?? {};
  const error = options.error;
  const checked = new Set(values.goals ?? []);

  const goalBoxes = GOALS.map(goal => {
    const attr = checked.has(goal) ? ' checked' : '';
    return `      <label><input type="checkbox" name="goals" value="${goal}"${attr}> ${escapeHtml(GOAL_LABELS[goal])}</label>`;
  }).join('\n');

  // Errors that belong to no single field are shown above the form
  const generalError = error && !error.field
    ? `\n  <div class="flash flash-error" role="alert">${escapeHtml(error.message)}</div>`
    : '';
  const flash = options.flash && options.flash.length > 0 ? `\n${renderFlash(options.flash)}` : '';

  const body = `  <h1>AI Implementation Roadmap</h1>
  <p class="meta">Describe your organization and get a three-phase AI adoption plan.</p>${flash}${generalError}
  <form method="post" action="/generate">
    <label for="organization_name">Organization name</label>
    <input type="text" id="organization_name" name="organization_name" maxlength="200" value="${escapeHtml(values.organization_name ?? '')}" required>${fieldError(error, 'organization_name')}
    <label for="organization_size">Organization size</label>
    <select id="organization_size" name="organization_size" required>
${renderOptions(ORGANIZATION_SIZES, ORGANIZATION_SIZE_LABELS, values.organization_size, 'Select size')}
    </select>${fieldError(error, 'organization_size')}
    <label for="industry">Industry</label>
    <input type="text" id="industry" name="industry" maxlength="200" value="${escapeHtml(values.industry ?? '')}" required>${fieldError(error, 'industry')}
    <label for="ai_maturity">Current AI maturity</label>
    <select id="ai_maturity" name="ai_maturity" required>
${renderOptions(AI_MATURITY_LEVELS, AI_MATURITY_LABELS, values.ai_maturity, 'Select maturity')}
    </select>${fieldError(error, 'ai_maturity')}
    <fieldset class="goals">
      <legend>Key goals</legend>
${goalBoxes}
    </fieldset>${fieldError(error, 'goals')}
    <p class="actions"><button type="submit">Generate roadmap</button></p>
  </form>`;

  return layout('AI Roadmap Generator', body);
}

/**
 * Minimal page for 404 and 500 responses
 */
export function renderErrorPage(title: string, message: string): string {
  return layout(title, `  <h1>${escapeHtml(title)}</h1>\n  <p>${escapeHtml(message)}</p>`);
}
