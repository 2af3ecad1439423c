/**
 * HTTP application
 *
 * Routes for the submission form, stored roadmaps and their PDF export.
 * Generation and storage failures on submit are reported through a flash
 * message on the form page; validation failures re-render the form.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { AppError, GenerationError, NotFoundError, PersistenceError, ValidationError } from '../core/errors.js';
import { Logger, logger as defaultLogger } from '../core/logger.js';
import { validateRoadmapId } from '../core/validation.js';
import { RoadmapResult } from '../models/roadmap.js';
import { RoadmapRepository } from '../services/storage/roadmap-store.js';
import {
  FormValues,
  renderErrorPage,
  renderForm,
  renderList,
  renderPage
} from '../services/rendering/html-renderer.js';
import { renderPdf } from '../services/rendering/pdf-renderer.js';
import { setFlash, takeFlash } from './flash.js';

export interface SubmissionHandler {
  handleSubmit(rawForm: unknown): Promise<RoadmapResult>;
}

export interface AppOptions {
  submissions: SubmissionHandler;
  repository: RoadmapRepository;
  sessionSecret: string;
  logger?: Logger;
}

const GENERATION_MESSAGES: Record<GenerationError['kind'], string> = {
  ProviderUnavailable: 'The roadmap service is temporarily unavailable. Please try again in a moment.',
  ProviderRejected: 'The roadmap service rejected the request. Please contact your administrator.',
  MalformedResponse: 'The roadmap service returned an unusable answer. Please try again.'
};

const PERSISTENCE_MESSAGE = 'Your roadmap was generated but could not be saved. Please try again later.';

type FormBody = Record<string, string | string[]>;

/**
 * Keeps the text parts of a parsed body; uploaded files are dropped
 */
function toFormBody(body: Record<string, unknown>): FormBody {
  const form: FormBody = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      form[key] = value;
    } else if (Array.isArray(value)) {
      form[key] = value.filter((item): item is string => typeof item === 'string');
    }
  }
  return form;
}

function single(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function toFormValues(form: FormBody): FormValues {
  const goals = form.goals;
  return {
    organization_name: single(form.organization_name),
    organization_size: single(form.organization_size),
    industry: single(form.industry),
    ai_maturity: single(form.ai_maturity),
    goals: goals === undefined ? [] : Array.isArray(goals) ? goals : [goals]
  };
}

function isApiRequest(c: Context): boolean {
  return c.req.path.startsWith('/api/');
}

/**
 * Builds the Hono application
 */
export function createApp(options: AppOptions): Hono {
  const { submissions, repository, sessionSecret } = options;
  const logger = options.logger ?? defaultLogger;
  const app = new Hono();

  app.get('/', async c => {
    const flash = await takeFlash(c, sessionSecret);
    return c.html(renderForm({ flash }));
  });

  app.post('/generate', async c => {
    const form = toFormBody(await c.req.parseBody({ all: true }));

    try {
      const result = await submissions.handleSubmit(form);
      return c.redirect(`/roadmaps/${result.id}`, 303);
    } catch (error) {
      if (error instanceof ValidationError) {
        return c.html(
          renderForm({ values: toFormValues(form), error: { field: error.field, message: error.message } }),
          400
        );
      }
      if (error instanceof GenerationError) {
        await setFlash(c, sessionSecret, [{ category: 'error', message: GENERATION_MESSAGES[error.kind] }]);
        return c.redirect('/', 303);
      }
      if (error instanceof PersistenceError) {
        await setFlash(c, sessionSecret, [{ category: 'error', message: PERSISTENCE_MESSAGE }]);
        return c.redirect('/', 303);
      }
      throw error;
    }
  });

  app.get('/roadmaps', async c => {
    return c.html(renderList(await repository.listAll()));
  });

  app.get('/roadmaps/:id', async c => {
    const result = await repository.get(validateRoadmapId(c.req.param('id')));
    return c.html(renderPage(result));
  });

  app.get('/roadmaps/:id/pdf', async c => {
    const result = await repository.get(validateRoadmapId(c.req.param('id')));
    const pdf = await renderPdf(result);
    return new Response(pdf, {
      status: 200,
      headers: {
        'Content-Type': 'application/pdf',
        'Content-Disposition': `attachment; filename="roadmap-${result.id}.pdf"`,
        'Content-Length': String(pdf.length)
      }
    });
  });

  app.get('/api/roadmaps/:id', async c => {
    const result = await repository.get(validateRoadmapId(c.req.param('id')));
    return c.json(result);
  });

  app.notFound(c => {
    if (isApiRequest(c)) {
      return c.json({ error: { code: 'NOT_FOUND', message: `No route for ${c.req.path}` } }, 404);
    }
    return c.html(renderErrorPage('Page not found', `No page at ${c.req.path}`), 404);
  });

  app.onError((error, c) => {
    if (error instanceof NotFoundError) {
      if (isApiRequest(c)) {
        return c.json({ error: { code: error.code, message: error.message } }, 404);
      }
      return c.html(renderErrorPage('Roadmap not found', error.message), 404);
    }

    logger.exception(error, { method: c.req.method, path: c.req.path });
    const code = error instanceof AppError ? error.code : 'INTERNAL_ERROR';
    if (isApiRequest(c)) {
      return c.json({ error: { code, message: 'Internal server error' } }, 500);
    }
    return c.html(renderErrorPage('Something went wrong', 'The request could not be completed. Please try again later.'), 500);
  });

  return app;
}
