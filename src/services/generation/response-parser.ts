/**
 * Roadmap reply parser
 *
 * Turns the provider's reply text into a GeneratedRoadmap, or fails with
 * GenerationError{MalformedResponse}. Partial results are never returned.
 */

import { GenerationError } from '../../core/errors.js';
import { RoadmapReplySchema } from '../../core/schemas.js';
import { GeneratedRoadmap } from '../../models/roadmap.js';

export const DEFAULT_MAX_RESPONSE_CHARS = 100_000;

/**
 * Strips a markdown code fence wrapped around the whole reply.
 *
 * The closing fence is searched from the end, since the chart text inside
 * the JSON may itself contain backticks.
 */
export function extractJson(content: string): string {
  let jsonStr = content.trim();

  if (!jsonStr.startsWith('```')) {
    return jsonStr;
  }

  const firstNewline = jsonStr.indexOf('\n');
  if (firstNewline === -1) {
    return jsonStr;
  }
  jsonStr = jsonStr.substring(firstNewline + 1);

  const lines = jsonStr.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim() === '```') {
      return lines.slice(0, i).join('\n').trim();
    }
  }

  return jsonStr.trim();
}

function malformed(message: string, context?: Record<string, unknown>): GenerationError {
  return new GenerationError('MalformedResponse', message, context);
}

/**
 * Parses and validates a provider reply
 *
 * @throws GenerationError with kind MalformedResponse
 */
export function parseRoadmapReply(
  content: string,
  maxChars: number = DEFAULT_MAX_RESPONSE_CHARS
): GeneratedRoadmap {
  if (content.length > maxChars) {
    throw malformed(`Provider reply exceeds ${maxChars} characters`, { length: content.length });
  }

  const jsonStr = extractJson(content);
  if (jsonStr === '') {
    throw malformed('Provider reply is empty');
  }

  let data: unknown;
  try {
    data = JSON.parse(jsonStr);
  } catch (error) {
    throw malformed(`Provider reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = RoadmapReplySchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const first = issues[0];
    const where = first ? ` at ${first.path || 'root'}: ${first.message}` : '';
    throw malformed(`Provider reply does not match the roadmap format${where}`, { issues });
  }

  return {
    phases: result.data.phases,
    chart: result.data.chart
  };
}
