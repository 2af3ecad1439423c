/**
 * Roadmap prompts
 *
 * The system prompt fixes the three phases and the JSON reply shape; the user
 * prompt carries the organization's details.
 */

import { GenerationRequest } from '../../models/roadmap.js';
import {
  AI_MATURITY_LABELS,
  GOAL_LABELS,
  ORGANIZATION_SIZE_LABELS
} from '../../models/types.js';
import { CompletionRequest } from './provider.js';

export const SYSTEM_PROMPT = `You are an enterprise AI transformation consultant. Based on the user's inputs, generate a structured AI Implementation Roadmap with exactly three phases, in this order:
Phase 1: Short-term (0-6 months)
Phase 2: Medium-term (6-12 months)
Phase 3: Long-term (12-24 months)

Each phase contains one or more initiatives. Each initiative has:
- title: a short, specific initiative name
- description: one or two sentences on what it involves and why it matters for this organization
- priority: one of "high", "medium", "low"

Also produce a Mermaid.js Gantt chart covering every initiative, with one section per phase, in this form (no code fences):

gantt
    title AI Roadmap Timeline
    dateFormat  YYYY-MM-DD
    section Short-term
    <Initiative title> :des1, <start date>, 90d
    section Medium-term
    <Initiative title> :des2, <start date>, 120d
    section Long-term
    <Initiative title> :des3, <start date>, 180d

Reply with a single JSON object and nothing else, shaped exactly like this:
{
  "phases": [
    {
      "label": "Short-term",
      "timeframe": "0-6 months",
      "initiatives": [
        { "title": "...", "description": "...", "priority": "high" }
      ]
    },
    { "label": "Medium-term", "timeframe": "6-12 months", "initiatives": [ ... ] },
    { "label": "Long-term", "timeframe": "12-24 months", "initiatives": [ ... ] }
  ],
  "chart": "gantt\\n    title AI Roadmap Timeline\\n    ..."
}

Use realistic initiative names and durations, and make the chart match the initiatives you describe.`;

/**
 * Builds the organization-specific part of the prompt
 *
 * @param startDate - first day of the roadmap, used to anchor chart dates
 */
export function buildUserPrompt(request: GenerationRequest, startDate: Date): string {
  const goals = request.goals.map(goal => GOAL_LABELS[goal]).join(', ');

  return `Please generate an AI Implementation Roadmap for the following organization:

- Organization Name: ${request.organizationName}
- Organization Size: ${ORGANIZATION_SIZE_LABELS[request.organizationSize]}
- Industry: ${request.industry}
- Current AI Maturity Level: ${AI_MATURITY_LABELS[request.aiMaturity]}
- Key Goals: ${goals}

The roadmap starts on ${startDate.toISOString().slice(0, 10)}.
Provide initiatives tailored to this organization's specific context and goals.`;
}

export function buildCompletionRequest(request: GenerationRequest, startDate: Date): CompletionRequest {
  return {
    system: SYSTEM_PROMPT,
    user: buildUserPrompt(request, startDate)
  };
}
