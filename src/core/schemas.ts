// Zod schemas for form input and provider replies

import { z } from 'zod';
import { AI_MATURITY_LEVELS, GOALS, ORGANIZATION_SIZES, PRIORITIES } from '../models/types.js';

/**
 * Maximum lengths for free-text form fields
 */
export const MAX_LENGTHS = {
  organizationName: 200,
  industry: 200
};

export const OrganizationSizeSchema = z.enum(ORGANIZATION_SIZES, {
  errorMap: () => ({ message: 'Select an organization size' })
});

export const AiMaturitySchema = z.enum(AI_MATURITY_LEVELS, {
  errorMap: () => ({ message: 'Select an AI maturity level' })
});

export const GoalSchema = z.enum(GOALS, {
  errorMap: () => ({ message: 'Unknown goal' })
});

/**
 * Priority accepts any casing ("High", "LOW") and normalizes to lower case
 */
export const PrioritySchema = z.string().trim().toLowerCase().pipe(z.enum(PRIORITIES));

function requiredText(label: string, max: number) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} is required`)
    .max(max, `${label} must be at most ${max} characters`);
}

/**
 * Single checkbox submissions arrive as a string, several as an array
 */
const goalListSchema = z.preprocess(
  value => (value === undefined || value === null ? [] : Array.isArray(value) ? value : [value]),
  z.array(GoalSchema).min(1, 'Select at least one goal')
);

/**
 * Raw form submission, keyed by the HTML field names
 */
export const GenerationFormSchema = z
  .object({
    organization_name: requiredText('Organization name', MAX_LENGTHS.organizationName),
    organization_size: OrganizationSizeSchema,
    industry: requiredText('Industry', MAX_LENGTHS.industry),
    ai_maturity: AiMaturitySchema,
    goals: goalListSchema
  })
  .transform(form => ({
    organizationName: form.organization_name,
    organizationSize: form.organization_size,
    industry: form.industry,
    aiMaturity: form.ai_maturity,
    goals: [...new Set(form.goals)]
  }));

export type GenerationForm = z.input<typeof GenerationFormSchema>;

export const InitiativeSchema = z.object({
  title: z.string().trim().min(1, 'Initiative title is required'),
  description: z.string().trim().default(''),
  priority: PrioritySchema
});

export const PhaseSchema = z.object({
  label: z.string().trim().min(1, 'Phase label is required'),
  timeframe: z.string().trim().min(1, 'Phase timeframe is required'),
  initiatives: z.array(InitiativeSchema).min(1, 'Each phase needs at least one initiative')
});

/**
 * JSON object the provider is instructed to return
 */
export const RoadmapReplySchema = z.object({
  phases: z.tuple([PhaseSchema, PhaseSchema, PhaseSchema]),
  chart: z.string()
});

export type RoadmapReply = z.infer<typeof RoadmapReplySchema>;
