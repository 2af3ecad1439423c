// Core type definitions for the roadmap generator

export const ORGANIZATION_SIZES = ['small', 'medium', 'large', 'enterprise'] as const;
export const AI_MATURITY_LEVELS = ['none', 'exploring', 'piloting', 'scaling'] as const;
export const GOALS = [
  'automation',
  'efficiency',
  'customer-experience',
  'cost-reduction',
  'data-insights',
  'innovation',
  'risk-management',
  'revenue-growth'
] as const;
export const PRIORITIES = ['high', 'medium', 'low'] as const;

// Organization Types
export type OrganizationSize = typeof ORGANIZATION_SIZES[number];
export type AiMaturity = typeof AI_MATURITY_LEVELS[number];
export type Goal = typeof GOALS[number];

// Initiative Priority
export type Priority = typeof PRIORITIES[number];

/**
 * Display labels used by forms and rendered documents
 */
export const ORGANIZATION_SIZE_LABELS: Record<OrganizationSize, string> = {
  small: 'Small (1-50 employees)',
  medium: 'Medium (51-500 employees)',
  large: 'Large (501-5000 employees)',
  enterprise: 'Enterprise (5000+ employees)'
};

export const AI_MATURITY_LABELS: Record<AiMaturity, string> = {
  none: 'None - no AI initiatives yet',
  exploring: 'Exploring - evaluating use cases',
  piloting: 'Piloting - running first projects',
  scaling: 'Scaling - AI in production'
};

export const GOAL_LABELS: Record<Goal, string> = {
  'automation': 'Process automation',
  'efficiency': 'Operational efficiency',
  'customer-experience': 'Customer experience',
  'cost-reduction': 'Cost reduction',
  'data-insights': 'Data-driven insights',
  'innovation': 'Product innovation',
  'risk-management': 'Risk management',
  'revenue-growth': 'Revenue growth'
};

export const PRIORITY_LABELS: Record<Priority, string> = {
  high: 'High',
  medium: 'Medium',
  low: 'Low'
};
