// Roadmap models

import { AiMaturity, Goal, OrganizationSize, Priority } from './types.js';

/**
 * Validated organization details submitted through the form
 */
export interface GenerationRequest {
  organizationName: string;
  organizationSize: OrganizationSize;
  industry: string;
  aiMaturity: AiMaturity;
  /** Non-empty, without duplicates, in submission order */
  goals: Goal[];
}

/**
 * A single actionable item within a phase
 */
export interface Initiative {
  title: string;
  description: string;
  priority: Priority;
}

/**
 * One of the three roadmap phases
 */
export interface RoadmapPhase {
  /** Phase name, e.g. "Short-term" */
  label: string;
  /** Time window, e.g. "0-6 months" */
  timeframe: string;
  initiatives: Initiative[];
}

export type RoadmapPhases = [RoadmapPhase, RoadmapPhase, RoadmapPhase];

/**
 * Roadmap content as produced by the provider
 */
export interface GeneratedRoadmap {
  phases: RoadmapPhases;
  /** Mermaid Gantt source, passed through untouched */
  chart: string;
}

/**
 * A generated roadmap ready to be stored
 */
export interface RoadmapDraft extends GeneratedRoadmap {
  request: GenerationRequest;
  createdAt: Date;
}

/**
 * A stored roadmap
 */
export interface RoadmapResult extends RoadmapDraft {
  /** Assigned by the store on save, never changes afterwards */
  id: number;
}

/**
 * Row shown on the listing page
 */
export interface RoadmapSummary {
  id: number;
  organizationName: string;
  organizationSize: OrganizationSize;
  industry: string;
  aiMaturity: AiMaturity;
  createdAt: Date;
}
