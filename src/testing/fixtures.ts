// Shared test data

import { LogLevel } from '../core/logger.js';
import { GeneratedRoadmap, GenerationRequest, RoadmapDraft } from '../models/roadmap.js';
import { AppConfig, DEFAULT_GENERATION_SETTINGS } from '../services/config/config-service.js';

export const ACME_FORM = {
  organization_name: 'Acme',
  organization_size: 'medium',
  industry: 'Retail',
  ai_maturity: 'piloting',
  goals: ['automation', 'efficiency']
};

export const ACME_REQUEST: GenerationRequest = {
  organizationName: 'Acme',
  organizationSize: 'medium',
  industry: 'Retail',
  aiMaturity: 'piloting',
  goals: ['automation', 'efficiency']
};

export const ACME_CHART = [
  'gantt',
  '    title AI Roadmap Timeline',
  '    dateFormat  YYYY-MM-DD',
  '    section Short-term',
  '    Short initiative :done, des1, 2025-01-01, 90d',
  '    section Medium-term',
  '    Medium initiative :active, des2, 2025-07-01, 120d',
  '    section Long-term',
  '    Long initiative :des3, 2026-01-01, 180d'
].join('\n');

/**
 * Provider reply with one initiative per phase
 */
export function acmeReply(): Record<string, unknown> {
  return {
    phases: [
      {
        label: 'Short-term',
        timeframe: '0-6 months',
        initiatives: [{ title: 'Short initiative', description: 'Automate store inventory counts', priority: 'High' }]
      },
      {
        label: 'Medium-term',
        timeframe: '6-12 months',
        initiatives: [{ title: 'Medium initiative', description: 'Forecast demand per region', priority: 'Medium' }]
      },
      {
        label: 'Long-term',
        timeframe: '12-24 months',
        initiatives: [{ title: 'Long initiative', description: 'Personalize pricing', priority: 'Low' }]
      }
    ],
    chart: ACME_CHART
  };
}

export function acmeRoadmap(): GeneratedRoadmap {
  return {
    phases: [
      {
        label: 'Short-term',
        timeframe: '0-6 months',
        initiatives: [{ title: 'Short initiative', description: 'Automate store inventory counts', priority: 'high' }]
      },
      {
        label: 'Medium-term',
        timeframe: '6-12 months',
        initiatives: [{ title: 'Medium initiative', description: 'Forecast demand per region', priority: 'medium' }]
      },
      {
        label: 'Long-term',
        timeframe: '12-24 months',
        initiatives: [{ title: 'Long initiative', description: 'Personalize pricing', priority: 'low' }]
      }
    ],
    chart: ACME_CHART
  };
}

export function acmeDraft(createdAt = new Date('2025-03-01T10:00:00.000Z')): RoadmapDraft {
  return { ...acmeRoadmap(), request: { ...ACME_REQUEST, goals: [...ACME_REQUEST.goals] }, createdAt };
}

/**
 * In-memory database on a loopback port; port 0 lets the OS pick one
 */
export function testConfig(port = 0): AppConfig {
  return {
    databaseUrl: 'sqlite::memory:',
    openaiApiKey: 'test-key',
    sessionSecret: 'test-secret',
    logLevel: LogLevel.SILENT,
    server: { port, host: '127.0.0.1' },
    generation: { ...DEFAULT_GENERATION_SETTINGS }
  };
}
