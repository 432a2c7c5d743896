import { vi } from 'vitest';
import type { GenerationClient, GenerationResult } from '../services/geminiService';
import type { Executor } from '../services/planExecutor';
import type { Planner } from '../services/planner';
import { formatPlanDisplay } from '../services/planner';
import type { DataTable, ExecutionOutput, ExecutionPlan } from '../types';

export const SALES_CSV = 'region,sales\nNorth,10\nSouth,5\nNorth,7\n';

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

export const makePlan = (overrides: Partial<ExecutionPlan> = {}): ExecutionPlan => ({
  goal: 'Total sales per region',
  steps: ['Group by region', 'Sum sales'],
  needsVisualization: false,
  chartType: null,
  columnsToUse: ['region', 'sales'],
  aggregation: 'sum',
  filters: null,
  rawResponse: '{}',
  ...overrides,
});

export const salesTable = (): DataTable => ({
  headers: ['region', 'sales'],
  rows: [
    { region: 'North', sales: 10 },
    { region: 'South', sales: 5 },
    { region: 'North', sales: 7 },
  ],
});

export const fakeClient = (
  json: GenerationResult = { ok: true, text: '{}' },
  text: GenerationResult = { ok: true, text: 'ok' },
) => {
  const client = {
    generateJson: vi.fn<GenerationClient['generateJson']>().mockResolvedValue(json),
    generateText: vi.fn<GenerationClient['generateText']>().mockResolvedValue(text),
  };
  return client;
};

export const fakePlanner = (plan: ExecutionPlan = makePlan()) => ({
  createPlan: vi.fn<Planner['createPlan']>().mockResolvedValue(plan),
  formatPlanDisplay: vi.fn<Planner['formatPlanDisplay']>((p) => formatPlanDisplay(p)),
});

export const fakeExecutor = (output: ExecutionOutput = { answer: 'North leads with 17.' }) => ({
  setTable: vi.fn<Executor['setTable']>(),
  clearTable: vi.fn<Executor['clearTable']>(),
  execute: vi.fn<Executor['execute']>().mockResolvedValue(output),
});
