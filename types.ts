// --- Tabular data ---

export type CellValue = string | number | boolean | Date | null;

export type DataRow = Record<string, CellValue>;

// A parsed dataset. `headers` keeps the file's native column order.
export interface DataTable {
  headers: string[];
  rows: DataRow[];
}

export interface LoadResult {
  ok: boolean;
  message: string;
  table: DataTable | null;
}

export interface ValidationResult {
  ok: boolean;
  error: string;
}

// --- Charts ---

export interface ChartDataset {
  label: string;
  data: number[];
  backgroundColor?: string[];
}

export interface ChartData {
  type: ChartKind;
  title: string;
  labels: string[];
  datasets: ChartDataset[];
}

export const KNOWN_CHART_TYPES = [
  'bar',
  'line',
  'pie',
  'scatter',
  'horizontal_bar',
  'histogram',
  'area',
  'box',
  'heatmap',
  'count',
] as const;

export type ChartKind = (typeof KNOWN_CHART_TYPES)[number];

export const KNOWN_AGGREGATIONS = ['sum', 'mean', 'count', 'max', 'min'] as const;

export type AggregationKind = (typeof KNOWN_AGGREGATIONS)[number];

// --- Execution Plan ---

/**
 * The contract between the Planner and the Executor for one question.
 *
 * `chartType` and `aggregation` are open tags: the known values above are
 * hints only, and consumers normalize or pass through anything else.
 */
export interface ExecutionPlan {
  goal: string;
  steps: string[];
  needsVisualization: boolean;
  chartType: string | null;
  columnsToUse: string[];
  aggregation: string | null;
  filters: Record<string, unknown> | null;
  // Verbatim model output, or the failure reason for a fallback plan.
  rawResponse: string;
}

export type PlanOutcome =
  | { kind: 'planned'; plan: ExecutionPlan }
  | { kind: 'fallback'; plan: ExecutionPlan; reason: string };

// --- Conversation ---

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
  timestamp: Date;
  executionPlan?: ExecutionPlan;
  chartData?: ChartData;
}

// --- Execution ---

export interface ExecutionOutput {
  answer: string;
  resultTable?: DataTable;
  imagePath?: string;
  chartData?: ChartData;
}

// The uniform shape handed back to the UI layer for every question.
export interface QueryResult {
  success: boolean;
  answer: string;
  planDisplay: string;
  resultTable?: DataTable;
  imagePath?: string;
  error?: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type OrchestratorState = 'NoData' | 'DataLoaded';
