import { KNOWN_AGGREGATIONS, KNOWN_CHART_TYPES } from '../types';
import type {
    AggregationKind,
    CellValue,
    ChartData,
    ChartKind,
    DataRow,
    DataTable,
    ExecutionOutput,
    ExecutionPlan,
} from '../types';
import { formatCell, tableToText } from '../utils/dataLoader';
import { ExecutionError } from '../utils/errors';
import type { ChartWriter } from './chartWriter';
import type { GenerationClient } from './geminiService';

/**
 * Runs an ExecutionPlan against a table and produces the user-facing answer.
 * May keep a reference to the last table it was given; the orchestrator owns it.
 */
export interface Executor {
    setTable(table: DataTable): void;
    clearTable(): void;
    execute(plan: ExecutionPlan, table: DataTable, question: string): Promise<ExecutionOutput>;
}

const MAX_CHART_POINTS = 50;
const HISTOGRAM_BINS = 10;
const PIE_MAX_SLICES = 5;

const CHART_SYNONYMS: Record<string, ChartKind> = {
    column: 'bar',
    vertical_bar: 'bar',
    barh: 'horizontal_bar',
    hbar: 'horizontal_bar',
    horizontal: 'horizontal_bar',
    doughnut: 'pie',
    donut: 'pie',
    trend: 'line',
    point: 'scatter',
    hist: 'histogram',
    distribution: 'histogram',
    boxplot: 'box',
    box_and_whisker: 'box',
    heat_map: 'heatmap',
    countplot: 'count',
};

const isKnown = <T extends string>(known: readonly T[], value: string): value is T =>
    known.some((k) => k === value);

/**
 * Maps a chart tag from the plan onto a chart the executor can build.
 * Unrecognized tags mean "auto-detect" and are never rejected.
 */
export const normalizeChartType = (tag: string | null): ChartKind | 'auto' => {
    if (!tag) return 'auto';
    const cleaned = tag
        .trim()
        .toLowerCase()
        .replace(/[\s-]+/g, '_')
        .replace(/_(chart|plot|graph)$/, '');
    if (isKnown(KNOWN_CHART_TYPES, cleaned)) return cleaned;
    return CHART_SYNONYMS[cleaned] ?? 'auto';
};

const AGGREGATION_SYNONYMS: Record<string, AggregationKind> = {
    avg: 'mean',
    average: 'mean',
    total: 'sum',
    maximum: 'max',
    minimum: 'min',
};

export const normalizeAggregation = (tag: string | null): AggregationKind | null => {
    if (!tag) return null;
    const cleaned = tag.trim().toLowerCase();
    if (isKnown(KNOWN_AGGREGATIONS, cleaned)) return cleaned;
    return AGGREGATION_SYNONYMS[cleaned] ?? null;
};

const cellKey = (value: CellValue): string => formatCell(value).trim().toLowerCase();

// Results never alias the loaded table's arrays.
const copyTable = (table: DataTable): DataTable => ({ headers: [...table.headers], rows: [...table.rows] });

const matchesFilter = (cell: CellValue, expected: unknown): boolean => {
    if (Array.isArray(expected)) {
        return expected.some((candidate) => matchesFilter(cell, candidate));
    }
    if (expected === null || expected === undefined) {
        return cell === null;
    }
    return cellKey(cell) === String(expected).trim().toLowerCase();
};

/**
 * Keeps rows matching every filter whose key names a column. Other keys are
 * derived predicates the executor cannot evaluate and are skipped.
 */
export const applyFilters = (table: DataTable, filters: Record<string, unknown> | null): DataTable => {
    if (!filters) return copyTable(table);
    let rows = [...table.rows];
    for (const [column, expected] of Object.entries(filters)) {
        if (!table.headers.includes(column)) {
            console.warn(`[Executor] Ignoring filter on unknown column '${column}'`);
            continue;
        }
        rows = rows.filter((row) => matchesFilter(row[column] ?? null, expected));
    }
    return { headers: [...table.headers], rows };
};

export const isNumericColumn = (table: DataTable, column: string): boolean => {
    const present = table.rows.map((row) => row[column] ?? null).filter((v) => v !== null);
    return present.length > 0 && present.every((v) => typeof v === 'number');
};

const numericValues = (rows: DataRow[], column: string): number[] =>
    rows.map((row) => row[column]).filter((v): v is number => typeof v === 'number');

// Single pass; spreading a large column into Math.max overflows the call stack.
const largest = (values: number[]): number => values.reduce((m, v) => (v > m ? v : m), values[0]);
const smallest = (values: number[]): number => values.reduce((m, v) => (v < m ? v : m), values[0]);

const reduceValues = (aggregation: AggregationKind, values: number[]): number | null => {
    switch (aggregation) {
        case 'count':
            return values.length;
        case 'sum':
            return values.reduce((acc, v) => acc + v, 0);
        case 'mean':
            return values.length === 0 ? null : values.reduce((acc, v) => acc + v, 0) / values.length;
        case 'max':
            return values.length === 0 ? null : largest(values);
        case 'min':
            return values.length === 0 ? null : smallest(values);
    }
};

const project = (table: DataTable, columns: string[]): DataTable => {
    const keep = columns.filter((c) => table.headers.includes(c));
    if (keep.length === 0) return copyTable(table);
    return {
        headers: keep,
        rows: table.rows.map((row) => Object.fromEntries(keep.map((c) => [c, row[c] ?? null]))),
    };
};

/**
 * Groups by the first non-numeric plan column and aggregates the first
 * numeric one. Without an aggregation the plan columns are projected.
 */
export const computeResult = (table: DataTable, plan: ExecutionPlan): DataTable => {
    const aggregation = normalizeAggregation(plan.aggregation);
    const columns = plan.columnsToUse.filter((c) => table.headers.includes(c));
    if (!aggregation) {
        return project(table, columns);
    }

    const groupBy = columns.find((c) => !isNumericColumn(table, c));
    const valueColumn = columns.find((c) => c !== groupBy && isNumericColumn(table, c));
    if (!valueColumn && aggregation !== 'count') {
        console.warn(`[Executor] No numeric column to ${aggregation}; returning the matching rows instead`);
        return project(table, columns);
    }

    const resultKey = valueColumn ?? 'count';
    const valuesOf = (rows: DataRow[]): number[] => (valueColumn ? numericValues(rows, valueColumn) : rows.map(() => 1));

    if (!groupBy) {
        return { headers: [resultKey], rows: [{ [resultKey]: reduceValues(aggregation, valuesOf(table.rows)) }] };
    }

    const groups = new Map<string, DataRow[]>();
    const labels = new Map<string, CellValue>();
    for (const row of table.rows) {
        const label = row[groupBy] ?? null;
        if (label === null) continue;
        const key = formatCell(label);
        if (!groups.has(key)) {
            groups.set(key, []);
            labels.set(key, label);
        }
        groups.get(key)?.push(row);
    }

    const rows: DataRow[] = [...groups.entries()].map(([key, groupRows]) => ({
        [groupBy]: labels.get(key) ?? key,
        [resultKey]: reduceValues(aggregation, valuesOf(groupRows)),
    }));
    rows.sort((a, b) => (Number(b[resultKey]) || 0) - (Number(a[resultKey]) || 0));
    return { headers: [groupBy, resultKey], rows };
};

const palette = (n: number): string[] =>
    Array.from({ length: n }, (_, i) => `hsl(${((i * 360) / Math.min(Math.max(n, 1), 20)) % 360}, 55%, 55%)`);

const countOccurrences = (table: DataTable, column: string): [string, number][] => {
    const counts = new Map<string, number>();
    for (const row of table.rows) {
        const key = formatCell(row[column] ?? null) || 'N/A';
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return [...counts.entries()].sort(([, a], [, b]) => b - a);
};

const histogram = (values: number[]): { labels: string[]; counts: number[] } => {
    const min = smallest(values);
    const max = largest(values);
    if (min === max) return { labels: [String(min)], counts: [values.length] };
    const width = (max - min) / HISTOGRAM_BINS;
    const counts = new Array<number>(HISTOGRAM_BINS).fill(0);
    for (const v of values) {
        counts[Math.min(Math.floor((v - min) / width), HISTOGRAM_BINS - 1)] += 1;
    }
    const labels = counts.map((_, i) => `${+(min + i * width).toFixed(2)}-${+(min + (i + 1) * width).toFixed(2)}`);
    return { labels, counts };
};

/**
 * Chart data for a result table, or null when nothing in it can be plotted.
 */
export const buildChart = (table: DataTable, chartTag: string | null, title: string): ChartData | null => {
    if (table.rows.length === 0 || table.headers.length === 0) return null;

    const requested = normalizeChartType(chartTag);
    const numeric = table.headers.filter((c) => isNumericColumn(table, c));
    const labelColumn = table.headers.find((c) => !numeric.includes(c));

    if (requested === 'histogram' || requested === 'box') {
        const column = numeric[0];
        if (!column) return null;
        const values = numericValues(table.rows, column);
        if (requested === 'box') {
            return { type: 'box', title, labels: [column], datasets: [{ label: column, data: values }] };
        }
        const { labels, counts } = histogram(values);
        return { type: 'histogram', title, labels, datasets: [{ label: `Distribution of ${column}`, data: counts }] };
    }

    if (requested === 'scatter' && numeric.length >= 2) {
        const [x, y] = numeric;
        const points = table.rows.filter((row) => typeof row[x] === 'number' && typeof row[y] === 'number').slice(0, MAX_CHART_POINTS);
        return {
            type: 'scatter',
            title,
            labels: points.map((row) => formatCell(row[x] ?? null)),
            datasets: [{ label: y, data: numericValues(points, y) }],
        };
    }

    let labels: string[];
    let datasets: ChartData['datasets'];
    if (labelColumn && numeric.length > 0) {
        const rows = table.rows.slice(0, MAX_CHART_POINTS);
        labels = rows.map((row) => formatCell(row[labelColumn] ?? null));
        datasets = numeric.map((column) => ({ label: column, data: rows.map((row) => Number(row[column]) || 0) }));
    } else if (labelColumn) {
        const counts = countOccurrences(table, labelColumn).slice(0, MAX_CHART_POINTS);
        labels = counts.map(([value]) => value);
        datasets = [{ label: `Count of ${labelColumn}`, data: counts.map(([, count]) => count) }];
    } else {
        // Only numeric columns: plot the first one against its row position.
        const column = numeric[0];
        const rows = table.rows.slice(0, MAX_CHART_POINTS);
        labels = rows.map((_, i) => String(i + 1));
        datasets = [{ label: column, data: numericValues(rows, column) }];
    }

    let type: ChartKind;
    if (requested === 'auto' || requested === 'scatter') {
        const temporal = labelColumn !== undefined && table.rows.every((row) => row[labelColumn] instanceof Date);
        type = temporal ? 'line' : labels.length <= PIE_MAX_SLICES ? 'pie' : 'bar';
    } else {
        type = requested;
    }

    const colors = palette(labels.length);
    return {
        type,
        title,
        labels,
        datasets: datasets.map((dataset) => (type === 'pie' || type === 'bar' ? { ...dataset, backgroundColor: colors } : dataset)),
    };
};

// System instruction for the "Analyst" model
export const ANALYST_SYSTEM_PROMPT = `You are an expert data analyst. You answer a user's question about their dataset.

You are given the analysis plan that was made for the question and the result of executing it against the data (already filtered and aggregated). You MUST base your answer on that result.

- Answer the question directly in the first sentence, quoting the relevant numbers.
- Keep the answer concise and directly related to the question.
- If the result is empty, say that no records matched the criteria.
- If a chart was produced, mention what it shows in one sentence.
- Respond in plain text or light markdown. Do not wrap the answer in JSON.`;

export const buildAnalystPrompt = (
    question: string,
    plan: ExecutionPlan,
    result: DataTable,
    matchedRows: number,
    chart: ChartData | null,
    maxRows: number,
): string => {
    const steps = plan.steps.map((step, i) => `${i + 1}. ${step}`).join('\n');
    return `
Goal: ${plan.goal}
Plan:
${steps}

Rows matching the plan's filters: ${matchedRows}
Result (${result.rows.length} rows):
---
${tableToText(result, maxRows)}
---
${chart ? `A ${chart.type} chart titled "${chart.title}" was produced from this result.\n` : ''}
My question is:
${question}
`;
};

export interface PlanExecutorOptions {
    client: GenerationClient;
    // Charts are skipped when no writer is configured.
    chartWriter?: ChartWriter;
    maxPromptRows?: number;
}

/**
 * Default Executor: filters and aggregates locally, writes the chart, then
 * asks the model for the written answer.
 */
export class PlanExecutor implements Executor {
    private table: DataTable | null = null;
    private readonly client: GenerationClient;
    private readonly chartWriter?: ChartWriter;
    private readonly maxPromptRows: number;

    constructor(options: PlanExecutorOptions) {
        this.client = options.client;
        this.chartWriter = options.chartWriter;
        this.maxPromptRows = options.maxPromptRows ?? 50;
    }

    get hasTable(): boolean {
        return this.table !== null;
    }

    setTable(table: DataTable): void {
        this.table = table;
    }

    clearTable(): void {
        this.table = null;
    }

    async execute(plan: ExecutionPlan, table: DataTable, question: string): Promise<ExecutionOutput> {
        this.table = table;

        console.log('[Executor] Step 1: applying filters and aggregation...');
        const filtered = applyFilters(table, plan.filters);
        const result = computeResult(filtered, plan);

        let chartData: ChartData | null = null;
        let imagePath: string | undefined;
        if (plan.needsVisualization) {
            chartData = buildChart(result, plan.chartType, plan.goal);
            if (chartData && this.chartWriter) {
                imagePath = await this.chartWriter.write(chartData);
            }
        }

        console.log('[Executor] Step 2: generating the answer...');
        const response = await this.client.generateText({
            system: ANALYST_SYSTEM_PROMPT,
            prompt: buildAnalystPrompt(question, plan, result, filtered.rows.length, chartData, this.maxPromptRows),
            temperature: 0.2,
        });
        if (!response.ok) {
            throw new ExecutionError(`Failed to generate an answer: ${response.reason}`);
        }

        const output: ExecutionOutput = { answer: response.text, resultTable: result };
        if (chartData) output.chartData = chartData;
        if (imagePath) output.imagePath = imagePath;
        return output;
    }
}
