import { Type } from '@google/genai';
import type { Schema } from '@google/genai';
import { z } from 'zod';
import { loadAiConfig, logAiConfig } from '../config';
import type { AiConfig } from '../config';
import { KNOWN_AGGREGATIONS, KNOWN_CHART_TYPES } from '../types';
import type { ExecutionPlan, PlanOutcome } from '../types';
import { createGenerationClient } from './geminiService';
import type { GenerationClient, GenerationResult } from './geminiService';
import { errorMessage } from '../utils/errors';

export const DEFAULT_GOAL = 'Analyze the data';
export const FALLBACK_STEP = 'Analyze the data to answer the question';

const CHART_TYPE_TAGS = KNOWN_CHART_TYPES.flatMap((type) => [type, `${type}_chart`, `${type}_plot`]);

/**
 * Wire shape requested from the model. Filters travel as column/value pairs
 * because the model endpoint does not accept free-form objects.
 */
export const EXECUTION_PLAN_SCHEMA: Schema = {
    type: Type.OBJECT,
    properties: {
        goal: { type: Type.STRING, description: 'Clear description of what the user wants to achieve' },
        steps: {
            type: Type.ARRAY,
            items: { type: Type.STRING },
            description: 'Step-by-step execution plan',
        },
        needs_visualization: { type: Type.BOOLEAN },
        chart_type: { type: Type.STRING, nullable: true, enum: CHART_TYPE_TAGS },
        columns_to_use: { type: Type.ARRAY, items: { type: Type.STRING } },
        aggregation: { type: Type.STRING, nullable: true, enum: [...KNOWN_AGGREGATIONS] },
        filters: {
            type: Type.ARRAY,
            nullable: true,
            items: {
                type: Type.OBJECT,
                properties: {
                    column: { type: Type.STRING },
                    value: { type: Type.STRING },
                },
                required: ['column', 'value'],
            },
        },
    },
    required: ['goal', 'steps', 'needs_visualization', 'chart_type', 'columns_to_use', 'aggregation', 'filters'],
};

const filterPairsSchema = z.array(z.object({ column: z.string(), value: z.unknown() }));

const planResponseSchema = z.object({
    goal: z.string().optional(),
    steps: z.array(z.string()).optional(),
    needs_visualization: z.boolean().optional(),
    chart_type: z.string().nullable().optional(),
    columns_to_use: z.array(z.string()).optional(),
    aggregation: z.string().nullable().optional(),
    filters: z.union([filterPairsSchema, z.record(z.string(), z.unknown())]).nullable().optional(),
});

type PlanResponse = z.infer<typeof planResponseSchema>;

const toFilterMap = (filters: PlanResponse['filters']): Record<string, unknown> | null => {
    if (!filters) return null;
    const entries = Array.isArray(filters) ? filters.map((f) => [f.column, f.value] as const) : Object.entries(filters);
    return entries.length > 0 ? Object.fromEntries(entries) : null;
};

const blankToNull = (value: string | null | undefined): string | null =>
    value && value.trim() !== '' ? value.trim() : null;

/**
 * Applies the per-field defaults to a validated model response.
 */
export const toExecutionPlan = (data: PlanResponse, rawResponse: string): ExecutionPlan => {
    const steps = (data.steps ?? []).filter((step) => step.trim() !== '');
    return {
        goal: data.goal?.trim() || DEFAULT_GOAL,
        steps: steps.length > 0 ? steps : [DEFAULT_GOAL],
        needsVisualization: data.needs_visualization ?? false,
        chartType: blankToNull(data.chart_type),
        columnsToUse: data.columns_to_use ?? [],
        aggregation: blankToNull(data.aggregation),
        filters: toFilterMap(data.filters),
        rawResponse,
    };
};

export const fallbackPlan = (question: string, reason: string): ExecutionPlan => ({
    goal: `Answer: ${question}`,
    steps: [FALLBACK_STEP],
    needsVisualization: false,
    chartType: null,
    columnsToUse: [],
    aggregation: null,
    filters: null,
    rawResponse: reason,
});

export const parsePlanResponse = (text: string): { ok: true; plan: ExecutionPlan } | { ok: false; reason: string } => {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        return { ok: false, reason: `Malformed JSON from planner: ${errorMessage(error)}` };
    }
    const parsed = planResponseSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        return { ok: false, reason: `Plan does not match the expected schema: ${issues.join('; ')}` };
    }
    return { ok: true, plan: toExecutionPlan(parsed.data, text) };
};

export const PLANNER_SYSTEM_PROMPT = `You are a Data Analysis Planner Agent. Your role is to analyze the user's question about their data and create a clear, structured execution plan.

IMPORTANT RULES:
1. Analyze the user's natural language question carefully
2. Consider the data schema provided to understand available columns
3. Consider conversation history for context in follow-up questions
4. Create a step-by-step plan that an executor can follow
5. Determine if visualization is needed and what type

CHART TYPE GUIDELINES:
- Mirror the user's own wording for the chart when they name one (e.g. "bar" or "bar_chart")
- Use "bar" for comparing categories or showing totals
- Use "horizontal_bar" for ranking (top N) or when labels are long
- Use "line" for trends over time or continuous data
- Use "area" for cumulative trends over time
- Use "pie" for showing proportions/percentages
- Use "scatter" for correlations between two numeric variables
- Use "histogram" or "box" for distributions
- Use "heatmap" for relationships between two categorical dimensions
- Use "count" for counting occurrences of categories
- Use null when no chart is needed

CONTEXT HANDLING:
- If the user says "show that on a chart" or refers to previous results, use the conversation history
- If the user mentions "top 5" or "top 10", include proper sorting in steps
- If the user asks to compare, identify the comparison groups

FILTERS:
- Express each filter as {"column": <column name>, "value": <value>}; use null when there are no filters

Always ensure your response is valid JSON and nothing else.`;

export const buildPlannerPrompt = (question: string, dataSchema: string, conversationContext?: string): string => {
    const promptParts = ['DATA SCHEMA:', dataSchema, ''];
    if (conversationContext) {
        promptParts.push('CONVERSATION HISTORY:', conversationContext, '');
    }
    promptParts.push('USER QUESTION:', question, '', 'Create an execution plan as a JSON object:');
    return promptParts.join('\n');
};

export interface Planner {
    createPlan(question: string, dataSchema: string, conversationContext?: string): Promise<ExecutionPlan>;
    formatPlanDisplay(plan: ExecutionPlan): string;
}

export interface PlannerOptions {
    // Injected model endpoint; built from `config` when absent.
    client?: GenerationClient;
    config?: AiConfig;
}

/**
 * Turns a question into an ExecutionPlan through one schema-constrained
 * model call. Planning never fails outward: any call or parse failure
 * degrades to the fallback plan.
 */
export class PlannerAgent implements Planner {
    private readonly client: GenerationClient;

    constructor(options: PlannerOptions = {}) {
        if (options.client) {
            this.client = options.client;
        } else {
            const config = options.config ?? loadAiConfig();
            logAiConfig(config);
            this.client = createGenerationClient(config);
        }
    }

    async createPlanOutcome(question: string, dataSchema: string, conversationContext?: string): Promise<PlanOutcome> {
        const prompt = buildPlannerPrompt(question, dataSchema, conversationContext);
        const result = await this.client.generateJson({
            system: PLANNER_SYSTEM_PROMPT,
            prompt,
            schema: EXECUTION_PLAN_SCHEMA,
            schemaName: 'execution_plan',
            temperature: 0.2,
            maxOutputTokens: 1024,
        }).catch((error: unknown): GenerationResult => ({ ok: false, reason: errorMessage(error) }));

        const parsed = result.ok ? parsePlanResponse(result.text) : { ok: false as const, reason: result.reason };
        if (!parsed.ok) {
            console.warn('[Planner] Falling back to a basic plan:', parsed.reason);
            return { kind: 'fallback', plan: fallbackPlan(question, parsed.reason), reason: parsed.reason };
        }

        console.log('[Planner] Execution plan received:', parsed.plan.goal);
        return { kind: 'planned', plan: parsed.plan };
    }

    async createPlan(question: string, dataSchema: string, conversationContext?: string): Promise<ExecutionPlan> {
        return (await this.createPlanOutcome(question, dataSchema, conversationContext)).plan;
    }

    formatPlanDisplay(plan: ExecutionPlan): string {
        return formatPlanDisplay(plan);
    }
}

export const formatPlanDisplay = (plan: ExecutionPlan): string => {
    const lines = [`**Goal:** ${plan.goal}`, '', '**Execution Steps:**'];
    plan.steps.forEach((step, i) => lines.push(`   ${i + 1}. ${step}`));

    if (plan.needsVisualization) {
        lines.push('', `**Visualization:** ${plan.chartType || 'auto'} chart`);
    }
    if (plan.columnsToUse.length > 0) {
        lines.push('', `**Columns:** ${plan.columnsToUse.join(', ')}`);
    }
    return lines.join('\n');
};
