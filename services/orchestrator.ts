import { loadConfig } from '../config';
import type { AppConfig } from '../config';
import type {
    DataTable,
    ExecutionOutput,
    ExecutionPlan,
    Message,
    OrchestratorState,
    Outcome,
    QueryResult,
} from '../types';
import { DataLoader, NO_DATA, head } from '../utils/dataLoader';
import { errorMessage } from '../utils/errors';
import { ConversationMemory, DEFAULT_MAX_MESSAGES } from '../utils/memory';
import { JsonChartWriter } from './chartWriter';
import { createGenerationClient } from './geminiService';
import { PlanExecutor } from './planExecutor';
import type { Executor } from './planExecutor';
import { PlannerAgent } from './planner';
import type { Planner } from './planner';

export const NO_DATA_ERROR = 'Please upload a data file first.';

export interface OrchestratorOptions {
    planner?: Planner;
    executor?: Executor;
    dataLoader?: DataLoader;
    maxMessages?: number;
    // Used to build the planner and executor that were not injected.
    config?: AppConfig;
}

/**
 * Coordinates one analysis session: load a table, then answer questions
 * through the planner and executor. Every failure comes back as a value.
 * Calls must not overlap; use one instance per session.
 */
export class AgentOrchestrator {
    private readonly planner: Planner;
    private readonly executor: Executor;
    private readonly dataLoader: DataLoader;
    private readonly memory: ConversationMemory;
    private currentTable: DataTable | null = null;
    private lastPlan: ExecutionPlan | null = null;

    constructor(options: OrchestratorOptions = {}) {
        this.dataLoader = options.dataLoader ?? new DataLoader();
        this.memory = new ConversationMemory(options.maxMessages ?? DEFAULT_MAX_MESSAGES);

        if (options.planner && options.executor) {
            this.planner = options.planner;
            this.executor = options.executor;
        } else {
            const config = options.config ?? loadConfig();
            this.planner = options.planner ?? new PlannerAgent({ config: config.ai });
            this.executor =
                options.executor ??
                new PlanExecutor({
                    client: createGenerationClient(config.ai),
                    chartWriter: new JsonChartWriter(config.chartOutputDir),
                });
        }
    }

    get state(): OrchestratorState {
        return this.currentTable ? 'DataLoaded' : 'NoData';
    }

    /**
     * Validates and parses an uploaded file. On failure nothing changes.
     */
    loadData(fileData: Uint8Array, fileName: string): { ok: boolean; message: string } {
        const validation = this.dataLoader.validate(fileName, fileData.byteLength);
        if (!validation.ok) {
            return { ok: false, message: validation.error };
        }

        const { ok, message, table } = this.dataLoader.load(fileData, fileName);
        if (!ok || !table) {
            return { ok: false, message };
        }

        this.currentTable = table;
        this.lastPlan = null;
        this.memory.clearMessages();
        this.memory.setDataSchema(this.dataLoader.schema(table));
        this.memory.setDataframeInfo(this.dataLoader.info(table));
        this.executor.setTable(table);

        console.info(`[Orchestrator] Loaded ${fileName}`);
        return { ok: true, message };
    }

    /**
     * Runs one question through plan → execute → record.
     *
     * The question is recorded before planning and stays in the history even
     * when the query fails.
     */
    async processQuery(question: string): Promise<QueryResult> {
        const table = this.currentTable;
        if (!table) {
            return { success: false, answer: '', planDisplay: '', error: NO_DATA_ERROR };
        }

        try {
            this.memory.addMessage('user', question);

            const schema = this.memory.dataSchema ?? this.dataLoader.schema(table);
            const context = this.memory.getContext();

            console.log('[Orchestrator] Step 1: planning...');
            const plan = await this.planner.createPlan(question, schema, context);
            this.lastPlan = plan;
            const planDisplay = this.planner.formatPlanDisplay(plan);

            console.log('[Orchestrator] Step 2: executing plan...');
            const execution = await this.runExecutor(plan, table, question);
            if (!execution.ok) {
                return this.failure(execution.error);
            }

            const { answer, resultTable, imagePath, chartData } = execution.value;
            this.memory.addMessage('assistant', answer, plan, chartData);

            const result: QueryResult = { success: true, answer, planDisplay };
            if (resultTable) result.resultTable = resultTable;
            if (imagePath) result.imagePath = imagePath;
            return result;
        } catch (error) {
            return this.failure(errorMessage(error));
        }
    }

    private async runExecutor(plan: ExecutionPlan, table: DataTable, question: string): Promise<Outcome<ExecutionOutput>> {
        try {
            return { ok: true, value: await this.executor.execute(plan, table, question) };
        } catch (error) {
            return { ok: false, error: errorMessage(error) };
        }
    }

    private failure(reason: string): QueryResult {
        const error = `Error processing query: ${reason}`;
        console.error(`[Orchestrator] ${error}`);
        return { success: false, answer: error, planDisplay: '', error };
    }

    getDataPreview(nRows = 5): DataTable | null {
        return this.currentTable ? head(this.currentTable, nRows) : null;
    }

    getDataSchema(): string {
        return this.currentTable ? this.dataLoader.schema(this.currentTable) : NO_DATA;
    }

    getDataInfo(): string {
        return this.currentTable ? this.dataLoader.info(this.currentTable) : NO_DATA;
    }

    getConversationHistory(): Message[] {
        return [...this.memory.messages];
    }

    getFullContext(): string {
        return this.memory.getFullContext();
    }

    getLastPlan(): ExecutionPlan | null {
        return this.lastPlan;
    }

    // Clear conversation history but keep data.
    clearConversation(): void {
        this.memory.clearMessages();
        this.lastPlan = null;
    }

    reset(): void {
        this.currentTable = null;
        this.lastPlan = null;
        this.memory.clear();
        this.executor.clearTable();
    }
}
