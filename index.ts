export * from './types';
export { loadAiConfig, loadConfig, logAiConfig, DEFAULT_MODEL } from './config';
export type { AiConfig, AiProvider, AppConfig } from './config';
export { ConfigurationError, ExecutionError } from './utils/errors';
export { ConversationMemory, DEFAULT_MAX_MESSAGES, NO_CONTEXT, NO_CONVERSATION } from './utils/memory';
export { DataLoader, MAX_FILE_SIZE_BYTES, SUPPORTED_EXTENSIONS, NO_DATA } from './utils/dataLoader';
export { GeminiClient, GatewayClient, createGenerationClient } from './services/geminiService';
export type { GenerationClient, GenerationResult, JsonGenerationRequest, TextGenerationRequest } from './services/geminiService';
export { PlannerAgent, fallbackPlan, formatPlanDisplay, EXECUTION_PLAN_SCHEMA } from './services/planner';
export type { Planner, PlannerOptions } from './services/planner';
export { PlanExecutor, normalizeChartType, normalizeAggregation } from './services/planExecutor';
export type { Executor, PlanExecutorOptions } from './services/planExecutor';
export { JsonChartWriter } from './services/chartWriter';
export type { ChartWriter } from './services/chartWriter';
export { AgentOrchestrator, NO_DATA_ERROR } from './services/orchestrator';
export type { OrchestratorOptions } from './services/orchestrator';
export { SessionRegistry } from './services/sessionRegistry';
export type { OrchestratorFactory } from './services/sessionRegistry';
