import os from 'node:os';
import path from 'node:path';

export type AiProvider = 'GEMINI' | 'GATEWAY';

export interface AiConfig {
    provider: AiProvider;
    geminiApiKey?: string;
    // Optional proxy endpoint in front of the Gemini API.
    geminiBaseUrl?: string;
    geminiModel: string;
    gatewayUrl?: string;
    gatewayApiKey?: string;
    gatewayModel?: string;
}

export interface AppConfig {
    ai: AiConfig;
    chartOutputDir: string;
}

export const DEFAULT_MODEL = 'gemini-2.0-flash';

const nonEmpty = (value: string | undefined): string | undefined =>
    value && value.trim() !== '' ? value.trim() : undefined;

export const loadAiConfig = (env: NodeJS.ProcessEnv = process.env): AiConfig => {
    const provider: AiProvider = env.AI_PROVIDER?.toUpperCase() === 'GATEWAY' ? 'GATEWAY' : 'GEMINI';
    return {
        provider,
        geminiApiKey: nonEmpty(env.GEMINI_API_KEY),
        geminiBaseUrl: nonEmpty(env.GEMINI_BASE_URL),
        geminiModel: nonEmpty(env.GEMINI_MODEL) ?? DEFAULT_MODEL,
        gatewayUrl: nonEmpty(env.AI_GATEWAY_URL)?.replace(/\/+$/, ''),
        gatewayApiKey: nonEmpty(env.AI_GATEWAY_API_KEY),
        gatewayModel: nonEmpty(env.AI_GATEWAY_MODEL),
    };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
    ai: loadAiConfig(env),
    chartOutputDir: nonEmpty(env.CHART_OUTPUT_DIR) ?? path.join(os.tmpdir(), 'data-room-charts'),
});

/**
 * Logs the active provider setup. Secrets are only reported as set or not set.
 */
export const logAiConfig = (config: AiConfig): void => {
    console.groupCollapsed('[AI Service] Configuration Loaded');
    console.info(`AI Provider: ${config.provider}`);
    if (config.provider === 'GATEWAY') {
        console.log(`Gateway Base URL: ${config.gatewayUrl || 'Not Set'}`);
        console.log(`Gateway Model: ${config.gatewayModel || `(default: ${config.geminiModel})`}`);
        console.log(`Gateway API Key Set: ${!!config.gatewayApiKey}`);
    } else {
        console.log(`Gemini Model: ${config.geminiModel}`);
        console.log(`Gemini Base URL: ${config.geminiBaseUrl || '(default)'}`);
        console.log(`Gemini API Key Set: ${!!config.geminiApiKey}`);
    }
    console.groupEnd();
};
