import { GoogleGenAI } from '@google/genai';
import type { Schema } from '@google/genai';
import { z } from 'zod';
import type { AiConfig } from '../config';
import { ConfigurationError, errorMessage } from '../utils/errors';

export type GenerationResult = { ok: true; text: string } | { ok: false; reason: string };

export interface TextGenerationRequest {
    system: string;
    prompt: string;
    temperature?: number;
    maxOutputTokens?: number;
}

export interface JsonGenerationRequest extends TextGenerationRequest {
    // Output shape enforced by the model call itself, not just asked for in the prompt.
    schema: Schema;
    schemaName: string;
}

/**
 * A model endpoint. Implementations never throw: every failure comes back
 * as `{ ok: false, reason }`.
 */
export interface GenerationClient {
    generateJson(request: JsonGenerationRequest): Promise<GenerationResult>;
    generateText(request: TextGenerationRequest): Promise<GenerationResult>;
}

const RETRY_DELAY_MS = 500;

// Helper for retrying API calls
export const withRetry = async <T>(fn: () => Promise<T>, retries = 2, delayMs = RETRY_DELAY_MS): Promise<T> => {
    let lastError: unknown;
    for (let i = 0; i < retries; i++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;
            console.warn(`[AI Service] API call failed, retrying... (${i + 1}/${retries})`, errorMessage(error));
            if (i < retries - 1) {
                await new Promise((res) => setTimeout(res, delayMs));
            }
        }
    }
    throw lastError;
};

export const stripCodeFences = (text: string): string =>
    text.trim().replace(/^```(?:json)?\s*\n?/, '').replace(/\n?```$/, '').trim();

const toResult = async (call: () => Promise<string>): Promise<GenerationResult> => {
    try {
        const text = await call();
        return { ok: true, text };
    } catch (error) {
        console.error('[AI Service] Generation failed:', errorMessage(error));
        return { ok: false, reason: errorMessage(error) };
    }
};

export class GeminiClient implements GenerationClient {
    private readonly ai: GoogleGenAI;

    constructor(
        apiKey: string,
        private readonly model: string,
        baseUrl?: string,
        private readonly retryDelayMs = RETRY_DELAY_MS,
    ) {
        this.ai = new GoogleGenAI({ apiKey, ...(baseUrl ? { httpOptions: { baseUrl } } : {}) });
    }

    generateJson(request: JsonGenerationRequest): Promise<GenerationResult> {
        return toResult(async () => {
            const response = await withRetry(
                () =>
                    this.ai.models.generateContent({
                        model: this.model,
                        contents: request.prompt,
                        config: {
                            systemInstruction: request.system,
                            temperature: request.temperature,
                            maxOutputTokens: request.maxOutputTokens,
                            responseMimeType: 'application/json',
                            responseSchema: request.schema,
                        },
                    }),
                2,
                this.retryDelayMs,
            );
            const text = response.text;
            if (!text) {
                throw new Error('Gemini returned an empty response.');
            }
            return stripCodeFences(text);
        });
    }

    generateText(request: TextGenerationRequest): Promise<GenerationResult> {
        return toResult(async () => {
            const response = await withRetry(
                () =>
                    this.ai.models.generateContent({
                        model: this.model,
                        contents: request.prompt,
                        config: {
                            systemInstruction: request.system,
                            temperature: request.temperature,
                            maxOutputTokens: request.maxOutputTokens,
                        },
                    }),
                2,
                this.retryDelayMs,
            );
            const text = response.text;
            if (!text) {
                throw new Error('Gemini returned an empty response.');
            }
            return text.trim();
        });
    }
}

const chatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().min(1) }),
            }),
        )
        .min(1),
});

/**
 * Converts a Gemini response schema into the JSON Schema dialect that
 * OpenAI-compatible gateways take for `response_format`.
 */
export const toJsonSchema = (schema: Schema): Record<string, unknown> => {
    const out: Record<string, unknown> = {};
    if (schema.type) {
        const type = schema.type.toLowerCase();
        out.type = schema.nullable ? [type, 'null'] : type;
    }
    if (schema.description) out.description = schema.description;
    if (schema.enum) out.enum = schema.nullable ? [...schema.enum, null] : schema.enum;
    if (schema.items) out.items = toJsonSchema(schema.items);
    if (schema.properties) {
        out.properties = Object.fromEntries(
            Object.entries(schema.properties).map(([key, value]) => [key, toJsonSchema(value)]),
        );
        out.additionalProperties = false;
    }
    if (schema.required) out.required = schema.required;
    return out;
};

/**
 * POSTs to an AI Gateway following the OpenAI chat-completions structure.
 */
export class GatewayClient implements GenerationClient {
    constructor(
        private readonly gatewayUrl: string,
        private readonly apiKey: string,
        private readonly model: string,
        private readonly retryDelayMs = RETRY_DELAY_MS,
    ) {}

    generateJson(request: JsonGenerationRequest): Promise<GenerationResult> {
        return toResult(async () => {
            const content = await this.complete(request, {
                type: 'json_schema',
                json_schema: { name: request.schemaName, strict: true, schema: toJsonSchema(request.schema) },
            });
            return stripCodeFences(content);
        });
    }

    generateText(request: TextGenerationRequest): Promise<GenerationResult> {
        return toResult(async () => (await this.complete(request)).trim());
    }

    private async complete(request: TextGenerationRequest, responseFormat?: Record<string, unknown>): Promise<string> {
        const fullGatewayUrl = `${this.gatewayUrl}/${this.model}/v1/chat/completions`;
        console.log(`[AI Service] Sending request to Gateway URL: ${fullGatewayUrl}`);

        const requestBody = {
            model: this.model,
            messages: [
                { role: 'system', content: request.system },
                { role: 'user', content: request.prompt },
            ],
            temperature: request.temperature,
            max_tokens: request.maxOutputTokens,
            stream: false,
            ...(responseFormat ? { response_format: responseFormat } : {}),
        };

        return withRetry(
            async () => {
                const response = await fetch(fullGatewayUrl, {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                        Authorization: `Bearer ${this.apiKey}`,
                    },
                    body: JSON.stringify(requestBody),
                });

                if (!response.ok) {
                    const errorText = await response.text();
                    throw new Error(`AI Gateway request failed with status ${response.status}: ${errorText}`);
                }

                const parsed = chatCompletionSchema.safeParse(await response.json());
                if (!parsed.success) {
                    throw new Error('Invalid response structure from AI Gateway.');
                }
                return parsed.data.choices[0].message.content;
            },
            2,
            this.retryDelayMs,
        );
    }
}

/**
 * Builds the client for the configured provider. Fails immediately when the
 * provider's credentials are missing.
 */
export const createGenerationClient = (config: AiConfig): GenerationClient => {
    if (config.provider === 'GATEWAY') {
        if (!config.gatewayUrl || !config.gatewayApiKey) {
            throw new ConfigurationError('AI Gateway is configured, but AI_GATEWAY_URL or AI_GATEWAY_API_KEY is missing.');
        }
        return new GatewayClient(config.gatewayUrl, config.gatewayApiKey, config.gatewayModel || config.geminiModel);
    }
    if (!config.geminiApiKey) {
        throw new ConfigurationError('GEMINI_API_KEY not found in environment variables.');
    }
    return new GeminiClient(config.geminiApiKey, config.geminiModel, config.geminiBaseUrl);
};
