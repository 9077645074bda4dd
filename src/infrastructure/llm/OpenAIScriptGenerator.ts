import axios from 'axios';
import { IScriptGenerator } from '../../domain/ports/IScriptGenerator';
import { ProductRecord, getProductDescription, getProductName, getProductPrice } from '../../domain/entities/Product';
import { UpstreamRequestError } from '../../domain/errors';
import { withRetry } from '../http/RetryUtils';
import { toUpstreamError } from '../http/upstreamError';

const SYSTEM_PROMPT =
    'You are a creative video script writer specializing in engaging product marketing content.';

const RETRYABLE_STATUSES = new Set([429, 502, 503]);

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

export interface OpenAIScriptGeneratorOptions {
    model?: string;
    baseUrl?: string;
    temperature?: number;
    maxTokens?: number;
    maxAttempts?: number;
    /** First retry delay; doubles per attempt */
    initialBackoffMs?: number;
}

/**
 * Writes spoken product scripts with OpenAI chat completions.
 */
export class OpenAIScriptGenerator implements IScriptGenerator {
    private readonly model: string;
    private readonly baseUrl: string;
    private readonly temperature: number;
    private readonly maxTokens: number;
    private readonly maxAttempts: number;
    private readonly initialBackoffMs: number;

    constructor(private readonly apiKey: string, options: OpenAIScriptGeneratorOptions = {}) {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.model = options.model ?? 'gpt-4-turbo-preview';
        this.baseUrl = options.baseUrl ?? 'https://api.openai.com';
        this.temperature = options.temperature ?? 0.7;
        this.maxTokens = options.maxTokens ?? 500;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    }

    async generateScript(product: ProductRecord): Promise<string> {
        const name = getProductName(product);
        console.log(`[OpenAI] Generating script for ${name}`);

        let data: ChatCompletionResponse;
        try {
            data = await withRetry(() => this.requestCompletion(buildScriptPrompt(product)), {
                maxAttempts: this.maxAttempts,
                initialBackoffMs: this.initialBackoffMs,
                jitter: 0,
                isRetryable: isTransientOpenAIError,
                onRetry: (attempt, _error, delay) => {
                    console.warn(`[OpenAI] Transient error on attempt ${attempt}, retrying in ${Math.round(delay / 1000)}s...`);
                },
            });
        } catch (error) {
            throw toUpstreamError('OpenAI', error, 'Script generation');
        }

        const script = data.choices?.[0]?.message?.content?.trim();
        if (!script) {
            throw new UpstreamRequestError('OpenAI', 'Script generation returned no content');
        }

        console.log(`[OpenAI] Script ready for ${name} (${script.length} chars)`);
        return script;
    }

    private async requestCompletion(prompt: string): Promise<ChatCompletionResponse> {
        const response = await axios.post<ChatCompletionResponse>(
            `${this.baseUrl}/v1/chat/completions`,
            {
                model: this.model,
                messages: [
                    { role: 'system', content: SYSTEM_PROMPT },
                    { role: 'user', content: prompt },
                ],
                temperature: this.temperature,
                max_tokens: this.maxTokens,
            },
            {
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                },
            }
        );
        return response.data;
    }
}

function isTransientOpenAIError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }
    const status = error.response?.status;
    return status !== undefined && RETRYABLE_STATUSES.has(status);
}

export function buildScriptPrompt(product: ProductRecord): string {
    return `Create a 30-60 second video script for this product:

Product Name: ${getProductName(product)}
Description: ${getProductDescription(product)}
Price: ${getProductPrice(product)}

Requirements:
- Hook viewers in the first 3 seconds
- Highlight key benefits and features
- Include a clear call-to-action
- Keep it conversational and enthusiastic
- Make it suitable for text-to-speech narration

Format the script as natural spoken dialogue without stage directions.`;
}
