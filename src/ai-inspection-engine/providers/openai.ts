import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { AnalysisRequest, InferenceError, InferenceProvider, ProviderCompletion } from '../types';
import { defectRequestText, imageDataUri, imageRequestText } from '../services/requestBuilder';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini-2024-07-18';
export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

/**
 * One user message: text + embedded image, or text only
 */
export function toChatCompletionParams(
    request: AnalysisRequest,
    model: string
): ChatCompletionCreateParamsNonStreaming {
    if (request.kind === 'image_analysis') {
        return {
            model,
            messages: [
                {
                    role: 'user',
                    content: [
                        { type: 'text', text: imageRequestText(request) },
                        { type: 'image_url', image_url: { url: imageDataUri(request) } },
                    ],
                },
            ],
            max_tokens: request.maxOutputTokens,
        };
    }

    return {
        model,
        messages: [{ role: 'user', content: defectRequestText(request) }],
        max_tokens: request.maxOutputTokens,
    };
}

/**
 * The part of the OpenAI SDK this provider calls; an `OpenAI` instance satisfies it
 */
export interface OpenAiChatClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export class OpenAiInferenceProvider implements InferenceProvider {
    readonly name = 'openai' as const;

    constructor(
        private client: OpenAiChatClient,
        readonly model: string = DEFAULT_OPENAI_MODEL
    ) {}

    async complete(request: AnalysisRequest): Promise<ProviderCompletion> {
        const response = await this.client.chat.completions.create(toChatCompletionParams(request, this.model));

        const text = response.choices[0]?.message?.content;
        if (!text) {
            throw new InferenceError('No content in first completion choice', 'empty_response');
        }

        return {
            text,
            usage: {
                input_tokens: response.usage?.prompt_tokens ?? 0,
                output_tokens: response.usage?.completion_tokens ?? 0,
            },
        };
    }
}
