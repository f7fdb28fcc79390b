import type { ModelParams, Part, UsageMetadata } from '@google/generative-ai';
import { AnalysisRequest, InferenceError, InferenceProvider, ProviderCompletion } from '../types';
import { requestText } from '../services/requestBuilder';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

export function toGeminiParts(request: AnalysisRequest): Part[] {
    const parts: Part[] = [{ text: requestText(request) }];
    if (request.kind === 'image_analysis') {
        parts.push({
            inlineData: {
                data: request.normalizedImageText,
                mimeType: 'image/jpeg',
            },
        });
    }
    return parts;
}

/**
 * The part of the Gemini SDK this provider calls; a `GoogleGenerativeAI` instance satisfies it
 */
export interface GeminiModelFactory {
    getGenerativeModel(params: ModelParams): {
        generateContent(request: Part[]): Promise<{
            response: { text(): string; usageMetadata?: UsageMetadata };
        }>;
    };
}

export class GeminiInferenceProvider implements InferenceProvider {
    readonly name = 'gemini' as const;

    constructor(
        private client: GeminiModelFactory,
        readonly model: string = DEFAULT_GEMINI_MODEL
    ) {}

    async complete(request: AnalysisRequest): Promise<ProviderCompletion> {
        const model = this.client.getGenerativeModel({
            model: this.model,
            generationConfig: {
                maxOutputTokens: request.maxOutputTokens,
            },
        });

        const result = await model.generateContent(toGeminiParts(request));
        const response = result.response;

        const text = response.text();
        if (!text) {
            throw new InferenceError('Gemini response contained no text', 'empty_response');
        }

        return {
            text,
            usage: {
                input_tokens: response.usageMetadata?.promptTokenCount ?? 0,
                output_tokens: response.usageMetadata?.candidatesTokenCount ?? 0,
            },
        };
    }
}
