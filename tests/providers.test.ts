import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { GoogleGenerativeAI, GoogleGenerativeAIError, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { ModelParams, Part } from '@google/generative-ai';
import { OpenAiInferenceProvider, toChatCompletionParams } from '../src/ai-inspection-engine/providers/openai';
import { GeminiInferenceProvider, toGeminiParts } from '../src/ai-inspection-engine/providers/gemini';
import { describeInferenceError, failureReason } from '../src/ai-inspection-engine/providers/errors';
import { buildDefectRequest, buildImageRequest } from '../src/ai-inspection-engine/services/requestBuilder';
import { DEFECT_ANALYSIS_PROMPT, IMAGE_ANALYSIS_PROMPT } from '../src/ai-inspection-engine/prompts/inspection';
import { InferenceError } from '../src/ai-inspection-engine';

describe('toChatCompletionParams', () => {
    it('sends text then the embedded image in one user message', () => {
        const request = buildImageRequest('aGVsbG8=', 'Crawlspace', IMAGE_ANALYSIS_PROMPT);

        expect(toChatCompletionParams(request, 'gpt-4o-mini-2024-07-18')).toEqual({
            model: 'gpt-4o-mini-2024-07-18',
            messages: [
                {
                    role: 'user',
                    content: [
                        { type: 'text', text: `${IMAGE_ANALYSIS_PROMPT}\n\nContext: Crawlspace` },
                        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,aGVsbG8=' } },
                    ],
                },
            ],
            max_tokens: 1000,
        });
    });

    it('sends the defect comment as plain text content', () => {
        const request = buildDefectRequest('Cracked foundation wall near northeast corner', DEFECT_ANALYSIS_PROMPT);

        expect(toChatCompletionParams(request, 'gpt-4o-mini-2024-07-18')).toEqual({
            model: 'gpt-4o-mini-2024-07-18',
            messages: [
                {
                    role: 'user',
                    content: DEFECT_ANALYSIS_PROMPT + '\n\nDefect Comment: Cracked foundation wall near northeast corner',
                },
            ],
            max_tokens: 1000,
        });
    });
});

describe('OpenAiInferenceProvider', () => {
    function chatClient(completion: ChatCompletion) {
        const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => completion);
        return { create, client: { chat: { completions: { create } } } };
    }

    function completionWith(content: string | null): ChatCompletion {
        return {
            id: 'chatcmpl-test',
            object: 'chat.completion',
            created: 0,
            model: 'gpt-4o-mini-2024-07-18',
            choices: [
                {
                    index: 0,
                    finish_reason: 'stop',
                    logprobs: null,
                    message: { role: 'assistant', content, refusal: null },
                },
            ],
            usage: { prompt_tokens: 850, completion_tokens: 40, total_tokens: 890 },
        };
    }

    it('returns the first completion text and token usage', async () => {
        const { create, client } = chatClient(completionWith('Efflorescence indicates moisture intrusion.'));
        const provider = new OpenAiInferenceProvider(client, 'gpt-4o-mini-2024-07-18');
        const request = buildDefectRequest('Efflorescence on wall', DEFECT_ANALYSIS_PROMPT);

        const completion = await provider.complete(request);

        expect(completion).toEqual({
            text: 'Efflorescence indicates moisture intrusion.',
            usage: { input_tokens: 850, output_tokens: 40 },
        });
        expect(create).toHaveBeenCalledTimes(1);
        expect(create).toHaveBeenCalledWith(toChatCompletionParams(request, 'gpt-4o-mini-2024-07-18'));
    });

    it('throws an empty_response InferenceError when the completion has no content', async () => {
        const { client } = chatClient(completionWith(null));
        const provider = new OpenAiInferenceProvider(client);

        await expect(provider.complete(buildDefectRequest('Loose handrail', 'Prompt'))).rejects.toMatchObject({
            name: 'InferenceError',
            kind: 'empty_response',
        });
    });

    it('defaults to the gpt-4o-mini snapshot', () => {
        const provider = new OpenAiInferenceProvider(new OpenAI({ apiKey: 'test-secret', maxRetries: 0 }));

        expect(provider.model).toBe('gpt-4o-mini-2024-07-18');
        expect(provider.name).toBe('openai');
    });
});

describe('toGeminiParts', () => {
    it('adds inline JPEG data after the text for image requests', () => {
        const request = buildImageRequest('aGVsbG8=', 'Garage', 'Prompt');

        expect(toGeminiParts(request)).toEqual([
            { text: 'Prompt\n\nContext: Garage' },
            { inlineData: { data: 'aGVsbG8=', mimeType: 'image/jpeg' } },
        ]);
    });

    it('sends only text for defect requests', () => {
        const request = buildDefectRequest('Loose handrail', 'Prompt');

        expect(toGeminiParts(request)).toEqual([{ text: 'Prompt\n\nDefect Comment: Loose handrail' }]);
    });
});

describe('GeminiInferenceProvider', () => {
    function geminiClient(text: string) {
        const generateContent = vi.fn(async (_request: Part[]) => ({
            response: {
                text: () => text,
                usageMetadata: { promptTokenCount: 700, candidatesTokenCount: 55, totalTokenCount: 755 },
            },
        }));
        const getGenerativeModel = vi.fn((_params: ModelParams) => ({ generateContent }));
        return { generateContent, getGenerativeModel, client: { getGenerativeModel } };
    }

    it('caps output tokens and returns text with usage', async () => {
        const { generateContent, getGenerativeModel, client } = geminiClient('Handrail anchors are loose.');
        const provider = new GeminiInferenceProvider(client, 'gemini-2.0-flash');
        const request = buildDefectRequest('Loose handrail', 'Prompt');

        const completion = await provider.complete(request);

        expect(getGenerativeModel).toHaveBeenCalledWith({
            model: 'gemini-2.0-flash',
            generationConfig: { maxOutputTokens: 1000 },
        });
        expect(generateContent).toHaveBeenCalledWith(toGeminiParts(request));
        expect(completion).toEqual({
            text: 'Handrail anchors are loose.',
            usage: { input_tokens: 700, output_tokens: 55 },
        });
    });

    it('throws an empty_response InferenceError on blank text', async () => {
        const { client } = geminiClient('');
        const provider = new GeminiInferenceProvider(client);

        await expect(provider.complete(buildDefectRequest('Loose handrail', 'Prompt'))).rejects.toMatchObject({
            kind: 'empty_response',
        });
    });

    it('accepts a real SDK client', () => {
        const provider = new GeminiInferenceProvider(new GoogleGenerativeAI('test-secret'));

        expect(provider.model).toBe('gemini-2.0-flash');
    });
});

describe('describeInferenceError', () => {
    it('maps an OpenAI 401 to an authentication failure', () => {
        const error = describeInferenceError(
            new OpenAI.AuthenticationError(401, { message: 'Incorrect API key provided: test-secret' }, undefined, {})
        );

        expect(error.kind).toBe('authentication');
        expect(error.status).toBe(401);
        expect(failureReason(error)).toMatch(/^Authentication failed: /);
        expect(failureReason(error)).toContain('Incorrect API key provided');
    });

    it('maps an OpenAI 429 to a rate limit failure', () => {
        const error = describeInferenceError(
            new OpenAI.RateLimitError(429, { message: 'Rate limit reached' }, undefined, {})
        );

        expect(error.kind).toBe('rate_limit');
    });

    it('maps an OpenAI 500 to a service failure', () => {
        const error = describeInferenceError(
            new OpenAI.InternalServerError(500, { message: 'The server had an error' }, undefined, {})
        );

        expect(error.kind).toBe('service');
        expect(failureReason(error)).toMatch(/^Inference service error: /);
    });

    it('maps a connection error to a connection failure', () => {
        const error = describeInferenceError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));

        expect(error.kind).toBe('connection');
        expect(failureReason(error)).toBe('Could not reach inference service: socket hang up');
    });

    it('treats a Gemini 400 about the API key as an authentication failure', () => {
        const error = describeInferenceError(
            new GoogleGenerativeAIFetchError('API key not valid. Please pass a valid API key.', 400, 'Bad Request')
        );

        expect(error.kind).toBe('authentication');
        expect(error.status).toBe(400);
    });

    it('treats a Gemini fetch failure as a connection failure', () => {
        const error = describeInferenceError(
            new GoogleGenerativeAIError('Error fetching from https://generativelanguage.googleapis.com: fetch failed')
        );

        expect(error.kind).toBe('connection');
    });

    it('passes InferenceError through and wraps anything else as unknown', () => {
        const empty = new InferenceError('No content in first completion choice', 'empty_response');

        expect(describeInferenceError(empty)).toBe(empty);
        expect(failureReason(empty)).toBe('Inference service returned no text');

        const other = describeInferenceError(new TypeError('boom'));
        expect(other.kind).toBe('unknown');
        expect(failureReason(other)).toBe('Error: boom');
    });
});
