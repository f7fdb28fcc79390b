import OpenAI from 'openai';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { AnalysisResult, ConfigurationError, InferenceProvider, UploadedImage } from './types';
import { normalizeImage } from './services/imagePreprocessor';
import { buildDefectRequest, buildImageRequest } from './services/requestBuilder';
import { InferenceClient } from './services/inferenceClient';
import { OpenAiInferenceProvider } from './providers/openai';
import { GeminiInferenceProvider } from './providers/gemini';
import { DEFECT_ANALYSIS_PROMPT, IMAGE_ANALYSIS_PROMPT } from './prompts/inspection';
import type { AppConfig } from '../lib/config';

// Export types
export * from './types';
export { InferenceClient } from './services/inferenceClient';

function getProvider(config: AppConfig): InferenceProvider {
    switch (config.provider) {
        case 'openai':
            return new OpenAiInferenceProvider(
                new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 }),
                config.model
            );
        case 'gemini':
            return new GeminiInferenceProvider(new GoogleGenerativeAI(config.apiKey), config.model);
        default:
            throw new ConfigurationError(`Unknown inference provider: ${String(config.provider)}`);
    }
}

/**
 * Build the inference client for the configured provider.
 * The credential is handed to the vendor SDK here and nowhere else.
 */
export function createInferenceClient(config: AppConfig): InferenceClient {
    return new InferenceClient(getProvider(config));
}

/**
 * Analyze an inspection photo with optional free-text context
 *
 * @param upload - Image already checked against the upload limit
 * @param contextText - Context already bounded by the caller
 */
export async function analyzeInspectionImage(
    client: InferenceClient,
    upload: UploadedImage,
    contextText: string,
    requestId: string = 'unknown'
): Promise<AnalysisResult> {
    const normalized = await normalizeImage(upload.bytes, requestId);
    if (!normalized.ok) {
        return { ok: false, reason: normalized.error.message, error: normalized.error };
    }

    const request = buildImageRequest(normalized.image.base64, contextText, IMAGE_ANALYSIS_PROMPT);
    return client.send(request, requestId);
}

/**
 * Expand a defect comment into a detailed breakdown
 */
export async function analyzeDefectComment(
    client: InferenceClient,
    defectText: string,
    requestId: string = 'unknown'
): Promise<AnalysisResult> {
    const request = buildDefectRequest(defectText, DEFECT_ANALYSIS_PROMPT);
    return client.send(request, requestId);
}
