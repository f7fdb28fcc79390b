import OpenAI from 'openai';
import { GoogleGenerativeAIError, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import { InferenceError, InferenceErrorKind } from '../types';

function kindForStatus(status: number, message: string): InferenceErrorKind {
    if (status === 401 || status === 403) return 'authentication';
    // Gemini answers a bad key with 400 INVALID_ARGUMENT
    if (status === 400 && /api key/i.test(message)) return 'authentication';
    if (status === 429) return 'rate_limit';
    return 'service';
}

/**
 * Maps whatever a vendor SDK threw onto an InferenceError
 */
export function describeInferenceError(error: unknown): InferenceError {
    if (error instanceof InferenceError) {
        return error;
    }

    if (error instanceof OpenAI.APIConnectionError) {
        return new InferenceError(error.message, 'connection', undefined, error);
    }

    if (error instanceof OpenAI.APIError) {
        const kind = error.status === undefined ? 'service' : kindForStatus(error.status, error.message);
        return new InferenceError(error.message, kind, error.status, error);
    }

    if (error instanceof GoogleGenerativeAIFetchError) {
        const kind = error.status === undefined ? 'connection' : kindForStatus(error.status, error.message);
        return new InferenceError(error.message, kind, error.status, error);
    }

    if (error instanceof GoogleGenerativeAIError) {
        const kind = error.message.includes('Error fetching from') ? 'connection' : 'service';
        return new InferenceError(error.message, kind, undefined, error);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new InferenceError(message, 'unknown', undefined, error);
}

/**
 * Human-readable failure reason shown to the inspector as-is
 */
export function failureReason(error: InferenceError): string {
    switch (error.kind) {
        case 'authentication':
            return `Authentication failed: ${error.message}`;
        case 'rate_limit':
            return `Rate limit exceeded: ${error.message}`;
        case 'connection':
            return `Could not reach inference service: ${error.message}`;
        case 'service':
            return `Inference service error: ${error.message}`;
        case 'empty_response':
            return 'Inference service returned no text';
        case 'unknown':
            return `Error: ${error.message}`;
    }
}
