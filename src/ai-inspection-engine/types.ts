/**
 * Type definitions for the home inspection analysis engine
 */

// ============================================
// Images
// ============================================

export interface UploadedImage {
    bytes: Buffer;
    mimeType: string;
    sizeBytes: number;
}

export interface NormalizedImage {
    base64: string; // JPEG, no data-URI prefix
    width: number;
    height: number;
    originalBytes: number;
    encodedBytes: number;
}

export type NormalizeOutcome =
    | { ok: true; image: NormalizedImage }
    | { ok: false; error: ImageDecodeError };

// ============================================
// Requests
// ============================================

export interface ImageAnalysisRequest {
    readonly kind: 'image_analysis';
    readonly normalizedImageText: string;
    readonly contextText: string;
    readonly promptText: string;
    readonly maxOutputTokens: number;
}

export interface DefectAnalysisRequest {
    readonly kind: 'defect_analysis';
    readonly defectText: string;
    readonly promptText: string;
    readonly maxOutputTokens: number;
}

export type AnalysisRequest = ImageAnalysisRequest | DefectAnalysisRequest;

export type AnalysisKind = AnalysisRequest['kind'];

// ============================================
// Results
// ============================================

export interface TokenUsage {
    input_tokens: number;
    output_tokens: number;
}

export interface ProviderCompletion {
    text: string;
    usage: TokenUsage;
}

export type AnalysisResult =
    | { ok: true; text: string; model: string; usage: TokenUsage }
    | { ok: false; reason: string; error: ImageDecodeError | InferenceError };

/**
 * Adapter for one vendor's multimodal completion API
 */
export interface InferenceProvider {
    readonly name: ProviderName;
    readonly model: string;
    complete(request: AnalysisRequest): Promise<ProviderCompletion>;
}

export type ProviderName = 'openai' | 'gemini';

// ============================================
// Errors
// ============================================

export class ConfigurationError extends Error {
    constructor(
        message: string,
        public issues: string[] = []
    ) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class ImageDecodeError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ImageDecodeError';
    }
}

export type InferenceErrorKind =
    | 'authentication'
    | 'rate_limit'
    | 'connection'
    | 'service'
    | 'empty_response'
    | 'unknown';

export class InferenceError extends Error {
    constructor(
        message: string,
        public kind: InferenceErrorKind,
        public status?: number,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'InferenceError';
    }
}
