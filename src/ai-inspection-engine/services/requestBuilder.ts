import { AnalysisRequest, DefectAnalysisRequest, ImageAnalysisRequest } from '../types';

export const MAX_OUTPUT_TOKENS = 1000;

// Text is forwarded as given; the HTTP layer bounds it before it gets here.
export function buildImageRequest(
    normalizedImageText: string,
    contextText: string,
    promptText: string
): AnalysisRequest {
    const request: ImageAnalysisRequest = {
        kind: 'image_analysis',
        normalizedImageText,
        contextText,
        promptText,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
    };
    return Object.freeze(request);
}

export function buildDefectRequest(defectText: string, promptText: string): AnalysisRequest {
    const request: DefectAnalysisRequest = {
        kind: 'defect_analysis',
        defectText,
        promptText,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
    };
    return Object.freeze(request);
}

export function imageRequestText(request: ImageAnalysisRequest): string {
    return `${request.promptText}\n\nContext: ${request.contextText}`;
}

export function defectRequestText(request: DefectAnalysisRequest): string {
    return `${request.promptText}\n\nDefect Comment: ${request.defectText}`;
}

export function imageDataUri(request: ImageAnalysisRequest): string {
    return `data:image/jpeg;base64,${request.normalizedImageText}`;
}

/**
 * The single text block sent to the model for either request kind
 */
export function requestText(request: AnalysisRequest): string {
    return request.kind === 'image_analysis' ? imageRequestText(request) : defectRequestText(request);
}
