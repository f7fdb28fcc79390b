export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;
export const MAX_CONTEXT_CHARS = 500;
export const MAX_DEFECT_CHARS = 1000;
export const ALLOWED_IMAGE_TYPES = new Set(['image/jpeg', 'image/png']);

export const LIMIT_MESSAGES = {
    contextTooLong: `Additional context should be under ${MAX_CONTEXT_CHARS} characters.`,
    defectTooLong: `Defect comment should be under ${MAX_DEFECT_CHARS} characters.`,
    imageTooLarge: 'The uploaded image exceeds the 5MB size limit. Please upload a smaller image.',
    imageMissing: 'Please upload an image to analyze.',
    imageTypeNotAllowed: 'Only JPEG and PNG images are allowed',
    defectMissing: 'Please enter a defect description to analyze.',
} as const;

export interface BoundedText {
    text: string;
    truncated: boolean;
}

/**
 * Cut text to at most maxChars UTF-16 code units
 */
export function boundText(text: string, maxChars: number): BoundedText {
    if (text.length <= maxChars) {
        return { text, truncated: false };
    }
    return { text: text.slice(0, maxChars), truncated: true };
}

export function boundContext(raw: unknown): { text: string; warnings: string[] } {
    const { text, truncated } = boundText(typeof raw === 'string' ? raw : '', MAX_CONTEXT_CHARS);
    return { text, warnings: truncated ? [LIMIT_MESSAGES.contextTooLong] : [] };
}

export function boundDefect(raw: unknown): { text: string; warnings: string[] } {
    const { text, truncated } = boundText(typeof raw === 'string' ? raw : '', MAX_DEFECT_CHARS);
    return { text, warnings: truncated ? [LIMIT_MESSAGES.defectTooLong] : [] };
}
