/**
 * Prompts for the two inspection analysis kinds.
 *
 * Future: per-system prompts (roofing, electrical, plumbing) selected from the context
 */

export const IMAGE_ANALYSIS_PROMPT =
    'Please analyze the given image along with any provided text context (if any) and provide an analysis ' +
    'of any deficiencies or conditions, safety concerns, functionality issues, etc.';

export const DEFECT_ANALYSIS_PROMPT =
    'Please analyze the given deficiency comment and provide a more detailed breakdown of the comment ' +
    'to allow for better understanding.';
