export const COST_CONSTANTS = {
    OPENAI_GPT_4O_MINI: {
        INPUT_PER_1M: 0.15,
        OUTPUT_PER_1M: 0.6,
    },
    GEMINI_FLASH_TEXT: {
        INPUT_PER_1M: 0.075,
        OUTPUT_PER_1M: 0.30,
    },
};

export interface CostEstimate {
    step: string;
    model: string;
    input_tokens: number;
    output_tokens: number;
    estimated_cost_usd: number;
}

function ratesForModel(model: string) {
    if (model.startsWith('gemini-') && model.includes('flash')) {
        return COST_CONSTANTS.GEMINI_FLASH_TEXT;
    }
    // Unknown models are priced like gpt-4o-mini
    return COST_CONSTANTS.OPENAI_GPT_4O_MINI;
}

export function estimateTextCostUsd({
    model,
    input_tokens,
    output_tokens
}: {
    model: string;
    input_tokens: number;
    output_tokens: number;
}): number {
    const rates = ratesForModel(model);
    const inputCost = (input_tokens / 1_000_000) * rates.INPUT_PER_1M;
    const outputCost = (output_tokens / 1_000_000) * rates.OUTPUT_PER_1M;
    return Number((inputCost + outputCost).toFixed(6));
}

export function buildCostEstimate(
    step: string,
    model: string,
    usage: { input_tokens: number; output_tokens: number }
): CostEstimate {
    return {
        step,
        model,
        input_tokens: usage.input_tokens,
        output_tokens: usage.output_tokens,
        estimated_cost_usd: estimateTextCostUsd({ model, ...usage }),
    };
}
