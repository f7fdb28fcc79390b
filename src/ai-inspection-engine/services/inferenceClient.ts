import { AnalysisRequest, AnalysisResult, InferenceProvider } from '../types';
import { describeInferenceError, failureReason } from '../providers/errors';

/**
 * Sends one analysis request per call: Built -> Sent -> (Succeeded | Failed).
 * No retry; failures come back as { ok: false } instead of being thrown.
 */
export class InferenceClient {
    constructor(private provider: InferenceProvider) {}

    get providerName() {
        return this.provider.name;
    }

    get model() {
        return this.provider.model;
    }

    async send(request: AnalysisRequest, requestId: string = 'unknown'): Promise<AnalysisResult> {
        const tStart = performance.now();
        const tag = `[AI-Inspection] [${requestId}] provider=${this.provider.name} model=${this.provider.model} kind=${request.kind}`;
        console.log(`${tag} status=sent`);

        try {
            const { text, usage } = await this.provider.complete(request);
            const latency_ms = Math.round(performance.now() - tStart);
            console.log(`${tag} status=succeeded output_len=${text.length} input_tokens=${usage.input_tokens} output_tokens=${usage.output_tokens} latency_ms=${latency_ms}`);
            return { ok: true, text, model: this.provider.model, usage };
        } catch (error) {
            const inferenceError = describeInferenceError(error);
            const latency_ms = Math.round(performance.now() - tStart);
            console.error(`${tag} status=failed error_kind=${inferenceError.kind} http_status=${inferenceError.status ?? 'none'} latency_ms=${latency_ms} error="${inferenceError.message}"`);
            return { ok: false, reason: failureReason(inferenceError), error: inferenceError };
        }
    }
}
