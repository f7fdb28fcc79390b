import { Readable } from 'stream';
import sharp from 'sharp';
import type { AnalysisRequest, InferenceProvider, ProviderCompletion } from '../../src/ai-inspection-engine';

export class FakeProvider implements InferenceProvider {
    readonly name = 'openai' as const;
    readonly model = 'test-model';
    readonly requests: AnalysisRequest[] = [];

    constructor(private respond: (request: AnalysisRequest) => Promise<ProviderCompletion>) {}

    complete(request: AnalysisRequest): Promise<ProviderCompletion> {
        this.requests.push(request);
        return this.respond(request);
    }
}

export function replyWith(text: string, input_tokens = 1200, output_tokens = 300) {
    return new FakeProvider(async () => ({ text, usage: { input_tokens, output_tokens } }));
}

export function failWith(error: unknown) {
    return new FakeProvider(async () => {
        throw error;
    });
}

export function solidImage(width: number, height: number, channels: 3 | 4 = 3) {
    return sharp({
        create: { width, height, channels, background: { r: 140, g: 110, b: 80, alpha: 1 } },
    });
}

export function multerFile(buffer: Buffer, mimetype: string): Express.Multer.File {
    return {
        fieldname: 'image',
        originalname: mimetype === 'image/png' ? 'photo.png' : 'photo.jpg',
        encoding: '7bit',
        mimetype,
        size: buffer.length,
        stream: Readable.from([]),
        destination: '',
        filename: '',
        path: '',
        buffer,
    };
}
