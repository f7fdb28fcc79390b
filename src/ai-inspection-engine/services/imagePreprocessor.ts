import sharp from 'sharp';
import { ImageDecodeError, NormalizeOutcome } from '../types';

export const MAX_IMAGE_WIDTH = 800;
export const MAX_IMAGE_HEIGHT = 800;
export const JPEG_QUALITY = 70;

/**
 * Downscales an uploaded image to fit 800x800 and re-encodes it as JPEG 70.
 * Never throws: undecodable input comes back as an ImageDecodeError.
 *
 * The compressed payload is not re-checked against the upload limit.
 */
export async function normalizeImage(
    rawImageBytes: Buffer,
    requestId: string = 'unknown'
): Promise<NormalizeOutcome> {
    const tStart = performance.now();
    const original_bytes = rawImageBytes.length;

    try {
        const { data, info } = await sharp(rawImageBytes)
            .rotate()
            .resize(MAX_IMAGE_WIDTH, MAX_IMAGE_HEIGHT, { fit: 'inside', withoutEnlargement: true })
            .flatten({ background: '#ffffff' })
            .jpeg({ quality: JPEG_QUALITY })
            .toBuffer({ resolveWithObject: true });

        const resize_time_ms = Math.round(performance.now() - tStart);
        console.log(`[PERF_IMAGE_NORMALIZE] [${requestId}] original_bytes=${original_bytes} resized_bytes=${data.length} width=${info.width} height=${info.height} resize_time_ms=${resize_time_ms}`);

        return {
            ok: true,
            image: {
                base64: data.toString('base64'),
                width: info.width,
                height: info.height,
                originalBytes: original_bytes,
                encodedBytes: data.length,
            },
        };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[PERF_IMAGE_NORMALIZE] [${requestId}] stage=decode error="${message}" original_bytes=${original_bytes}`);
        return { ok: false, error: new ImageDecodeError(`Error processing image: ${message}`, error) };
    }
}
