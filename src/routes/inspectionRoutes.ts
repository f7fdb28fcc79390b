import { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import {
    analyzeDefectComment,
    analyzeInspectionImage,
    AnalysisKind,
    AnalysisResult,
    InferenceClient,
    InferenceError,
} from '../ai-inspection-engine';
import { buildCostEstimate } from '../lib/costDebug';
import { createRateLimiter, getRequestId, RateLimitOptions, sendError } from '../lib/api-harden';
import {
    ALLOWED_IMAGE_TYPES,
    boundContext,
    boundDefect,
    LIMIT_MESSAGES,
    MAX_UPLOAD_BYTES,
} from '../lib/inputLimits';

// Configure Multer for memory storage, 5MB limit, JPEG/PNG only.
// busboy flags a file once it reaches fileSize bytes, so exactly 5 MiB needs one byte of headroom.
const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES + 1 },
    fileFilter: (_req, file, cb) => {
        if (ALLOWED_IMAGE_TYPES.has(file.mimetype)) {
            cb(null, true);
        } else {
            cb(new Error(LIMIT_MESSAGES.imageTypeNotAllowed));
        }
    },
});

/**
 * Runs multer for the 'image' field and turns its errors into 400/413 responses
 */
export function uploadImage(req: Request, res: Response, next: NextFunction) {
    upload.single('image')(req, res, (error: unknown) => {
        if (!error) {
            return next();
        }
        if (error instanceof multer.MulterError) {
            if (error.code === 'LIMIT_FILE_SIZE') {
                return sendError(res, 413, LIMIT_MESSAGES.imageTooLarge);
            }
            if (error.code === 'LIMIT_UNEXPECTED_FILE') {
                return sendError(res, 400, 'Invalid upload field', 'Use field name "image" for the image file');
            }
            return sendError(res, 400, 'Upload error', error.message);
        }
        if (error instanceof Error && error.message === LIMIT_MESSAGES.imageTypeNotAllowed) {
            return sendError(res, 400, LIMIT_MESSAGES.imageTypeNotAllowed);
        }
        // Malformed multipart bodies surface as plain busboy errors
        console.warn(`[Upload] [${getRequestId(res)}] rejected multipart body: ${error instanceof Error ? error.message : String(error)}`);
        return sendError(res, 400, 'Upload error', error instanceof Error ? error.message : 'Malformed multipart body');
    });
}

function respondWithResult(
    res: Response,
    kind: AnalysisKind,
    result: AnalysisResult,
    warnings: string[]
) {
    const requestId = getRequestId(res);

    if (result.ok) {
        console.log(JSON.stringify({
            event: 'analysis_success',
            timestamp: new Date().toISOString(),
            request_id: requestId,
            kind,
            model: result.model,
            output_len: result.text.length,
            warnings: warnings.length,
        }));
        return res.json({
            analysis: result.text,
            model: result.model,
            warnings,
            debug_cost: buildCostEstimate(kind, result.model, result.usage),
            request_id: requestId,
        });
    }

    console.log(JSON.stringify({
        event: 'analysis_failure',
        timestamp: new Date().toISOString(),
        request_id: requestId,
        kind,
        error: result.error.name,
        reason: result.reason,
    }));

    if (result.error instanceof InferenceError) {
        return sendError(res, 502, 'AI Service Error', result.reason, { kind: result.error.kind, warnings });
    }
    return sendError(res, 422, 'Image could not be processed', result.reason, { warnings });
}

/**
 * POST /api/inspection/analyze-image
 * Accepts multipart/form-data with 'image' file and optional 'context' text.
 */
export function createAnalyzeImageHandler(client: InferenceClient) {
    return async function analyzeImageHandler(req: Request, res: Response, next: NextFunction) {
        const requestId = getRequestId(res);
        try {
            if (!req.file) {
                return sendError(res, 400, LIMIT_MESSAGES.imageMissing);
            }

            const { text: context, warnings } = boundContext(req.body?.context);
            console.log(`[AI-Inspection] [${requestId}] ANALYZE_IMAGE bytes=${req.file.size} mime=${req.file.mimetype} context_len=${context.length}`);

            const result = await analyzeInspectionImage(
                client,
                { bytes: req.file.buffer, mimeType: req.file.mimetype, sizeBytes: req.file.size },
                context,
                requestId
            );
            return respondWithResult(res, 'image_analysis', result, warnings);
        } catch (error) {
            next(error);
        }
    };
}

/**
 * POST /api/inspection/analyze-defect
 * Accepts JSON with { defect_text }.
 */
export function createAnalyzeDefectHandler(client: InferenceClient) {
    return async function analyzeDefectHandler(req: Request, res: Response, next: NextFunction) {
        const requestId = getRequestId(res);
        try {
            const { text: defectText, warnings } = boundDefect(req.body?.defect_text);
            if (!defectText.trim()) {
                return sendError(res, 400, LIMIT_MESSAGES.defectMissing);
            }

            console.log(`[AI-Inspection] [${requestId}] ANALYZE_DEFECT defect_len=${defectText.length}`);
            const result = await analyzeDefectComment(client, defectText, requestId);
            return respondWithResult(res, 'defect_analysis', result, warnings);
        } catch (error) {
            next(error);
        }
    };
}

export function createInspectionRouter(client: InferenceClient, rateLimit: RateLimitOptions = {}) {
    const router = Router();

    // Apply rate limiting to all routes in this router
    router.use(createRateLimiter(rateLimit));

    router.post('/analyze-image', uploadImage, createAnalyzeImageHandler(client));
    router.post('/analyze-defect', createAnalyzeDefectHandler(client));

    return router;
}
