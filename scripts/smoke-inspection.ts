import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const API_BASE = process.env.API_BASE || 'http://localhost:3000/api/inspection';

const analysisPayloadSchema = z.object({
    analysis: z.string(),
    model: z.string(),
    warnings: z.array(z.string()),
    debug_cost: z.object({ estimated_cost_usd: z.number() }),
});

type AnalysisPayload = z.infer<typeof analysisPayloadSchema>;

async function postAndReport(label: string, url: string, init: RequestInit): Promise<AnalysisPayload> {
    const res = await fetch(url, init);
    if (!res.ok) {
        const text = await res.text();
        throw new Error(`${label} failed: ${res.status} ${res.statusText} - ${text}`);
    }
    const payload = analysisPayloadSchema.parse(await res.json());
    console.log(`✅ ${label} successful! model=${payload.model} cost_usd=${payload.debug_cost.estimated_cost_usd}`);
    if (payload.warnings.length) {
        console.log('Warnings:', payload.warnings.join(' | '));
    }
    console.log('Analysis:', payload.analysis.substring(0, 200) + '...');
    return payload;
}

async function runSmokeTest() {
    const imagePath = process.argv[2];
    if (!imagePath) {
        console.error('Usage: npm run smoke-inspection <path-to-image> [defect comment]');
        process.exit(1);
    }

    if (!fs.existsSync(imagePath)) {
        console.error(`File not found: ${imagePath}`);
        process.exit(1);
    }

    const defectText = process.argv[3] || 'Cracked foundation wall near northeast corner';
    const mimeType = path.extname(imagePath).toLowerCase() === '.png' ? 'image/png' : 'image/jpeg';

    console.log('--- STARTING INSPECTION SMOKE TEST ---');
    console.log(`Target: ${API_BASE}`);
    console.log(`Image: ${imagePath}`);

    console.log('\n[1/2] Calling /analyze-image...');
    const formData = new FormData();
    const buffer = fs.readFileSync(imagePath);
    formData.append('image', new Blob([new Uint8Array(buffer)], { type: mimeType }), path.basename(imagePath));
    formData.append('context', 'Basement, home built 1978, efflorescence visible on the wall');

    try {
        await postAndReport('Image analysis', `${API_BASE}/analyze-image`, { method: 'POST', body: formData });
    } catch (err) {
        console.error('❌ Image analysis call failed:', err instanceof Error ? err.message : err);
        process.exit(1);
    }

    console.log('\n[2/2] Calling /analyze-defect...');
    try {
        await postAndReport('Defect analysis', `${API_BASE}/analyze-defect`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify({ defect_text: defectText }),
        });
    } catch (err) {
        console.error('❌ Defect analysis call failed:', err instanceof Error ? err.message : err);
        process.exit(1);
    }

    console.log('\n--- SMOKE TEST PASSED ---');
}

runSmokeTest().catch((err) => {
    console.error(err);
    process.exit(1);
});
