import express, { type Request, type Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import * as path from 'path';
import { z } from 'zod';
import { formatIssues, zConvertRequest } from './schemas/convert';
import type { PipelineCoordinator } from './services/pipeline';
import type { RunFailure, RunReport } from './types/pipeline';

export interface AppOptions {
    coordinator: Pick<PipelineCoordinator, 'run'>;
    outputDir: string;
    bodyLimit?: string;
}

export const getServiceCard = () => ({
    name: "Slide Video Agent",
    description: "Turns PowerPoint presentations into narrated videos: each slide is voiced with Azure Speech, presented by a D-ID talking avatar and stitched into a single MP4.",
    version: "1.0.0",
    capabilities: {
        convert: {
            type: "conversion",
            description: "Converts a base64 .pptx deck into a narrated avatar video",
        },
    },
    defaultInputModes: ["application/vnd.openxmlformats-officedocument.presentationml.presentation"],
    defaultOutputModes: ["video/mp4"],
    endpoints: {
        convert: "/convert",
        videos: "/videos/:file",
    },
});

const HTTP_STATUS: Record<string, number> = {
    LOAD_ERROR: 422,
    EMPTY_CONTENT: 422,
    SYNTHESIS_ERROR: 502,
    RENDER_ERROR: 502,
    RENDER_TIMEOUT: 504,
    ASSEMBLY_ERROR: 500,
};

// JSON-RPC 2.0 callers put the request under `params`
const zEnvelope = z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    params: z.unknown(),
});

const failureBody = (failure: RunFailure, runId?: string) => ({
    status: 'failed',
    runId,
    error: failure.message,
    code: failure.code,
    slideIndex: failure.slideIndex,
});

const completedBody = (report: RunReport) => ({
    status: 'completed',
    runId: report.runId,
    history: report.history,
    video: report.output && {
        url: `/videos/${encodeURIComponent(path.basename(report.output.path))}`,
        slideCount: report.output.slideCount,
        durationSeconds: report.output.durationSeconds,
    },
});

export function createApp({ coordinator, outputDir, bodyLimit = '100mb' }: AppOptions) {
    const app = express();
    app.use(cors());
    app.use(bodyParser.json({ limit: bodyLimit })); // decks arrive base64-encoded

    app.get(['/', '/.well-known/agent-card.json'], (req, res) => {
        console.log(`[REQUEST] GET ${req.path} - Sending service card`);
        res.json(getServiceCard());
    });

    app.use('/videos', express.static(path.resolve(outputDir), { index: false, fallthrough: false }));

    app.post(['/', '/convert'], async (req: Request, res: Response) => {
        console.log('\n[REQUEST] POST /convert - New Conversion Request');

        const envelope = zEnvelope.safeParse(req.body);
        const rpcId = envelope.success ? envelope.data.id ?? null : undefined;
        const payload: unknown = envelope.success ? envelope.data.params : req.body;

        const reply = (status: number, body: object, rpcError?: { code: number; message: string }) => {
            if (rpcId === undefined) {
                res.status(status).json(body);
            } else if (rpcError) {
                res.json({ jsonrpc: '2.0', id: rpcId, error: { ...rpcError, data: body } });
            } else {
                res.json({ jsonrpc: '2.0', id: rpcId, result: body });
            }
        };

        const parsed = zConvertRequest.safeParse(payload);
        if (!parsed.success) {
            const message = formatIssues(parsed.error);
            console.error('[REQUEST] Rejected conversion request:', message);
            return reply(400, { status: 'failed', error: message, code: 'BAD_REQUEST' }, { code: -32602, message });
        }

        const { presentation, fileName, slideImages, options } = parsed.data;
        let report: RunReport;
        try {
            report = await coordinator.run({
                source: Buffer.from(presentation, 'base64'),
                fileName,
                images: slideImages?.map((image) => Buffer.from(image, 'base64')),
            }, options, (event) => console.log(`[PROGRESS] ${event.state}: ${event.message}`));
        } catch (error) {
            console.error('Conversion crashed:', error);
            const message = error instanceof Error ? error.message : String(error);
            return reply(500, { status: 'failed', error: message, code: 'INTERNAL_ERROR' }, { code: -32603, message });
        }

        if (report.state === 'Complete') {
            return reply(200, completedBody(report));
        }

        const failure = report.error ?? { code: 'INTERNAL_ERROR', message: 'conversion failed' };
        return reply(HTTP_STATUS[failure.code] ?? 500, failureBody(failure, report.runId), { code: -32000, message: failure.message });
    });

    return app;
}
