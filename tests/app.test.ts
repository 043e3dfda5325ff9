import { promises as fs } from 'fs';
import type { Server } from 'http';
import * as os from 'os';
import * as path from 'path';
import axios, { type AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { createApp } from '../src/app';
import type { ProgressListener, RunInput } from '../src/services/pipeline';
import type { RunOptions, RunReport } from '../src/types/pipeline';

describe('HTTP app', () => {
    let outputDir: string;
    let server: Server;
    let client: AxiosInstance;
    let run: Mock<[RunInput, RunOptions, ProgressListener?], Promise<RunReport>>;

    beforeEach(async () => {
        outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'app-test-'));
        run = vi.fn<[RunInput, RunOptions, ProgressListener?], Promise<RunReport>>();
        const app = createApp({ coordinator: { run }, outputDir });
        server = app.listen(0, '127.0.0.1');
        await new Promise<void>((resolve) => server.once('listening', resolve));
        const address = server.address();
        if (!address || typeof address === 'string') throw new Error('no TCP address');
        client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    });

    afterEach(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
        await fs.rm(outputDir, { recursive: true, force: true });
    });

    const deckBase64 = Buffer.from('pptx-bytes').toString('base64');

    it('serves the service card at both discovery paths', async () => {
        const root = await client.get('/');
        const wellKnown = await client.get('/.well-known/agent-card.json');

        expect(root.status).toBe(200);
        expect(root.data.name).toBe('Slide Video Agent');
        expect(wellKnown.data).toEqual(root.data);
    });

    it('runs the pipeline with decoded input and defaulted options', async () => {
        run.mockResolvedValue({
            runId: 'run-1',
            state: 'Complete',
            history: ['Loaded', 'Synthesizing', 'Rendering', 'Assembling', 'Complete'],
            output: { path: path.join(outputDir, 'deck-run-1.mp4'), slideCount: 3, durationSeconds: 12.5 },
        });

        const response = await client.post('/convert', {
            presentation: deckBase64,
            fileName: 'deck.pptx',
            slideImages: [Buffer.from('img').toString('base64')],
            options: { avatarStyle: 'Casual', voiceType: 'Male', speechRate: 1.5 },
        });

        expect(response.status).toBe(200);
        expect(response.data).toEqual({
            status: 'completed',
            runId: 'run-1',
            history: ['Loaded', 'Synthesizing', 'Rendering', 'Assembling', 'Complete'],
            video: { url: '/videos/deck-run-1.mp4', slideCount: 3, durationSeconds: 12.5 },
        });

        const [input, options] = run.mock.calls[0];
        expect(input.source.toString()).toBe('pptx-bytes');
        expect(input.fileName).toBe('deck.pptx');
        expect(input.images?.map((image) => image.toString())).toEqual(['img']);
        expect(options).toEqual({ avatarStyle: 'casual', voiceType: 'male', speechRate: 1.5, speechPitch: 0, quality: '1080p', explain: false });
    });

    it('maps pipeline failures to an HTTP status and names the slide', async () => {
        run.mockResolvedValue({
            runId: 'run-2',
            state: 'Failed',
            history: ['Loaded', 'Synthesizing', 'Failed'],
            error: { code: 'SYNTHESIS_ERROR', message: 'Slide 2: speech service returned HTTP 500', slideIndex: 1 },
        });

        const response = await client.post('/convert', { presentation: deckBase64 });

        expect(response.status).toBe(502);
        expect(response.data).toEqual({
            status: 'failed',
            runId: 'run-2',
            error: 'Slide 2: speech service returned HTTP 500',
            code: 'SYNTHESIS_ERROR',
            slideIndex: 1,
        });
    });

    it('treats an unreadable deck as a client error', async () => {
        run.mockResolvedValue({
            runId: 'run-3',
            state: 'Failed',
            history: ['Failed'],
            error: { code: 'LOAD_ERROR', message: 'file is not a valid presentation container' },
        });

        const response = await client.post('/convert', { presentation: deckBase64 });

        expect(response.status).toBe(422);
    });

    it('rejects a request without a presentation before running anything', async () => {
        const response = await client.post('/convert', { options: { avatarStyle: 'robot' } });

        expect(response.status).toBe(400);
        expect(response.data.code).toBe('BAD_REQUEST');
        expect(response.data.error).toContain('presentation: Required');
        expect(run).not.toHaveBeenCalled();
    });

    it('wraps the answer in a JSON-RPC envelope when asked in one', async () => {
        run.mockResolvedValue({
            runId: 'run-4',
            state: 'Failed',
            history: ['Loaded', 'Synthesizing', 'Rendering', 'Failed'],
            error: { code: 'RENDER_TIMEOUT', message: 'Slide 1: avatar rendering did not finish within 180s', slideIndex: 0 },
        });

        const response = await client.post('/', { jsonrpc: '2.0', id: 7, params: { presentation: deckBase64 } });

        expect(response.status).toBe(200);
        expect(response.data).toEqual({
            jsonrpc: '2.0',
            id: 7,
            error: {
                code: -32000,
                message: 'Slide 1: avatar rendering did not finish within 180s',
                data: {
                    status: 'failed',
                    runId: 'run-4',
                    error: 'Slide 1: avatar rendering did not finish within 180s',
                    code: 'RENDER_TIMEOUT',
                    slideIndex: 0,
                },
            },
        });
    });

    it('serves finished videos from the output directory', async () => {
        await fs.writeFile(path.join(outputDir, 'done.mp4'), 'mp4-bytes');

        const found = await client.get('/videos/done.mp4', { responseType: 'text' });
        const missing = await client.get('/videos/nope.mp4');

        expect(found.status).toBe(200);
        expect(found.data).toBe('mp4-bytes');
        expect(missing.status).toBe(404);
    });
});
