import { setTimeout as delay } from 'timers/promises';
import axios, { type AxiosInstance } from 'axios';
import type { AvatarServiceConfig } from '../config';
import { RenderError, RenderTimeoutError } from '../errors';
import type { AvatarClip, AvatarStyle, NarrationClip } from '../types/pipeline';

const PRESENTER_BASE = 'https://create-images-results.d-id.com/DefaultPresenters';

export const AVATAR_PRESETS: Record<AvatarStyle, { presenter: string; sourceUrl: string }> = {
    professional: { presenter: 'John_f', sourceUrl: `${PRESENTER_BASE}/John_f/image.jpg` },
    casual: { presenter: 'Sarah_f', sourceUrl: `${PRESENTER_BASE}/Sarah_f/image.jpg` },
    educational: { presenter: 'Emma_f', sourceUrl: `${PRESENTER_BASE}/Emma_f/image.jpg` },
};

type TalkStatus = 'created' | 'started' | 'done' | 'error' | 'rejected';

export interface TalkResponse {
    id: string;
    status: TalkStatus;
    result_url?: string;
    duration?: number;
    error?: { kind?: string; description?: string };
}

export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: async (ms, signal) => { await delay(ms, undefined, { signal }); },
};

const describeFailure = (error: unknown): string => {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            const data: unknown = error.response.data;
            const detail = typeof data === 'object' && data !== null && 'description' in data
                ? `: ${String(data.description)}` : '';
            return `avatar service returned HTTP ${error.response.status}${detail}`;
        }
        return `avatar service unreachable (${error.code ?? error.message})`;
    }
    return error instanceof Error ? error.message : String(error);
};

/**
 * D-ID talks client: uploads the narration, starts a talk, then polls the
 * talk at a fixed interval until it is done or the render deadline passes.
 */
export class AvatarRenderer {
    private http: AxiosInstance;

    constructor(private config: AvatarServiceConfig, timeoutMs: number, http?: AxiosInstance, private clock: Clock = systemClock) {
        this.http = http ?? axios.create({
            baseURL: config.baseUrl,
            timeout: timeoutMs,
            headers: { Authorization: `Basic ${config.apiKey}` },
        });
    }

    async render(clip: NarrationClip, style: AvatarStyle, signal?: AbortSignal): Promise<AvatarClip> {
        const slideIndex = clip.slideIndex;
        const call = async <T>(what: string, request: () => Promise<T>): Promise<T> => {
            try {
                return await request();
            } catch (error) {
                throw new RenderError(`${what} failed: ${describeFailure(error)}`, slideIndex, { cause: error });
            }
        };

        const audioUrl = await call('audio upload', () => this.uploadAudio(clip, signal));
        const talk = await call('talk creation', async () => (await this.http.post<TalkResponse>('/talks', {
            source_url: AVATAR_PRESETS[style].sourceUrl,
            script: { type: 'audio', audio_url: audioUrl },
            config: { fluent: true, pad_audio: 0 },
        }, { signal })).data);

        console.log(`[AVATAR] Slide ${slideIndex + 1}: talk ${talk.id} created (${style})`);

        const done = await this.waitForTalk(talk.id, slideIndex, signal);
        const resultUrl = done.result_url;
        if (!resultUrl) {
            throw new RenderError(`talk ${talk.id} finished without a result url`, slideIndex);
        }

        // result urls are presigned; a second auth scheme gets them rejected
        const video = await call('video download', async () => Buffer.from((await this.http.get<ArrayBuffer>(resultUrl, {
            responseType: 'arraybuffer',
            headers: { Authorization: false },
            signal,
        })).data));
        if (video.length === 0) {
            throw new RenderError('avatar service returned an empty video', slideIndex);
        }

        const durationSeconds = typeof done.duration === 'number' && done.duration > 0 ? done.duration : clip.durationSeconds;
        return { slideIndex, video, durationSeconds };
    }

    private async uploadAudio(clip: NarrationClip, signal?: AbortSignal): Promise<string> {
        const form = new FormData();
        form.append('audio', new Blob([new Uint8Array(clip.audio)], { type: clip.mimeType }), `slide-${clip.slideIndex + 1}.wav`);
        const { data } = await this.http.post<{ url: string }>('/audios', form, { signal });
        if (!data.url) throw new Error('upload response carried no url');
        return data.url;
    }

    async waitForTalk(talkId: string, slideIndex: number, signal?: AbortSignal): Promise<TalkResponse> {
        const { pollIntervalMs, renderTimeoutMs } = this.config;
        const deadline = this.clock.now() + renderTimeoutMs;
        const maxPolls = Math.ceil(renderTimeoutMs / pollIntervalMs) + 1;

        for (let poll = 1; poll <= maxPolls; poll++) {
            let talk: TalkResponse;
            try {
                talk = (await this.http.get<TalkResponse>(`/talks/${talkId}`, { signal })).data;
            } catch (error) {
                throw new RenderError(`status check failed: ${describeFailure(error)}`, slideIndex, { cause: error });
            }

            if (talk.status === 'done') return talk;
            if (talk.status === 'error' || talk.status === 'rejected') {
                const reason = talk.error?.description ?? talk.error?.kind ?? talk.status;
                throw new RenderError(`avatar rendering failed: ${reason}`, slideIndex);
            }

            if (this.clock.now() + pollIntervalMs > deadline) break;
            await this.clock.sleep(pollIntervalMs, signal);
        }

        throw new RenderTimeoutError(slideIndex, renderTimeoutMs);
    }
}
