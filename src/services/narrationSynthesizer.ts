import axios, { type AxiosInstance } from 'axios';
import type { SpeechConfig } from '../config';
import { EmptyContentError, SynthesisError } from '../errors';
import type { NarrationClip, Slide, VoiceSettings, VoiceType } from '../types/pipeline';
import { readWavInfo } from '../utils/wav';

const OUTPUT_FORMAT = 'riff-24khz-16bit-mono-pcm';

const VOICE_PRESETS: Record<VoiceType, string> = {
    female: 'en-US-JennyNeural',
    male: 'en-US-GuyNeural',
};

/** Text a slide is narrated from: the body, else the speaker notes. */
export function narrationText(slide: Slide): string {
    const body = slide.text.trim();
    if (body) return body;
    const notes = slide.notes?.trim();
    if (notes) return notes;
    throw new EmptyContentError(slide.index);
}

const escapeXml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');

const signedPercent = (value: number): string => `${value >= 0 ? '+' : ''}${Math.round(value)}%`;

export function buildSsml(text: string, voice: string, locale: string, settings: VoiceSettings): string {
    const rate = signedPercent((settings.speechRate - 1) * 100);
    const pitch = signedPercent(settings.speechPitch);
    return `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${locale}">`
        + `<voice name="${voice}"><prosody rate="${rate}" pitch="${pitch}">${escapeXml(text)}</prosody></voice>`
        + `</speak>`;
}

const describeFailure = (error: unknown): string => {
    if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return 'speech service timed out';
        if (error.response) return `speech service returned HTTP ${error.response.status}`;
        return `speech service unreachable (${error.code ?? error.message})`;
    }
    return error instanceof Error ? error.message : String(error);
};

/**
 * Azure Speech REST client. One request per slide, no retry: a failed slide
 * fails the run.
 */
export class NarrationSynthesizer {
    private http: AxiosInstance;

    constructor(private config: SpeechConfig, timeoutMs: number, http?: AxiosInstance) {
        this.http = http ?? axios.create({ timeout: timeoutMs });
    }

    get endpoint(): string {
        return this.config.endpoint
            ?? `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    }

    voiceFor(settings: VoiceSettings): string {
        return this.config.voice ?? VOICE_PRESETS[settings.voiceType];
    }

    async synthesize(slide: Slide, settings: VoiceSettings, text = narrationText(slide), signal?: AbortSignal): Promise<NarrationClip> {
        const voice = this.voiceFor(settings);
        const ssml = buildSsml(text, voice, this.config.locale, settings);

        console.log(`[SPEECH] Slide ${slide.index + 1}: synthesizing ${text.length} chars with ${voice}`);

        let audio: Buffer;
        try {
            const response = await this.http.post<ArrayBuffer>(this.endpoint, ssml, {
                headers: {
                    'Ocp-Apim-Subscription-Key': this.config.apiKey,
                    'Content-Type': 'application/ssml+xml',
                    'X-Microsoft-OutputFormat': OUTPUT_FORMAT,
                    'User-Agent': 'slide-video-agent',
                },
                responseType: 'arraybuffer',
                signal,
            });
            audio = Buffer.from(response.data);
        } catch (error) {
            throw new SynthesisError(describeFailure(error), slide.index, { cause: error });
        }

        if (audio.length === 0) {
            throw new SynthesisError('speech service returned an empty payload', slide.index);
        }

        let durationSeconds: number;
        try {
            durationSeconds = readWavInfo(audio).durationSeconds;
        } catch (error) {
            throw new SynthesisError(`speech service returned unreadable audio: ${describeFailure(error)}`, slide.index, { cause: error });
        }
        if (durationSeconds <= 0) {
            throw new SynthesisError('speech service returned silent audio', slide.index);
        }

        return { slideIndex: slide.index, audio, durationSeconds, mimeType: 'audio/wav' };
    }
}
