import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

export interface SpeechConfig {
    apiKey: string;
    region: string;
    locale: string;
    voice?: string; // overrides the female/male preset
    endpoint?: string;
}

export interface AvatarServiceConfig {
    apiKey: string;
    baseUrl: string;
    pollIntervalMs: number;
    renderTimeoutMs: number;
}

export interface ExplainerConfig {
    apiKey: string;
    model: string;
}

export interface PipelineConfig {
    speech: SpeechConfig;
    avatar: AvatarServiceConfig;
    explainer?: ExplainerConfig;
    outputDir: string;
    maxConcurrency: number;
    requestTimeoutMs: number;
    ffmpegPath: string;
    fontFile?: string;
}

export interface ServerConfig {
    port: number;
    host: string;
}

const optionalString = z.string().trim().min(1).optional().catch(undefined);

const envSchema = z.object({
    AZURE_SPEECH_KEY: z.string({ required_error: 'AZURE_SPEECH_KEY is required' }).min(1, 'AZURE_SPEECH_KEY is required'),
    AZURE_SPEECH_REGION: z.string({ required_error: 'AZURE_SPEECH_REGION is required' }).min(1, 'AZURE_SPEECH_REGION is required'),
    AZURE_SPEECH_LOCALE: z.string().default('en-US'),
    AZURE_SPEECH_VOICE: optionalString,
    AZURE_SPEECH_ENDPOINT: optionalString,
    DID_API_KEY: z.string({ required_error: 'DID_API_KEY is required' }).min(1, 'DID_API_KEY is required'),
    DID_BASE_URL: z.string().url().default('https://api.d-id.com'),
    GEMINI_API_KEY: optionalString,
    API_KEY: optionalString,
    GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
    OUTPUT_DIR: z.string().default('output'),
    MAX_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
    RENDER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
    FFMPEG_PATH: z.string().default('ffmpeg'),
    FONT_FILE: optionalString,
    PORT: z.coerce.number().int().min(0).max(65535).default(9009),
    HOST: z.string().default('0.0.0.0'),
});

type Env = z.infer<typeof envSchema>;

const parseEnv = (env: NodeJS.ProcessEnv): Env => {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => issue.message));
    }
    return parsed.data;
};

export function loadEnvFiles(): void {
    dotenv.config({ path: '.env.local' });
    dotenv.config();
}

export function buildPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const parsed = parseEnv(env);
    const geminiKey = parsed.GEMINI_API_KEY ?? parsed.API_KEY;

    return {
        speech: {
            apiKey: parsed.AZURE_SPEECH_KEY,
            region: parsed.AZURE_SPEECH_REGION,
            locale: parsed.AZURE_SPEECH_LOCALE,
            voice: parsed.AZURE_SPEECH_VOICE,
            endpoint: parsed.AZURE_SPEECH_ENDPOINT,
        },
        avatar: {
            apiKey: parsed.DID_API_KEY,
            baseUrl: parsed.DID_BASE_URL,
            pollIntervalMs: parsed.RENDER_POLL_INTERVAL_MS,
            renderTimeoutMs: parsed.RENDER_TIMEOUT_MS,
        },
        explainer: geminiKey ? { apiKey: geminiKey, model: parsed.GEMINI_MODEL } : undefined,
        outputDir: parsed.OUTPUT_DIR,
        maxConcurrency: parsed.MAX_CONCURRENCY,
        requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
        ffmpegPath: parsed.FFMPEG_PATH,
        fontFile: parsed.FONT_FILE,
    };
}

// --port / --host win over PORT / HOST
export function buildServerConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = parseEnv(env);
    const portArg = argv.indexOf('--port');
    const hostArg = argv.indexOf('--host');

    const port = portArg !== -1 ? parseInt(argv[portArg + 1] ?? '', 10) : parsed.PORT;
    if (Number.isNaN(port)) {
        throw new ConfigError(['--port must be a number']);
    }

    return {
        port,
        host: hostArg !== -1 && argv[hostArg + 1] ? argv[hostArg + 1] : parsed.HOST,
    };
}
