import { z } from 'zod';
import { AVATAR_STYLES, type RunOptions, VIDEO_QUALITIES, VOICE_TYPES } from '../types/pipeline';

// Accepts capitalised labels ("Professional", "Female", "1080P")
const lower = (value: unknown): unknown => (typeof value === 'string' ? value.trim().toLowerCase() : value);

export const zRunOptions = z.object({
    avatarStyle: z.preprocess(lower, z.enum(AVATAR_STYLES)).default('professional'),
    voiceType: z.preprocess(lower, z.enum(VOICE_TYPES)).default('female'),
    speechRate: z.coerce.number().min(0.5).max(2).default(1),
    speechPitch: z.coerce.number().int().min(-50).max(50).default(0),
    quality: z.preprocess(lower, z.enum(VIDEO_QUALITIES)).default('1080p'),
    explain: z.boolean().default(false),
    outputPath: z.string().min(1).optional(),
});

const base64 = z.string().min(1).regex(/^[A-Za-z0-9+/=\s]+$/, 'must be base64');

export const zConvertRequest = z.object({
    presentation: base64,
    fileName: z.string().min(1).optional(),
    slideImages: z.array(base64).optional(),
    // output location is decided by the server
    options: zRunOptions.omit({ outputPath: true }).default({}),
});

export type ConvertRequest = z.infer<typeof zConvertRequest>;

/** `path: message; …`, the form both the HTTP and CLI surfaces report. */
export const formatIssues = (error: z.ZodError): string =>
    error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');

export const resolveRunOptions = (input: unknown = {}): RunOptions => {
    const parsed = zRunOptions.safeParse(input);
    if (!parsed.success) {
        throw new Error(formatIssues(parsed.error));
    }
    return parsed.data;
};
