export interface Slide {
    index: number;
    title: string;
    text: string;
    notes?: string;
    image?: Buffer; // PNG/JPEG of the rendered slide, supplied by the caller
}

export interface Presentation {
    fileName: string;
    slides: readonly Slide[];
}

export interface NarrationClip {
    slideIndex: number;
    audio: Buffer;
    durationSeconds: number;
    mimeType: string;
}

export interface AvatarClip {
    slideIndex: number;
    video: Buffer;
    durationSeconds: number;
}

export interface OutputVideo {
    path: string;
    slideCount: number;
    durationSeconds: number;
}

export const AVATAR_STYLES = ['professional', 'casual', 'educational'] as const;
export type AvatarStyle = typeof AVATAR_STYLES[number];

export const VOICE_TYPES = ['female', 'male'] as const;
export type VoiceType = typeof VOICE_TYPES[number];

export const VIDEO_QUALITIES = ['720p', '1080p'] as const;
export type VideoQuality = typeof VIDEO_QUALITIES[number];

export interface VoiceSettings {
    voiceType: VoiceType;
    speechRate: number;  // 0.5 - 2.0, 1.0 is normal speed
    speechPitch: number; // -50 - 50 percent
}

export interface RunOptions extends VoiceSettings {
    avatarStyle: AvatarStyle;
    quality: VideoQuality;
    explain: boolean;
    outputPath?: string;
}

export type RunState = 'Loaded' | 'Synthesizing' | 'Rendering' | 'Assembling' | 'Complete' | 'Failed';

export interface RunFailure {
    code: string;
    message: string;
    slideIndex?: number;
}

export interface RunReport {
    runId: string;
    state: RunState;
    history: RunState[];
    output?: OutputVideo;
    error?: RunFailure;
}

export interface ProgressEvent {
    runId: string;
    state: RunState;
    completed: number;
    total: number;
    message: string;
}
