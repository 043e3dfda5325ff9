import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AssemblyError } from '../errors';
import type { AvatarClip, OutputVideo, Presentation, Slide, VideoQuality } from '../types/pipeline';
import type { MediaEncoder } from '../utils/mediaEncoder';

export const FRAME_SIZES: Record<VideoQuality, { width: number; height: number }> = {
    '720p': { width: 1280, height: 720 },
    '1080p': { width: 1920, height: 1080 },
};

const FPS = 30;
const AVATAR_MARGIN = 50;
const CARD_BACKGROUND = '0xf5f5f5';
const CARD_TEXT = '0x2c3e50';
// average glyph width as a share of the font size, for wrapping
const GLYPH_WIDTH = 0.55;

export interface AssembleOptions {
    quality: VideoQuality;
    fontFile?: string; // drawtext font when fontconfig is unavailable
}

interface SegmentInputs {
    avatarPath: string;
    imagePath?: string;
    titlePath?: string;
    bodyPath?: string;
    outputPath: string;
    durationSeconds: number;
}

export interface CardLayout {
    avatarWidth: number;
    titleSize: number;
    titleTop: number;
    bodySize: number;
    bodyTop: number;
    /** characters per body line left of the avatar */
    columns: number;
}

/** Slide card geometry for frames without a slide image. */
export function cardLayout(quality: VideoQuality): CardLayout {
    const { width, height } = FRAME_SIZES[quality];
    const avatarWidth = Math.round(width / 4 / 2) * 2;
    const bodySize = Math.round(height / 30);
    const textWidth = width - avatarWidth - AVATAR_MARGIN * 4;
    return {
        avatarWidth,
        titleSize: Math.round(height / 15),
        titleTop: AVATAR_MARGIN * 2,
        bodySize,
        bodyTop: Math.round(height / 4),
        columns: Math.floor(textWidth / (bodySize * GLYPH_WIDTH)),
    };
}

/** Greedy word wrap; a word longer than a line keeps a line of its own. */
export function wrapText(text: string, columns: number): string {
    const lines: string[] = [];
    let line = '';
    for (const word of text.split(/\s+/).filter(Boolean)) {
        if (line && line.length + 1 + word.length > columns) {
            lines.push(line);
            line = word;
        } else {
            line = line ? `${line} ${word}` : word;
        }
    }
    if (line) lines.push(line);
    return lines.join('\n');
}

/** Slide text without the leading title, which the card draws on its own. */
export function cardBody(slide: Slide): string {
    const heading = `Title: ${slide.title}`;
    return (slide.text.startsWith(heading) ? slide.text.slice(heading.length) : slide.text).trim();
}

const quote = (value: string): string => `'${value.replace(/'/g, "'\\''")}'`;

const ENCODE_ARGS = ['-c:v', 'libx264', '-preset', 'veryfast', '-pix_fmt', 'yuv420p', '-c:a', 'aac', '-ar', '44100', '-ac', '2'];

/** Checks the clip set against the deck and returns it in slide order. */
export function orderClips(presentation: Presentation, clips: readonly AvatarClip[]): AvatarClip[] {
    const byIndex = new Map<number, AvatarClip>();
    for (const clip of clips) {
        if (clip.slideIndex < 0 || clip.slideIndex >= presentation.slides.length) {
            throw new AssemblyError('clip does not belong to any slide', clip.slideIndex);
        }
        if (byIndex.has(clip.slideIndex)) {
            throw new AssemblyError('more than one clip for the slide', clip.slideIndex);
        }
        if (clip.video.length === 0) {
            throw new AssemblyError('avatar clip is empty', clip.slideIndex);
        }
        if (!Number.isFinite(clip.durationSeconds) || clip.durationSeconds <= 0) {
            throw new AssemblyError('avatar clip has zero duration', clip.slideIndex);
        }
        byIndex.set(clip.slideIndex, clip);
    }

    return presentation.slides.map((slide) => {
        const clip = byIndex.get(slide.index);
        if (!clip) throw new AssemblyError('avatar clip is missing', slide.index);
        return clip;
    });
}

export function segmentArgs(inputs: SegmentInputs, options: AssembleOptions): string[] {
    const { width, height } = FRAME_SIZES[options.quality];
    const duration = inputs.durationSeconds.toFixed(3);
    const layout = cardLayout(options.quality);
    const overlay = `[1:v]scale=${layout.avatarWidth}:-2[av];`
        + `[bg][av]overlay=W-w-${AVATAR_MARGIN}:${AVATAR_MARGIN},fps=${FPS}[v]`;
    const output = ['-map', '[v]', '-map', '1:a:0', '-t', duration, ...ENCODE_ARGS, inputs.outputPath];

    if (inputs.imagePath) {
        const fit = `scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`;
        return [
            '-loop', '1', '-i', inputs.imagePath,
            '-i', inputs.avatarPath,
            '-filter_complex', `[0:v]${fit}:color=black,setsar=1[bg];${overlay}`,
            ...output,
        ];
    }

    const font = options.fontFile ? `fontfile=${quote(options.fontFile)}:` : '';
    const drawText = (textPath: string, style: string) =>
        `drawtext=${font}textfile=${quote(textPath)}:expansion=none:fontcolor=${CARD_TEXT}:${style}`;

    const card = ['setsar=1'];
    if (inputs.titlePath) {
        // centred in the space left of the avatar
        const reserved = layout.avatarWidth + AVATAR_MARGIN;
        card.push(drawText(inputs.titlePath, `fontsize=${layout.titleSize}:x=(w-${reserved}-text_w)/2:y=${layout.titleTop}`));
    }
    if (inputs.bodyPath) {
        card.push(drawText(inputs.bodyPath,
            `fontsize=${layout.bodySize}:line_spacing=${Math.round(layout.bodySize / 2)}:x=${AVATAR_MARGIN * 2}:y=${layout.bodyTop}`));
    }

    return [
        '-f', 'lavfi', '-i', `color=c=${CARD_BACKGROUND}:s=${width}x${height}:r=${FPS}`,
        '-i', inputs.avatarPath,
        '-filter_complex', `[0:v]${card.join(',')}[bg];${overlay}`,
        ...output,
    ];
}

export const concatList = (segmentPaths: string[]): string =>
    segmentPaths.map((segment) => `file ${quote(segment)}`).join('\n') + '\n';

/**
 * Composes one segment per slide and concatenates them. The result is
 * written beside the target under a partial name and renamed only once the
 * last encoder step has succeeded.
 */
export class VideoAssembler {
    constructor(private encoder: MediaEncoder, private tmpRoot: string = os.tmpdir()) {}

    async assemble(
        presentation: Presentation,
        clips: readonly AvatarClip[],
        outputPath: string,
        options: AssembleOptions,
    ): Promise<OutputVideo> {
        const ordered = orderClips(presentation, clips);
        const workDir = await fs.mkdtemp(path.join(this.tmpRoot, 'slide-video-'));
        const partialPath = path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.partial`);

        console.log(`[ASSEMBLER] Composing ${ordered.length} segments in ${workDir}`);

        try {
            const segments: string[] = [];
            for (const clip of ordered) {
                const slide = presentation.slides[clip.slideIndex];
                segments.push(await this.composeSegment(workDir, slide, clip, options));
            }

            const listPath = path.join(workDir, 'segments.txt');
            await fs.writeFile(listPath, concatList(segments));
            await fs.mkdir(path.dirname(outputPath), { recursive: true });
            await this.encode(['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-f', 'mp4', partialPath]);
            await fs.rename(partialPath, outputPath);
        } catch (error) {
            await fs.rm(partialPath, { force: true });
            throw error;
        } finally {
            await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
                console.warn(`[ASSEMBLER] Could not remove ${workDir}:`, error);
            });
        }

        const durationSeconds = ordered.reduce((total, clip) => total + clip.durationSeconds, 0);
        console.log(`[ASSEMBLER] Wrote ${outputPath} (${durationSeconds.toFixed(1)}s)`);
        return { path: outputPath, slideCount: ordered.length, durationSeconds };
    }

    private async composeSegment(workDir: string, slide: Slide, clip: AvatarClip, options: AssembleOptions): Promise<string> {
        const stem = `slide-${String(slide.index).padStart(3, '0')}`;
        const avatarPath = path.join(workDir, `${stem}-avatar.mp4`);
        await fs.writeFile(avatarPath, clip.video);

        let imagePath: string | undefined;
        let titlePath: string | undefined;
        let bodyPath: string | undefined;
        if (slide.image) {
            imagePath = path.join(workDir, `${stem}-image`);
            await fs.writeFile(imagePath, slide.image);
        } else {
            if (slide.title.trim()) {
                titlePath = path.join(workDir, `${stem}-title.txt`);
                await fs.writeFile(titlePath, slide.title.trim());
            }
            const body = cardBody(slide);
            if (body) {
                bodyPath = path.join(workDir, `${stem}-body.txt`);
                await fs.writeFile(bodyPath, wrapText(body, cardLayout(options.quality).columns));
            }
        }

        const outputPath = path.join(workDir, `${stem}.mp4`);
        const inputs = { avatarPath, imagePath, titlePath, bodyPath, outputPath, durationSeconds: clip.durationSeconds };
        await this.encode(segmentArgs(inputs, options), slide.index);
        return outputPath;
    }

    private async encode(args: string[], slideIndex?: number): Promise<void> {
        try {
            await this.encoder.run(args);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new AssemblyError(`video encoding failed: ${reason}`, slideIndex, { cause: error });
        }
    }
}
