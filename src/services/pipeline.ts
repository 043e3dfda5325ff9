import { randomUUID } from 'crypto';
import * as path from 'path';
import type { PipelineConfig } from '../config';
import { isPipelineError, RenderError, SynthesisError, toErrorMessage } from '../errors';
import type {
    AvatarClip,
    NarrationClip,
    ProgressEvent,
    RunFailure,
    RunOptions,
    RunReport,
    RunState,
} from '../types/pipeline';
import { mapConcurrent } from '../utils/concurrency';
import { FfmpegEncoder } from '../utils/mediaEncoder';
import { AvatarRenderer } from './avatarRenderer';
import { NarrationSynthesizer, narrationText } from './narrationSynthesizer';
import { loadPresentation } from './presentationLoader';
import { GeminiScriptModel, ScriptWriter } from './scriptWriter';
import { VideoAssembler } from './videoAssembler';

export interface PipelineServices {
    synthesizer: Pick<NarrationSynthesizer, 'synthesize'>;
    renderer: Pick<AvatarRenderer, 'render'>;
    assembler: Pick<VideoAssembler, 'assemble'>;
    scriptWriter?: Pick<ScriptWriter, 'write'>;
}

export interface RunInput {
    source: string | Buffer;
    fileName?: string;
    images?: Buffer[];
}

export type ProgressListener = (event: ProgressEvent) => void;

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
    Loaded: ['Synthesizing', 'Failed'],
    Synthesizing: ['Rendering', 'Failed'],
    Rendering: ['Assembling', 'Failed'],
    Assembling: ['Complete', 'Failed'],
    Complete: [],
    Failed: [],
};

export class RunStateMachine {
    private current?: RunState;
    readonly history: RunState[] = [];

    get state(): RunState | undefined {
        return this.current;
    }

    to(next: RunState): void {
        // a run enters the machine at Loaded, or fails before it gets there
        const allowed: readonly RunState[] = this.current ? TRANSITIONS[this.current] : ['Loaded', 'Failed'];
        if (!allowed.includes(next)) {
            throw new Error(`illegal run transition ${this.current ?? '(start)'} -> ${next}`);
        }
        this.current = next;
        this.history.push(next);
    }
}

const outputName = (fileName: string, runId: string): string => {
    const stem = path.basename(fileName, path.extname(fileName)).replace(/[^A-Za-z0-9._-]+/g, '_') || 'presentation';
    return `${stem}-${runId.slice(0, 8)}.mp4`;
};

const describeError = (error: unknown): RunFailure => {
    if (isPipelineError(error)) {
        return { code: error.code, message: error.userMessage(), slideIndex: error.slideIndex };
    }
    return { code: 'INTERNAL_ERROR', message: toErrorMessage(error) };
};

/**
 * Runs one deck through load, narration, avatar rendering and assembly.
 * Credentials and limits come from the config handed in, never from the
 * environment, so each coordinator is self-contained.
 */
export class PipelineCoordinator {
    constructor(private config: PipelineConfig, private services: PipelineServices) {}

    static fromConfig(config: PipelineConfig): PipelineCoordinator {
        return new PipelineCoordinator(config, {
            synthesizer: new NarrationSynthesizer(config.speech, config.requestTimeoutMs),
            renderer: new AvatarRenderer(config.avatar, config.requestTimeoutMs),
            assembler: new VideoAssembler(new FfmpegEncoder(config.ffmpegPath)),
            scriptWriter: config.explainer ? new ScriptWriter(new GeminiScriptModel(config.explainer)) : undefined,
        });
    }

    async run(input: RunInput, options: RunOptions, onProgress?: ProgressListener): Promise<RunReport> {
        const runId = randomUUID();
        const machine = new RunStateMachine();
        const { synthesizer, renderer, assembler, scriptWriter } = this.services;

        let completed = 0;
        let total = 0;
        const emit = (message: string) => {
            const state = machine.state;
            if (!state || !onProgress) return;
            try {
                onProgress({ runId, state, completed, total, message });
            } catch (error) {
                console.warn('[PIPELINE] Progress listener threw:', error);
            }
        };
        const stepDone = (slideIndex: number, slideCount: number) => {
            completed++;
            const percent = (completed / total) * 100;
            emit(`Processing slide ${slideIndex + 1}/${slideCount} (${percent.toFixed(1)}%)`);
        };

        try {
            const presentation = await loadPresentation(input.source, { fileName: input.fileName, images: input.images });
            machine.to('Loaded');
            const slides = presentation.slides;
            total = slides.length * 2;
            emit(`Loaded ${slides.length} slides`);

            // every slide must have something to say before any remote call goes out
            const texts = slides.map(narrationText);

            if (options.explain && !scriptWriter) {
                console.warn('[PIPELINE] explain requested but no explainer is configured; narrating slide text');
            }

            machine.to('Synthesizing');
            const narrations = await mapConcurrent(slides, this.config.maxConcurrency, async (slide, signal): Promise<NarrationClip> => {
                let text = texts[slide.index];
                if (options.explain && scriptWriter) {
                    text = await scriptWriter.write(slide, text, {
                        deckName: presentation.fileName,
                        slideCount: slides.length,
                        previousTitle: slides[slide.index - 1]?.title,
                    }, signal);
                }
                const clip = await synthesizer.synthesize(slide, options, text, signal);
                if (clip.slideIndex !== slide.index) {
                    throw new SynthesisError(`narration came back for slide ${clip.slideIndex + 1}`, slide.index);
                }
                stepDone(slide.index, slides.length);
                return clip;
            });

            machine.to('Rendering');
            const avatars = await mapConcurrent(narrations, this.config.maxConcurrency, async (narration, signal): Promise<AvatarClip> => {
                const clip = await renderer.render(narration, options.avatarStyle, signal);
                if (clip.slideIndex !== narration.slideIndex) {
                    throw new RenderError(`avatar clip came back for slide ${clip.slideIndex + 1}`, narration.slideIndex);
                }
                stepDone(narration.slideIndex, slides.length);
                return clip;
            });

            machine.to('Assembling');
            emit(`Assembling ${avatars.length} clips`);
            const outputPath = options.outputPath ?? path.join(this.config.outputDir, outputName(presentation.fileName, runId));
            const output = await assembler.assemble(presentation, avatars, outputPath, { quality: options.quality, fontFile: this.config.fontFile });

            machine.to('Complete');
            emit('Processing completed');
            console.log(`[PIPELINE] Run ${runId} complete: ${output.path}`);
            return { runId, state: 'Complete', history: machine.history, output };
        } catch (error) {
            machine.to('Failed');
            const failure = describeError(error);
            console.error(`[PIPELINE] Run ${runId} failed (${failure.code}): ${failure.message}`);
            emit(failure.message);
            return { runId, state: 'Failed', history: machine.history, error: failure };
        }
    }
}
