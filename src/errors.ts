export type PipelineErrorCode =
    | 'LOAD_ERROR'
    | 'EMPTY_CONTENT'
    | 'SYNTHESIS_ERROR'
    | 'RENDER_ERROR'
    | 'RENDER_TIMEOUT'
    | 'ASSEMBLY_ERROR';

/**
 * Base class for every failure a run can end in. `slideIndex` is 0-based;
 * `userMessage()` reports it 1-based the way slides are numbered on screen.
 */
export abstract class PipelineError extends Error {
    abstract readonly code: PipelineErrorCode;
    readonly slideIndex?: number;

    constructor(message: string, slideIndex?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.slideIndex = slideIndex;
    }

    userMessage(): string {
        return this.slideIndex === undefined
            ? this.message
            : `Slide ${this.slideIndex + 1}: ${this.message}`;
    }
}

export class LoadError extends PipelineError {
    readonly code = 'LOAD_ERROR';
}

export class EmptyContentError extends PipelineError {
    readonly code = 'EMPTY_CONTENT';

    constructor(slideIndex: number) {
        super('slide has neither text nor speaker notes to narrate', slideIndex);
    }
}

export class SynthesisError extends PipelineError {
    readonly code = 'SYNTHESIS_ERROR';
}

export class RenderError extends PipelineError {
    readonly code = 'RENDER_ERROR';
}

export class RenderTimeoutError extends PipelineError {
    readonly code = 'RENDER_TIMEOUT';

    constructor(slideIndex: number, timeoutMs: number) {
        super(`avatar rendering did not finish within ${Math.round(timeoutMs / 1000)}s`, slideIndex);
    }
}

export class AssemblyError extends PipelineError {
    readonly code = 'ASSEMBLY_ERROR';
}

export class ConfigError extends Error {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export const isPipelineError = (error: unknown): error is PipelineError => error instanceof PipelineError;

export const toErrorMessage = (error: unknown): string => {
    if (isPipelineError(error)) return error.userMessage();
    if (error instanceof Error) return error.message;
    return String(error);
};
