import { GoogleGenerativeAI } from '@google/generative-ai';
import type { ExplainerConfig } from '../config';
import { SynthesisError } from '../errors';
import type { Slide } from '../types/pipeline';

export interface ScriptContext {
    deckName: string;
    slideCount: number;
    previousTitle?: string;
}

export interface ScriptModel {
    generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export class GeminiScriptModel implements ScriptModel {
    private genAI: GoogleGenerativeAI;

    constructor(private config: ExplainerConfig) {
        this.genAI = new GoogleGenerativeAI(config.apiKey);
    }

    async generate(prompt: string, signal?: AbortSignal): Promise<string> {
        const model = this.genAI.getGenerativeModel({
            model: this.config.model,
            generationConfig: { temperature: 0.4, maxOutputTokens: 512 },
        });
        const result = await model.generateContent(prompt, { signal });
        return result.response.text();
    }
}

export function buildPrompt(slide: Slide, sourceText: string, context: ScriptContext): string {
    const position = `slide ${slide.index + 1} of ${context.slideCount}`;
    const bridge = context.previousTitle
        ? `The previous slide was titled "${context.previousTitle}"; open with a one-sentence bridge from it.`
        : 'This is the opening slide; greet the audience briefly.';

    return `You are narrating the presentation "${context.deckName}" as a friendly presenter on camera.
Write the spoken script for ${position}, titled "${slide.title}".

SLIDE CONTENT:
${sourceText}
${slide.notes ? `\nSPEAKER NOTES:\n${slide.notes}\n` : ''}
${bridge}
Explain the content in plain spoken English in 60 to 120 words.
Do not read bullet markers, do not use markdown, do not mention slide numbers.
OUTPUT THE SCRIPT TEXT ONLY.`;
}

/**
 * Turns terse slide text into a spoken explanation. The result replaces the
 * narration text for the slide; an empty answer counts as a failure.
 */
export class ScriptWriter {
    constructor(private model: ScriptModel) {}

    async write(slide: Slide, sourceText: string, context: ScriptContext, signal?: AbortSignal): Promise<string> {
        console.log(`[DEBUG] Requesting narration script for slide ${slide.index + 1}...`);
        let text: string;
        try {
            text = await this.model.generate(buildPrompt(slide, sourceText, context), signal);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new SynthesisError(`script generation failed: ${reason}`, slide.index, { cause: error });
        }

        const script = text.replace(/[*#_`]/g, '').replace(/\s+/g, ' ').trim();
        if (!script) {
            throw new SynthesisError('script generation returned no text', slide.index);
        }
        return script;
    }
}
