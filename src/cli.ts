import { promises as fs } from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { buildPipelineConfig, loadEnvFiles } from './config';
import { toErrorMessage } from './errors';
import { resolveRunOptions } from './schemas/convert';
import { PipelineCoordinator } from './services/pipeline';
import type { RunOptions } from './types/pipeline';

export const USAGE = `Usage: slide-video <deck.pptx> [options]

  --out <file>          output video path (default: $OUTPUT_DIR/<deck>-<run>.mp4)
  --style <name>        professional | casual | educational
  --voice <type>        female | male
  --rate <n>            speech rate, 0.5 - 2.0
  --pitch <n>           speech pitch, -50 - 50
  --quality <q>         720p | 1080p
  --images <dir>        rendered slide images, one per slide, numbered in slide order
  --explain             narrate a generated explanation instead of the slide text`;

export interface CliArgs {
    deckPath: string;
    imagesDir?: string;
    options: RunOptions;
}

const VALUE_FLAGS: Record<string, keyof RunOptions | 'images'> = {
    '--out': 'outputPath',
    '--style': 'avatarStyle',
    '--voice': 'voiceType',
    '--rate': 'speechRate',
    '--pitch': 'speechPitch',
    '--quality': 'quality',
    '--images': 'images',
};

export function parseCliArgs(args: string[]): CliArgs {
    const raw: Record<string, unknown> = {};
    let deckPath: string | undefined;
    let imagesDir: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--explain') {
            raw.explain = true;
            continue;
        }
        const key = VALUE_FLAGS[arg];
        if (key) {
            const value = args[++i];
            if (value === undefined) throw new Error(`${arg} needs a value`);
            if (key === 'images') imagesDir = value;
            else raw[key] = value;
            continue;
        }
        if (arg.startsWith('--')) throw new Error(`unknown option ${arg}`);
        if (deckPath) throw new Error(`unexpected argument ${arg}`);
        deckPath = arg;
    }

    if (!deckPath) throw new Error('missing presentation path');
    return { deckPath, imagesDir, options: resolveRunOptions(raw) };
}

const IMAGE_FILE = /\.(png|jpe?g)$/i;

/** Images sorted by the first number in their name: slide2.png before slide10.png. */
export async function readSlideImages(dir: string): Promise<Buffer[]> {
    const files = (await fs.readdir(dir))
        .filter((file) => IMAGE_FILE.test(file))
        .sort((a, b) => {
            const numA = parseInt(a.match(/\d+/)?.[0] || '0', 10);
            const numB = parseInt(b.match(/\d+/)?.[0] || '0', 10);
            return numA - numB || a.localeCompare(b);
        });
    return Promise.all(files.map((file) => fs.readFile(path.join(dir, file))));
}

async function main(): Promise<void> {
    loadEnvFiles();

    let cli: CliArgs;
    try {
        cli = parseCliArgs(process.argv.slice(2));
    } catch (error) {
        console.error(`${toErrorMessage(error)}\n\n${USAGE}`);
        process.exitCode = 2;
        return;
    }

    const coordinator = PipelineCoordinator.fromConfig(buildPipelineConfig());
    const images = cli.imagesDir ? await readSlideImages(cli.imagesDir) : undefined;
    const report = await coordinator.run({ source: cli.deckPath, images }, cli.options, (event) => {
        console.log(`[PROGRESS] ${event.message}`);
    });

    if (report.state === 'Complete' && report.output) {
        console.log(`✅ Video generated: ${report.output.path}`);
        return;
    }
    console.error(`❌ Error: ${report.error?.message ?? 'conversion failed'}`);
    process.exitCode = 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main().catch((error: unknown) => {
        console.error(`❌ Error: ${toErrorMessage(error)}`);
        process.exitCode = 1;
    });
}
