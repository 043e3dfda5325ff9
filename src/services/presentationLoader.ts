import { promises as fs } from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import { DOMParser } from '@xmldom/xmldom';
import { LoadError } from '../errors';
import type { Presentation, Slide } from '../types/pipeline';

export interface LoadOptions {
    fileName?: string;
    images?: Buffer[]; // one per slide, in slide order
}

const TITLE_PLACEHOLDERS = new Set(['title', 'ctrTitle']);
const NOTES_REL_TYPE = '/notesSlide';

const parseXml = (xml: string, partName: string): Document => {
    const problems: string[] = [];
    const record = (msg: string) => { problems.push(msg); };
    const doc = new DOMParser({
        errorHandler: { warning: () => undefined, error: record, fatalError: record },
    }).parseFromString(xml, 'text/xml');

    if (problems.length > 0 || !doc.documentElement) {
        throw new LoadError(`${partName} is not well-formed XML${problems.length ? `: ${problems[0]}` : ''}`);
    }
    return doc;
};

const readPart = async (zip: JSZip, partName: string): Promise<string | undefined> => {
    const file = zip.file(partName);
    return file ? file.async('string') : undefined;
};

const elements = (root: Document | Element, tagName: string): Element[] =>
    Array.from(root.getElementsByTagName(tagName));

// Relationship targets are relative to the folder of the part that owns the .rels
const resolveTarget = (ownerPart: string, target: string): string =>
    target.startsWith('/')
        ? target.slice(1)
        : path.posix.normalize(path.posix.join(path.posix.dirname(ownerPart), target));

const relsPathFor = (partName: string): string =>
    path.posix.join(path.posix.dirname(partName), '_rels', `${path.posix.basename(partName)}.rels`);

interface Relationship {
    id: string;
    type: string;
    target: string;
}

const readRelationships = async (zip: JSZip, ownerPart: string): Promise<Relationship[]> => {
    const relsPath = relsPathFor(ownerPart);
    const xml = await readPart(zip, relsPath);
    if (!xml) return [];

    return elements(parseXml(xml, relsPath), 'Relationship').map((rel) => ({
        id: rel.getAttribute('Id') ?? '',
        type: rel.getAttribute('Type') ?? '',
        target: resolveTarget(ownerPart, rel.getAttribute('Target') ?? ''),
    }));
};

const slideNumber = (partName: string): number => parseInt(partName.match(/slide(\d+)\.xml$/)?.[1] ?? '0', 10);

async function resolveSlideParts(zip: JSZip): Promise<string[]> {
    const presentationPart = 'ppt/presentation.xml';
    const xml = await readPart(zip, presentationPart);
    if (!xml) {
        throw new LoadError('file is not a PowerPoint presentation (ppt/presentation.xml missing)');
    }

    const slideIds = elements(parseXml(xml, presentationPart), 'p:sldId');
    if (slideIds.length > 0) {
        const rels = await readRelationships(zip, presentationPart);
        const byId = new Map(rels.map((rel) => [rel.id, rel.target]));
        return slideIds.map((sldId) => {
            const relId = sldId.getAttribute('r:id') ?? '';
            const target = byId.get(relId);
            if (!target) {
                throw new LoadError(`slide relationship ${relId || '(none)'} cannot be resolved`);
            }
            return target;
        });
    }

    return Object.keys(zip.files)
        .filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name))
        .sort((a, b) => slideNumber(a) - slideNumber(b));
}

const placeholderType = (shape: Element): string | undefined => {
    const ph = elements(shape, 'p:ph')[0];
    if (!ph) return undefined;
    return ph.getAttribute('type') || 'body';
};

// Runs and fields in document order; a soft break (<a:br/>) reads as a space
const paragraphText = (p: Element): string =>
    elements(p, '*')
        .map((node) => {
            if (node.tagName === 'a:br') return ' ';
            return node.tagName === 'a:t' ? node.textContent ?? '' : '';
        })
        .join('')
        .replace(/\s+/g, ' ')
        .trim();

const paragraphs = (shape: Element): string[] =>
    elements(shape, 'a:p')
        .map(paragraphText)
        .filter((line) => line.length > 0);

interface SlideText {
    title?: string;
    firstLine?: string;
    text: string;
}

export function extractSlideText(doc: Document): SlideText {
    const parts: string[] = [];
    let title: string | undefined;

    for (const shape of elements(doc, 'p:sp')) {
        const lines = paragraphs(shape);
        if (lines.length === 0) continue;

        const type = placeholderType(shape);
        if (type && TITLE_PLACEHOLDERS.has(type)) {
            const heading = lines.join(' ');
            title ??= heading;
            parts.push(`Title: ${heading}`);
        } else {
            parts.push(...lines);
        }
    }

    const firstLine = parts[0]?.replace(/^Title: /, '');
    return { title, firstLine, text: parts.join(' ') };
}

export function extractNotesText(doc: Document): string {
    return elements(doc, 'p:sp')
        .filter((shape) => placeholderType(shape) === 'body')
        .flatMap(paragraphs)
        .join(' ');
}

async function readSlide(zip: JSZip, partName: string, index: number): Promise<Slide> {
    const xml = await readPart(zip, partName);
    if (!xml) {
        throw new LoadError(`slide part ${partName} is missing`, index);
    }
    const { title, firstLine, text } = extractSlideText(parseXml(xml, partName));

    const notesRel = (await readRelationships(zip, partName)).find((rel) => rel.type.endsWith(NOTES_REL_TYPE));
    let notes: string | undefined;
    if (notesRel) {
        const notesXml = await readPart(zip, notesRel.target);
        if (notesXml) {
            notes = extractNotesText(parseXml(notesXml, notesRel.target)) || undefined;
        }
    }

    return {
        index,
        title: title ?? firstLine ?? `Slide ${index + 1}`,
        text,
        notes,
    };
}

/**
 * Reads a .pptx deck into an ordered, frozen list of slides.
 * Slide order is the deck's presentation order, not the part numbering.
 */
export async function loadPresentation(source: string | Buffer, options: LoadOptions = {}): Promise<Presentation> {
    let data: Buffer;
    let fileName = options.fileName;
    if (typeof source === 'string') {
        try {
            data = await fs.readFile(source);
        } catch (error) {
            throw new LoadError(`cannot read ${source}`, undefined, { cause: error });
        }
        fileName ??= path.basename(source);
    } else {
        data = source;
    }

    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(data);
    } catch (error) {
        throw new LoadError('file is not a valid presentation container', undefined, { cause: error });
    }

    const parts = await resolveSlideParts(zip);
    if (parts.length === 0) {
        throw new LoadError('presentation contains no slides');
    }

    const slides: Slide[] = [];
    for (let i = 0; i < parts.length; i++) {
        slides.push(await readSlide(zip, parts[i], i));
    }

    if (options.images) {
        if (options.images.length !== slides.length) {
            throw new LoadError(`got ${options.images.length} slide images for ${slides.length} slides`);
        }
        options.images.forEach((image, i) => { slides[i].image = image; });
    }

    console.log(`[LOADER] ${fileName ?? 'presentation'}: ${slides.length} slides`);

    return Object.freeze({
        fileName: fileName ?? 'presentation.pptx',
        slides: Object.freeze(slides.map((slide) => Object.freeze(slide))),
    });
}
