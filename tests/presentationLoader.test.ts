import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { LoadError } from '../src/errors';
import { loadPresentation } from '../src/services/presentationLoader';
import { buildDeck } from './fixtures/deck';

describe('loadPresentation', () => {
    it('produces one slide per deck slide with indices 0..N-1 in order', async () => {
        const deck = await buildDeck([
            { title: 'Welcome', body: ['Agenda for today'] },
            { title: 'Quarterly Results', body: ['Revenue grew 12%', 'Costs fell'] },
            { title: 'Questions' },
        ]);

        const presentation = await loadPresentation(deck, { fileName: 'q3.pptx' });

        expect(presentation.fileName).toBe('q3.pptx');
        expect(presentation.slides.map((slide) => slide.index)).toEqual([0, 1, 2]);
        expect(presentation.slides.map((slide) => slide.title)).toEqual(['Welcome', 'Quarterly Results', 'Questions']);
        expect(presentation.slides[1].text).toBe('Title: Quarterly Results Revenue grew 12% Costs fell');
        expect(presentation.slides[2].text).toBe('Title: Questions');
    });

    it('follows the presentation order rather than part numbering', async () => {
        const deck = await buildDeck([
            { title: 'First shown' },
            { title: 'Second shown' },
            { title: 'Third shown' },
        ], { order: [3, 1, 2] });

        const presentation = await loadPresentation(deck);

        expect(presentation.slides.map((slide) => slide.title)).toEqual(['First shown', 'Second shown', 'Third shown']);
    });

    it('falls back to part numbering when the slide list is absent', async () => {
        const deck = await buildDeck([
            { title: 'Two' },
            { title: 'Ten' },
            { title: 'One' },
        ], { order: [2, 10, 1], omitSlideList: true });

        const presentation = await loadPresentation(deck);

        expect(presentation.slides.map((slide) => slide.title)).toEqual(['One', 'Two', 'Ten']);
    });

    it('joins text runs within a paragraph', async () => {
        const deck = await buildDeck([{ runs: ['Hello ', 'world', ' & friends'] }]);

        const [slide] = (await loadPresentation(deck)).slides;

        expect(slide.text).toBe('Hello world & friends');
        expect(slide.title).toBe('Hello world & friends');
    });

    it('reads a soft line break between runs as a space', async () => {
        const deck = await buildDeck([{ title: 'Breaks', runs: ['First line', '\n', 'Second line'] }]);

        const [slide] = (await loadPresentation(deck)).slides;

        expect(slide.text).toBe('Title: Breaks First line Second line');
    });

    it('reads only the body placeholder of the speaker notes', async () => {
        const deck = await buildDeck([
            { title: 'Intro', notes: 'Remember to smile' },
            { title: 'Outro' },
        ]);

        const presentation = await loadPresentation(deck);

        expect(presentation.slides[0].notes).toBe('Remember to smile');
        expect(presentation.slides[1].notes).toBeUndefined();
    });

    it('keeps slides with no body text so notes can be narrated', async () => {
        const deck = await buildDeck([{ notes: 'Only notes here' }]);

        const [slide] = (await loadPresentation(deck)).slides;

        expect(slide.text).toBe('');
        expect(slide.title).toBe('Slide 1');
        expect(slide.notes).toBe('Only notes here');
    });

    it('attaches caller-supplied slide images by position', async () => {
        const deck = await buildDeck([{ title: 'A' }, { title: 'B' }]);
        const images = [Buffer.from('png-a'), Buffer.from('png-b')];

        const presentation = await loadPresentation(deck, { images });

        expect(presentation.slides[1].image?.toString()).toBe('png-b');
    });

    it('rejects an image count that does not match the slides', async () => {
        const deck = await buildDeck([{ title: 'A' }, { title: 'B' }]);

        await expect(loadPresentation(deck, { images: [Buffer.from('x')] }))
            .rejects.toThrow('got 1 slide images for 2 slides');
    });

    it('returns frozen records', async () => {
        const presentation = await loadPresentation(await buildDeck([{ title: 'A' }]));

        expect(Object.isFrozen(presentation)).toBe(true);
        expect(Object.isFrozen(presentation.slides)).toBe(true);
        expect(Object.isFrozen(presentation.slides[0])).toBe(true);
    });

    it('reads from a file path and names the deck after it', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'loader-test-'));
        const file = path.join(dir, 'launch-plan.pptx');
        await fs.writeFile(file, await buildDeck([{ title: 'Launch' }]));

        try {
            const presentation = await loadPresentation(file);
            expect(presentation.fileName).toBe('launch-plan.pptx');
            expect(presentation.slides).toHaveLength(1);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it('fails with LoadError for a missing file', async () => {
        await expect(loadPresentation('/nonexistent/deck.pptx')).rejects.toBeInstanceOf(LoadError);
    });

    it('fails with LoadError for bytes that are not a zip container', async () => {
        await expect(loadPresentation(Buffer.from('definitely not a deck')))
            .rejects.toThrow('file is not a valid presentation container');
    });

    it('fails with LoadError for a zip without a presentation part', async () => {
        const zip = new JSZip();
        zip.file('word/document.xml', '<w:document/>');
        const buffer = await zip.generateAsync({ type: 'nodebuffer' });

        await expect(loadPresentation(buffer)).rejects.toThrow('file is not a PowerPoint presentation (ppt/presentation.xml missing)');
    });

    it('fails with LoadError when the deck has no slides', async () => {
        const deck = await buildDeck([]);

        const error = await loadPresentation(deck).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(LoadError);
        expect(error).toHaveProperty('message', 'presentation contains no slides');
    });
});
