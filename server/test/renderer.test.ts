/**
 * Tests for the slide and idle screen renderer
 *
 * Uses a recording backend that measures 10px per character.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Renderer, MAX_DESCRIPTION_LINES } from '../services/display/renderer';
import { RenderBackendError } from '../services/display/errors';
import type { LibrarySlide, PlaybackSlide } from '../services/display/slides';
import { RecordingBackend, bitmap, visibleText, type DrawOp } from './fakes';

// ============================================================================
// Test Data
// ============================================================================

const PLAYBACK_SLIDE: PlaybackSlide = {
    source: 'playback',
    title: 'Harbor Lights',
    description: 'short text',
    playbackInfo: {
        viewer: 'alice',
        mode: 'Direct Play',
        endsAt: new Date(2026, 0, 1, 21, 15, 30),
    },
};

// 30 words of 10 characters: four words fit per 500px line
const LONG_DESCRIPTION = Array.from({ length: 30 }, () => 'aaaaaaaaaa').join(' ');

const SHOW_SLIDE: LibrarySlide = {
    source: 'library',
    title: 'Orchard Street',
    description: LONG_DESCRIPTION,
    seasonEpisodeInfo: { seasons: 3, episodes: 30 },
};

function textAt(ops: DrawOp[], text: string) {
    const op = ops.find(entry => entry.op === 'text' && entry.text === text && entry.color === '#ffffff');
    return op && op.op === 'text' ? { x: op.x, y: op.y } : undefined;
}

let backend: RecordingBackend;
let renderer: Renderer;

beforeEach(() => {
    backend = new RecordingBackend();
    renderer = new Renderer(backend, '%H:%M');
});

// ============================================================================
// Slide screen
// ============================================================================

describe('renderSlide', () => {
    it('draws background, overlay and poster in order', async () => {
        await renderer.renderSlide(PLAYBACK_SLIDE, { fanart: bitmap(), poster: bitmap() });

        const [frame] = backend.frames;
        expect(frame.slice(0, 4)).toEqual([
            { op: 'clear' },
            { op: 'image', x: 0, y: 0, width: 800, height: 480 },
            { op: 'rect', x: 0, y: 0, width: 800, height: 480, color: '#000000', alpha: 0.5 },
            { op: 'image', x: 50, y: 90, width: 200, height: 300 },
        ]);
    });

    it('fills black and skips the poster when art is missing', async () => {
        await renderer.renderSlide(PLAYBACK_SLIDE, { fanart: null, poster: null });

        const [frame] = backend.frames;
        expect(frame.filter(op => op.op === 'image')).toEqual([]);
        expect(frame[1]).toEqual({ op: 'rect', x: 0, y: 0, width: 800, height: 480, color: '#000000', alpha: 1 });
    });

    it('draws the title over a 1px shadow', async () => {
        await renderer.renderSlide(PLAYBACK_SLIDE, { fanart: null, poster: null });

        const titles = backend.frames[0].filter(op => op.op === 'text' && op.text === 'Harbor Lights');
        expect(titles).toEqual([
            { op: 'text', text: 'Harbor Lights', font: { size: 30, bold: true }, x: 301, y: 91, color: '#000000' },
            { op: 'text', text: 'Harbor Lights', font: { size: 30, bold: true }, x: 300, y: 90, color: '#ffffff' },
        ]);
    });

    it('stacks playback rows under the description', async () => {
        await renderer.renderSlide(PLAYBACK_SLIDE, { fanart: null, poster: null });

        const [frame] = backend.frames;
        expect(visibleText(frame)).toEqual([
            'Harbor Lights',
            'short text',
            'User: alice',
            'Status: Direct Play',
            'Ends: 21:15:30',
        ]);
        expect(textAt(frame, 'short text')).toEqual({ x: 300, y: 140 });
        expect(textAt(frame, 'User: alice')).toEqual({ x: 300, y: 190 });
        expect(textAt(frame, 'Status: Direct Play')).toEqual({ x: 300, y: 220 });
        expect(textAt(frame, 'Ends: 21:15:30')).toEqual({ x: 300, y: 250 });
    });

    it('caps the description and places season counts after it', async () => {
        await renderer.renderSlide(SHOW_SLIDE, { fanart: null, poster: null });

        const [frame] = backend.frames;
        const descriptionLines = visibleText(frame).filter(text => text.startsWith('aaaa'));
        expect(descriptionLines).toHaveLength(MAX_DESCRIPTION_LINES);
        expect(descriptionLines[0]).toBe('aaaaaaaaaa aaaaaaaaaa aaaaaaaaaa aaaaaaaaaa');

        // five lines from y=140 at 30px end at y=290
        expect(textAt(frame, 'Seasons: 3')).toEqual({ x: 300, y: 310 });
        expect(textAt(frame, 'Episodes: 30')).toEqual({ x: 300, y: 340 });
        expect(visibleText(frame).some(text => text.startsWith('User:'))).toBe(false);
    });

    it('draws no optional rows for a movie', async () => {
        await renderer.renderSlide(
            { source: 'library', title: 'Harbor Lights', description: 'Boats at night.' },
            { fanart: null, poster: null }
        );

        expect(visibleText(backend.frames[0])).toEqual(['Harbor Lights', 'Boats at night.']);
    });

    it('starts every frame from a cleared canvas', async () => {
        await renderer.renderSlide(PLAYBACK_SLIDE, { fanart: null, poster: null });
        await renderer.renderSlide(SHOW_SLIDE, { fanart: null, poster: null });

        expect(backend.frames).toHaveLength(2);
        expect(backend.frames[1][0]).toEqual({ op: 'clear' });
        expect(visibleText(backend.frames[1])).not.toContain('User: alice');
    });

    it('wraps backend failures as RenderBackendError', async () => {
        backend.presentError = new Error('disk full');

        const rendering = renderer.renderSlide(PLAYBACK_SLIDE, { fanart: null, poster: null });

        await expect(rendering).rejects.toBeInstanceOf(RenderBackendError);
        await expect(rendering).rejects.toThrow('Render backend failed during slide: disk full');
    });
});

// ============================================================================
// Idle screen
// ============================================================================

describe('renderIdle', () => {
    it('centres the clock and draws the counters', async () => {
        await renderer.renderIdle({
            now: new Date(2026, 0, 1, 9, 5),
            movieCount: 12,
            showCount: null,
            playingCount: 0,
        });

        const [frame] = backend.frames;
        expect(frame[0]).toEqual({ op: 'clear' });
        expect(frame[1]).toEqual({
            op: 'text',
            text: '09:05',
            font: { size: 80 },
            x: 375,
            y: 200,
            color: '#ffffff',
        });
        expect(textAt(frame, 'Total Movies: 12')).toEqual({ x: 50, y: 400 });
        expect(textAt(frame, 'Total TV Shows: -')).toEqual({ x: 300, y: 400 });
        expect(textAt(frame, 'Currently Playing: 0')).toEqual({ x: 550, y: 400 });
    });

    it('uses the configured time format', async () => {
        renderer = new Renderer(backend, '%I:%M %p');

        await renderer.renderIdle({ now: new Date(2026, 0, 1, 21, 5), movieCount: 0, showCount: 0, playingCount: 0 });

        expect(visibleText(backend.frames[0])[0]).toBe('09:05 PM');
    });
});

describe('close', () => {
    it('closes the backend', async () => {
        await renderer.close();
        expect(backend.closed).toBe(true);
    });
});
