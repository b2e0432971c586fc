/**
 * Renderer
 *
 * Draws the two kiosk screens onto a RenderBackend: a slide (artwork,
 * title, description, optional counts and playback rows) and the idle
 * clock with library counters. Each call starts from a cleared canvas.
 *
 * Any backend failure surfaces as a fatal RenderBackendError.
 *
 * @module server/services/display/renderer
 */

import strftime from 'strftime';
import { RenderBackendError } from './errors';
import { wrapText } from './textLayout';
import { POSTER_SIZE, type Slide } from './slides';
import type { DecodedBitmap } from './imageFetcher';
import type { FontSpec, RenderBackend } from './renderBackend';

// ============================================================================
// TYPES
// ============================================================================

export interface SlideArt {
    fanart: DecodedBitmap | null;
    poster: DecodedBitmap | null;
}

export interface IdleSummary {
    now: Date;
    /** null when the count could not be fetched */
    movieCount: number | null;
    showCount: number | null;
    playingCount: number | null;
}

// ============================================================================
// LAYOUT
// ============================================================================

export const TEXT_COLOR = '#ffffff';
export const SHADOW_COLOR = '#000000';
export const OVERLAY_ALPHA = 0.5;

export const POSTER_X = 50;
export const POSTER_Y = 90;
export const TEXT_X = 300;
export const TITLE_Y = 90;
export const TITLE_SHADOW_OFFSET = 1;
export const DESCRIPTION_Y = 140;
export const DESCRIPTION_WIDTH = 500;
export const DESCRIPTION_LINE_HEIGHT = 30;
export const MAX_DESCRIPTION_LINES = 5;
export const COUNTER_Y = 400;
export const COUNTER_X = [50, 300, 550] as const;

export const TITLE_FONT: FontSpec = { size: 30, bold: true };
export const BODY_FONT: FontSpec = { size: 25 };
export const CLOCK_FONT: FontSpec = { size: 80 };
export const COUNTER_FONT: FontSpec = { size: 25 };

const END_TIME_FORMAT = '%H:%M:%S';

function formatCount(count: number | null): string {
    return count === null ? '-' : String(count);
}

// ============================================================================
// RENDERER
// ============================================================================

export class Renderer {
    constructor(
        private readonly backend: RenderBackend,
        private readonly timeFormat: string
    ) { }

    async renderSlide(slide: Slide, art: SlideArt): Promise<void> {
        await this.guard('slide', async () => {
            const { backend } = this;
            backend.clear();

            if (art.fanart) {
                backend.drawImage(art.fanart, 0, 0, backend.width, backend.height);
            } else {
                backend.drawRect(0, 0, backend.width, backend.height, SHADOW_COLOR, 1);
            }
            backend.drawRect(0, 0, backend.width, backend.height, SHADOW_COLOR, OVERLAY_ALPHA);

            if (art.poster) {
                backend.drawImage(art.poster, POSTER_X, POSTER_Y, POSTER_SIZE.width, POSTER_SIZE.height);
            }

            backend.drawText(slide.title, TITLE_FONT, TEXT_X + TITLE_SHADOW_OFFSET, TITLE_Y + TITLE_SHADOW_OFFSET, SHADOW_COLOR);
            backend.drawText(slide.title, TITLE_FONT, TEXT_X, TITLE_Y, TEXT_COLOR);

            const lines = wrapText(slide.description, DESCRIPTION_WIDTH, text => backend.measureText(text, BODY_FONT))
                .slice(0, MAX_DESCRIPTION_LINES);

            let y = DESCRIPTION_Y;
            for (const line of lines) {
                backend.drawText(line, BODY_FONT, TEXT_X, y, TEXT_COLOR);
                y += DESCRIPTION_LINE_HEIGHT;
            }

            if (slide.source === 'library' && slide.seasonEpisodeInfo) {
                const { seasons, episodes } = slide.seasonEpisodeInfo;
                backend.drawText(`Seasons: ${seasons}`, BODY_FONT, TEXT_X, y + 20, TEXT_COLOR);
                backend.drawText(`Episodes: ${episodes}`, BODY_FONT, TEXT_X, y + 50, TEXT_COLOR);
                y += 80;
            }

            if (slide.source === 'playback') {
                const { viewer, mode, endsAt } = slide.playbackInfo;
                backend.drawText(`User: ${viewer}`, BODY_FONT, TEXT_X, y + 20, TEXT_COLOR);
                backend.drawText(`Status: ${mode}`, BODY_FONT, TEXT_X, y + 50, TEXT_COLOR);
                backend.drawText(`Ends: ${strftime(END_TIME_FORMAT, endsAt)}`, BODY_FONT, TEXT_X, y + 80, TEXT_COLOR);
            }

            await backend.present();
        });
    }

    async renderIdle(summary: IdleSummary): Promise<void> {
        await this.guard('idle', async () => {
            const { backend } = this;
            backend.clear();

            const clock = strftime(this.timeFormat, summary.now);
            const clockWidth = backend.measureText(clock, CLOCK_FONT);
            backend.drawText(
                clock,
                CLOCK_FONT,
                (backend.width - clockWidth) / 2,
                (backend.height - CLOCK_FONT.size) / 2,
                TEXT_COLOR
            );

            const counters = [
                `Total Movies: ${formatCount(summary.movieCount)}`,
                `Total TV Shows: ${formatCount(summary.showCount)}`,
                `Currently Playing: ${formatCount(summary.playingCount)}`,
            ];
            counters.forEach((text, index) => {
                backend.drawText(text, COUNTER_FONT, COUNTER_X[index], COUNTER_Y, TEXT_COLOR);
            });

            await backend.present();
        });
    }

    async close(): Promise<void> {
        await this.guard('close', () => this.backend.close());
    }

    private async guard(operation: string, draw: () => Promise<void>): Promise<void> {
        try {
            await draw();
        } catch (error) {
            throw new RenderBackendError(operation, error);
        }
    }
}
