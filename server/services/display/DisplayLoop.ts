/**
 * Display Loop
 *
 * Drives the kiosk: poll the catalog, rotate through the cycle's slides,
 * show the idle screen, repeat until the quit signal aborts.
 *
 * polling → rotating → idle → polling …, and `stopped` once run() returns.
 *
 * Catalog failures degrade the cycle to "no items". Image and metadata
 * failures degrade a single slide. Only RenderBackendError escapes run().
 *
 * @module server/services/display/DisplayLoop
 */

import logger from '../../utils/logger';
import type { LibraryItem, PlaybackItem } from '../../integrations/types';
import type { AppContext } from './context';
import { CatalogQueryError, extractErrorMessage } from './errors';
import type { SlideArt } from './renderer';
import { fromLibrary, fromPlayback, withTranscodedArt, type Slide } from './slides';

export type LoopState = 'polling' | 'rotating' | 'idle' | 'stopped';

/**
 * Wait `ms`, resolving early as soon as `signal` aborts.
 */
export function dwell(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve();
            return;
        }

        const finish = (): void => {
            clearTimeout(timer);
            signal.removeEventListener('abort', finish);
            resolve();
        };
        const timer = setTimeout(finish, ms);
        signal.addEventListener('abort', finish, { once: true });
    });
}

export class DisplayLoop {
    private currentState: LoopState = 'stopped';

    constructor(private readonly ctx: AppContext) { }

    get state(): LoopState {
        return this.currentState;
    }

    /**
     * Run cycles until `signal` aborts. Rejects only on a fatal render error.
     */
    async run(signal: AbortSignal): Promise<void> {
        logger.info(`[DisplayLoop] Started: displaySeconds=${this.ctx.config.displaySeconds}, recentItems=${this.ctx.config.recentItemCount}`);
        try {
            while (!signal.aborted) {
                await this.runCycle(signal);
            }
        } finally {
            this.setState('stopped');
            logger.info('[DisplayLoop] Stopped');
        }
    }

    /**
     * One full cycle: poll, rotate, idle.
     */
    async runCycle(signal: AbortSignal): Promise<void> {
        const { catalog, config } = this.ctx;

        this.setState('polling');
        await this.raiseForeground();

        const playing = await this.query('currentlyPlaying', () => catalog.currentlyPlaying());

        let slides: Slide[];
        if (playing && playing.length > 0) {
            slides = this.playbackSlides(playing);
        } else {
            const recent = await this.query('recentlyAdded', () => catalog.recentlyAdded(config.recentItemCount));
            slides = recent ? await this.librarySlides(recent) : [];
        }

        const screen = { width: config.screenWidth, height: config.screenHeight };
        slides = slides.map(slide => withTranscodedArt(slide, catalog, screen));

        logger.debug(`[DisplayLoop] Cycle: source=${playing && playing.length > 0 ? 'playback' : 'library'}, slides=${slides.length}`);

        this.setState('rotating');
        await this.rotate(slides, signal);
        if (signal.aborted) return;

        this.setState('idle');
        await this.showIdle(playing, signal);
    }

    // ========================================================================
    // SLIDES
    // ========================================================================

    private playbackSlides(items: PlaybackItem[]): Slide[] {
        const now = this.ctx.clock();
        return items.map(item => fromPlayback(item, now));
    }

    private async librarySlides(items: LibraryItem[]): Promise<Slide[]> {
        const { catalog } = this.ctx;
        const slides: Slide[] = [];
        for (const item of items) {
            slides.push(await fromLibrary(item, showId => catalog.resolveShow(showId)));
        }
        return slides;
    }

    private async rotate(slides: Slide[], signal: AbortSignal): Promise<void> {
        const { config, renderer } = this.ctx;
        let prefetched: Promise<SlideArt> | null = null;

        for (let index = 0; index < slides.length; index++) {
            if (signal.aborted) break;

            const slide = slides[index];
            const art = await (prefetched ?? this.fetchArt(slide, signal));
            prefetched = null;

            await renderer.renderSlide(slide, art);

            const next = slides[index + 1];
            if (config.prefetchNext && next) {
                prefetched = this.fetchArt(next, signal);
            }

            await dwell(config.displaySeconds * 1000, signal);
        }
        // A prefetch still pending after an abort is left behind: it shares
        // the signal, so its downloads are cancelled and it resolves to null art
    }

    private async fetchArt(slide: Slide, signal: AbortSignal): Promise<SlideArt> {
        const [fanart, poster] = await Promise.all([
            this.fetchImage(slide.fanartUrl, signal),
            this.fetchImage(slide.posterUrl, signal),
        ]);
        return { fanart, poster };
    }

    private async fetchImage(url: string | undefined, signal: AbortSignal): Promise<SlideArt['fanart']> {
        try {
            return await this.ctx.images.fetch(url, signal);
        } catch (error) {
            logger.warn(`[DisplayLoop] Image fetch threw: error="${extractErrorMessage(error)}"`);
            return null;
        }
    }

    // ========================================================================
    // IDLE
    // ========================================================================

    /**
     * The playing counter reuses this cycle's sessions result instead of
     * querying the server a second time.
     */
    private async showIdle(playing: PlaybackItem[] | null, signal: AbortSignal): Promise<void> {
        const { catalog, config, renderer } = this.ctx;

        const counts = await this.query('libraryCounts', () =>
            catalog.libraryCounts([config.movieSection, config.showSection])
        );

        await renderer.renderIdle({
            now: this.ctx.clock(),
            movieCount: counts?.[config.movieSection] ?? null,
            showCount: counts?.[config.showSection] ?? null,
            playingCount: playing ? playing.length : null,
        });

        await dwell(config.displaySeconds * 1000, signal);
    }

    // ========================================================================
    // HELPERS
    // ========================================================================

    private async query<T>(operation: string, call: () => Promise<T>): Promise<T | null> {
        try {
            return await call();
        } catch (error) {
            const failure = new CatalogQueryError(operation, error);
            logger.error(`[DisplayLoop] ${failure.message}`);
            return null;
        }
    }

    private async raiseForeground(): Promise<void> {
        try {
            await this.ctx.foregroundHint.raise();
        } catch (error) {
            logger.debug(`[DisplayLoop] Foreground hint failed: error="${extractErrorMessage(error)}"`);
        }
    }

    private setState(state: LoopState): void {
        if (this.currentState === state) return;
        logger.debug(`[DisplayLoop] State: ${this.currentState} -> ${state}`);
        this.currentState = state;
    }
}
