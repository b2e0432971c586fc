/**
 * Quit Signal
 *
 * Turns SIGINT/SIGTERM, and `q` or Escape on an interactive terminal, into
 * an AbortSignal for the display loop.
 */

import { emitKeypressEvents, type Key } from 'readline';
import type { EventEmitter } from 'events';
import logger from '../../utils/logger';

export interface QuitSignal {
    readonly signal: AbortSignal;
    /** Detach every listener and restore the terminal. */
    dispose(): void;
}

export interface QuitSignalSources {
    /** Receives SIGINT/SIGTERM */
    processEvents?: Pick<EventEmitter, 'on' | 'off'>;
    /** Keyboard input, only watched when it is a TTY */
    input?: NodeJS.ReadStream | null;
}

const QUIT_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Keys that stop the display. Raw mode swallows Ctrl+C, so it is matched
 * here as well.
 */
export function isQuitKey(key: Key | undefined): boolean {
    if (!key) return false;
    if (key.ctrl && key.name === 'c') return true;
    return key.name === 'q' || key.name === 'escape';
}

export function createQuitSignal(sources: QuitSignalSources = {}): QuitSignal {
    const processEvents = sources.processEvents ?? process;
    const input = sources.input === undefined ? process.stdin : sources.input;
    const controller = new AbortController();

    const quit = (reason: string): void => {
        if (controller.signal.aborted) return;
        logger.info(`[Quit] ${reason} received, stopping display`);
        controller.abort(reason);
    };

    const signalHandlers = QUIT_SIGNALS.map(name => {
        const handler = (): void => quit(name);
        processEvents.on(name, handler);
        return { name, handler };
    });

    const onKeypress = (_text: string | undefined, key: Key | undefined): void => {
        if (isQuitKey(key)) {
            quit(`Key "${key?.name ?? ''}"`);
        }
    };

    const watchKeys = Boolean(input?.isTTY);
    if (input && watchKeys) {
        emitKeypressEvents(input);
        input.setRawMode(true);
        input.on('keypress', onKeypress);
        input.resume();
    }

    return {
        signal: controller.signal,
        dispose: () => {
            for (const { name, handler } of signalHandlers) {
                processEvents.off(name, handler);
            }
            if (input && watchKeys) {
                input.off('keypress', onKeypress);
                input.setRawMode(false);
                input.pause();
            }
        },
    };
}
