/**
 * Foreground Hint
 *
 * Asks the host to bring the kiosk viewer to the front. The loop calls it
 * once per cycle and ignores the outcome.
 */

export interface ForegroundHint {
    raise(): Promise<void>;
}

export class NoopForegroundHint implements ForegroundHint {
    async raise(): Promise<void> {
        // nothing to raise when the frame is published as a file
    }
}
