/**
 * Render Backend
 *
 * The 2D surface the renderer draws on. Coordinates are pixels from the
 * top-left corner; text is positioned by the top of its em box.
 */

import type { DecodedBitmap } from './imageFetcher';

export interface FontSpec {
    size: number;
    bold?: boolean;
}

/** CSS hex color, e.g. '#ffffff' */
export type Color = string;

export interface RenderBackend {
    readonly width: number;
    readonly height: number;
    clear(): void;
    drawImage(bitmap: DecodedBitmap, x: number, y: number, width: number, height: number): void;
    drawRect(x: number, y: number, width: number, height: number, color: Color, alpha: number): void;
    drawText(text: string, font: FontSpec, x: number, y: number, color: Color): void;
    measureText(text: string, font: FontSpec): number;
    /** Make the finished frame visible. */
    present(): Promise<void>;
    close(): Promise<void>;
}
