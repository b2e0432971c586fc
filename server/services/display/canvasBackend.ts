/**
 * Canvas Render Backend
 *
 * Draws frames with @napi-rs/canvas and publishes each presented frame as a
 * PNG at `outputPath`. The file is replaced atomically (temp file + rename)
 * so a kiosk viewer never reads a half-written frame.
 */

import fs from 'fs';
import path from 'path';
import { createCanvas, GlobalFonts, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import logger from '../../utils/logger';
import type { DecodedBitmap } from './imageFetcher';
import type { Color, FontSpec, RenderBackend } from './renderBackend';

export interface CanvasBackendOptions {
    width: number;
    height: number;
    outputPath: string;
    fontFamily: string;
    /** TTF/OTF file registered under `fontFamily` */
    fontPath?: string | null;
}

export class CanvasBackend implements RenderBackend {
    readonly width: number;
    readonly height: number;

    private readonly canvas: Canvas;
    private readonly ctx: SKRSContext2D;
    private readonly outputPath: string;
    private readonly tempPath: string;
    private readonly fontFamily: string;
    private outputDirReady = false;

    constructor(options: CanvasBackendOptions) {
        this.width = options.width;
        this.height = options.height;
        this.outputPath = options.outputPath;
        this.tempPath = `${options.outputPath}.tmp`;
        this.fontFamily = options.fontFamily;

        if (options.fontPath) {
            const registered = GlobalFonts.registerFromPath(options.fontPath, options.fontFamily);
            if (!registered) {
                throw new Error(`Font could not be loaded: ${options.fontPath}`);
            }
            logger.info(`[Canvas] Registered font: family="${options.fontFamily}", path=${options.fontPath}`);
        }

        this.canvas = createCanvas(this.width, this.height);
        this.ctx = this.canvas.getContext('2d');
        this.ctx.textBaseline = 'top';
    }

    clear(): void {
        this.ctx.globalAlpha = 1;
        this.ctx.fillStyle = '#000000';
        this.ctx.fillRect(0, 0, this.width, this.height);
    }

    drawImage(bitmap: DecodedBitmap, x: number, y: number, width: number, height: number): void {
        const source = createCanvas(bitmap.width, bitmap.height);
        const sourceCtx = source.getContext('2d');
        const imageData = sourceCtx.createImageData(bitmap.width, bitmap.height);
        imageData.data.set(bitmap.data);
        sourceCtx.putImageData(imageData, 0, 0);

        this.ctx.globalAlpha = 1;
        this.ctx.drawImage(source, x, y, width, height);
    }

    drawRect(x: number, y: number, width: number, height: number, color: Color, alpha: number): void {
        this.ctx.globalAlpha = alpha;
        this.ctx.fillStyle = color;
        this.ctx.fillRect(x, y, width, height);
        this.ctx.globalAlpha = 1;
    }

    drawText(text: string, font: FontSpec, x: number, y: number, color: Color): void {
        this.ctx.globalAlpha = 1;
        this.ctx.font = this.fontString(font);
        this.ctx.fillStyle = color;
        this.ctx.fillText(text, x, y);
    }

    measureText(text: string, font: FontSpec): number {
        this.ctx.font = this.fontString(font);
        return this.ctx.measureText(text).width;
    }

    async present(): Promise<void> {
        if (!this.outputDirReady) {
            await fs.promises.mkdir(path.dirname(this.outputPath), { recursive: true });
            this.outputDirReady = true;
        }

        const png = await this.canvas.encode('png');
        await fs.promises.writeFile(this.tempPath, png);
        await fs.promises.rename(this.tempPath, this.outputPath);
    }

    async close(): Promise<void> {
        await fs.promises.rm(this.tempPath, { force: true });
    }

    private fontString(font: FontSpec): string {
        const family = /\s/.test(this.fontFamily) ? `"${this.fontFamily}"` : this.fontFamily;
        return `${font.bold ? 'bold ' : ''}${font.size}px ${family}`;
    }
}
