#!/usr/bin/env node
/**
 * Marquee - Display Entry Point
 *
 * Loads configuration, wires the application context and runs the display
 * loop until a quit signal arrives.
 *
 * Exit codes: 0 on a clean quit, 1 on a configuration or render failure.
 */

// Load environment variables from .env file
import 'dotenv/config';

import fs from 'fs';
import path from 'path';
import logger from './utils/logger';
import { isInsecureRemoteUrl, loadDisplayConfig, type DisplayConfig } from './config/displayConfig';
import { createAppContext } from './services/display/context';
import { DisplayLoop } from './services/display/DisplayLoop';
import { DisplayError, extractErrorMessage } from './services/display/errors';
import { createQuitSignal } from './services/display/quitSignal';

function readVersion(): string {
    // server/ in development, dist/server/ when built
    for (const candidate of ['../package.json', '../../package.json']) {
        const file = path.resolve(__dirname, candidate);
        if (!fs.existsSync(file)) continue;
        const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
            return parsed.version;
        }
    }
    return 'unknown';
}

async function main(): Promise<number> {
    let config: DisplayConfig;
    try {
        config = loadDisplayConfig();
    } catch (error) {
        logger.error(`[Startup] ${extractErrorMessage(error)}`);
        return 1;
    }

    logger.setLevel(config.logLevel);
    logger.startup('Marquee', {
        version: readVersion(),
        server: config.serverUrl,
        screen: `${config.screenWidth}x${config.screenHeight}`,
        output: config.outputPath,
        displaySeconds: config.displaySeconds,
    });

    if (isInsecureRemoteUrl(config.serverUrl)) {
        logger.warn(`[Startup] Media server is reached over plain HTTP, the token is sent unencrypted: url=${config.serverUrl}`);
    }

    const quit = createQuitSignal();
    try {
        const ctx = createAppContext(config);
        const loop = new DisplayLoop(ctx);
        try {
            await loop.run(quit.signal);
        } finally {
            await ctx.renderer.close();
        }
        return 0;
    } catch (error) {
        const code = error instanceof DisplayError ? error.code : 'UNEXPECTED';
        logger.error(`[Startup] Display stopped: code=${code}, error="${extractErrorMessage(error)}"`);
        return 1;
    } finally {
        quit.dispose();
    }
}

main().then(
    code => process.exit(code),
    (error: unknown) => {
        logger.error(`[Startup] Fatal: error="${extractErrorMessage(error)}"`);
        process.exit(1);
    }
);
