#!/usr/bin/env node
/**
 * Runs one synchronization session from the command line.
 *
 * Usage: sync-session --config <pipeline_config.json> --timeline <frame_timeline.json>
 *
 * Environment is read from .env.local in the working directory when present
 * (SYNC_LOG_LEVEL, SYNC_PERF_DEBUG).
 */

import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import { SyncLogger } from '../motionSync/shared/SyncLogger';
import { describeError, isSyncError } from '../motionSync/shared/errors';
import { loadFrameTimeline, loadPipelineConfig } from '../motionSync/pipeline/PipelineConfig';
import { SyncPipeline } from '../motionSync/pipeline/SyncPipeline';

const LOG_CATEGORY = 'sync-session';

const USAGE = 'Usage: sync-session --config <pipeline_config.json> --timeline <frame_timeline.json>';

export interface CliArgs {
    configPath: string;
    timelinePath: string;
}

/**
 * Null when a required flag is missing or a flag has no value.
 */
export function parseArgs(argv: readonly string[]): CliArgs | null {
    let configPath: string | null = null;
    let timelinePath: string | null = null;

    for (let i = 0; i < argv.length; i++) {
        const flag = argv[i];
        const value = argv[i + 1];
        if (flag !== '--config' && flag !== '--timeline') continue;
        if (value === undefined || value.startsWith('--')) return null;

        if (flag === '--config') configPath = value;
        else timelinePath = value;
        i++;
    }

    if (!configPath || !timelinePath) return null;
    return { configPath, timelinePath };
}

/**
 * Exit code: 0 on success, 1 on a pipeline error, 2 on bad arguments.
 */
export function main(argv: readonly string[]): number {
    const args = parseArgs(argv);
    if (!args) {
        console.error(USAGE);
        return 2;
    }

    try {
        const pipelineConfig = loadPipelineConfig(args.configPath);
        const timeline = loadFrameTimeline(args.timelinePath);
        const result = SyncPipeline.run(pipelineConfig, timeline);

        SyncLogger.info(LOG_CATEGORY, `Frames: ${result.stats.totalFrames}, with pose: ${result.stats.framesWithHand}, in gaps: ${result.stats.gapFrames}`);
        return 0;
    } catch (error) {
        if (isSyncError(error)) {
            SyncLogger.error(LOG_CATEGORY, `[${error.code}] ${error.message}`, error.details);
            return 1;
        }
        throw error;
    }
}

if (require.main === module) {
    loadEnv({ path: resolve(process.cwd(), '.env.local') });

    try {
        process.exitCode = main(process.argv.slice(2));
    } catch (error) {
        console.error(`[${LOG_CATEGORY}] Unexpected failure: ${describeError(error)}`);
        process.exitCode = 1;
    }
}
