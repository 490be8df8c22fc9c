import * as fs from 'fs';
import * as path from 'path';
import { SyncLogger } from '../shared/SyncLogger';
import { SYNCED_POSES_FILE, WriteResult } from './SyncedPosesExporter';
import { describeError } from '../shared/errors';
import { SynchronizationStats } from './types';

const LOG_CATEGORY = 'ProcessingReport';

export const PROCESSING_REPORT_FILE = 'processing_report.md';

export interface ProcessingReportInput {
    videoPath: string;
    motionDir: string;
    motionSources: string[];
    timestampOffset: number;
    gapThreshold: number;
    stats: SynchronizationStats;
    projectedFrames: number;
    syncedPosesExported: boolean;
    generatedAt?: Date;
}

function percent(count: number, total: number): string {
    if (total === 0) return '0.0%';
    return `${(count / total * 100).toFixed(1)}%`;
}

/**
 * Markdown summary of one pipeline run.
 */
export function generateProcessingReport(input: ProcessingReportInput): string {
    const { stats } = input;
    const generatedAt = input.generatedAt ?? new Date();
    const lines: string[] = [];

    lines.push('# Motion Sync Processing Report');
    lines.push('');
    lines.push('## Processing Information');
    lines.push(`- **Date**: ${generatedAt.toISOString()}`);
    lines.push('');
    lines.push('## Input Data');
    lines.push(`- **Video**: \`${input.videoPath}\``);
    lines.push(`- **Motion Directory**: \`${input.motionDir}\``);
    lines.push(`- **Motion Sources**: ${input.motionSources.length > 0 ? input.motionSources.join(', ') : 'none'}`);
    lines.push(`- **Total Frames**: ${stats.totalFrames}`);
    lines.push(`- **Timestamp Offset**: ${input.timestampOffset}s`);
    lines.push('');
    lines.push('## Processing Statistics');
    lines.push(`- **Frames with Synchronized Pose**: ${stats.framesWithHand} (${percent(stats.framesWithHand, stats.totalFrames)})`);
    lines.push(`- **Frames with Camera Pose**: ${stats.framesWithCamera} (${percent(stats.framesWithCamera, stats.totalFrames)})`);
    lines.push(`- **Frames in Gaps**: ${stats.gapFrames} (${percent(stats.gapFrames, stats.totalFrames)})`);
    lines.push(`- **Frames Projected in View**: ${input.projectedFrames}`);
    lines.push(`- **Gap Threshold**: ${input.gapThreshold}s`);
    lines.push('');
    lines.push('## Output Files');
    if (input.syncedPosesExported) {
        lines.push(`- Synced poses: \`${SYNCED_POSES_FILE}\``);
    }
    lines.push(`- Report: \`${PROCESSING_REPORT_FILE}\``);
    lines.push('');
    lines.push('## Notes');
    lines.push('- Frames marked "in_gap" fall inside a pause in the motion recording; no pose was produced for them');
    lines.push('- Timestamps are in seconds on the motion clock');
    lines.push('');

    return lines.join('\n');
}

export function writeProcessingReport(filePath: string, markdown: string): WriteResult {
    try {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        fs.writeFileSync(filePath, markdown, 'utf-8');
        SyncLogger.info(LOG_CATEGORY, `Report saved: ${filePath}`);
        return { success: true, filePath };
    } catch (err) {
        SyncLogger.error(LOG_CATEGORY, `Failed to write ${filePath}`, err);
        return { success: false, error: `Failed to write file: ${describeError(err)}` };
    }
}
