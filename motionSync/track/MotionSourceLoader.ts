import * as fs from 'fs';
import * as path from 'path';
import { DiagnosticLog, SyncDiagnostic, SyncError, SyncErrorCode, describeError } from '../shared/errors';
import { SyncLogger } from '../shared/SyncLogger';
import { SOURCE_FILES } from '../shared/constants';
import { MotionTrack } from './MotionTrack';
import { NamedMotionSource } from './types';

const LOG_CATEGORY = 'MotionSourceLoader';

export interface LoadedSources {
    sources: NamedMotionSource[];
    diagnostics: readonly SyncDiagnostic[];
}

export interface LoadedTrack {
    track: MotionTrack;
    diagnostics: readonly SyncDiagnostic[];
    /** File names that contributed samples */
    sourceNames: string[];
}

/**
 * True for *.json files that are not sidecar metadata/validation records.
 */
export function isMotionSourceFile(fileName: string): boolean {
    return fileName.endsWith(SOURCE_FILES.EXTENSION) &&
        !SOURCE_FILES.EXCLUDED_SUFFIXES.some(suffix => fileName.endsWith(suffix));
}

/**
 * Lists motion source files of a directory in name order.
 */
export function listMotionSourceFiles(dirPath: string): string[] {
    return fs.readdirSync(dirPath)
        .filter(isMotionSourceFile)
        .sort()
        .map(fileName => path.join(dirPath, fileName));
}

/**
 * Reads a motion source file or every source file of a directory.
 * A missing path is fatal for the caller (SyncError); unreadable files are skipped and reported.
 */
export function loadMotionSources(targetPath: string): LoadedSources {
    const diagnostics = new DiagnosticLog(LOG_CATEGORY);

    if (!fs.existsSync(targetPath)) {
        throw new SyncError(SyncErrorCode.SOURCE_NOT_FOUND, `Motion path not found: ${targetPath}`, { path: targetPath });
    }

    const files = fs.statSync(targetPath).isDirectory()
        ? listMotionSourceFiles(targetPath)
        : [targetPath];

    if (files.length === 0) {
        diagnostics.report(SyncErrorCode.NO_SOURCES, 'No motion source files found', { source: targetPath });
    }

    const sources: NamedMotionSource[] = [];
    for (const file of files) {
        const name = path.basename(file);
        try {
            const record: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
            sources.push({ name, record });
            SyncLogger.debug(LOG_CATEGORY, `Read ${name}`);
        } catch (error) {
            diagnostics.report(SyncErrorCode.SOURCE_READ_FAILED, `Failed to read: ${describeError(error)}`, { source: name });
        }
    }

    return { sources, diagnostics: diagnostics.getAll() };
}

/**
 * Loads sources from disk and merges them into one MotionTrack.
 */
export function loadMotionTrack(targetPath: string): LoadedTrack {
    const loaded = loadMotionSources(targetPath);
    const built = MotionTrack.build(loaded.sources);

    return {
        track: built.track,
        diagnostics: [...loaded.diagnostics, ...built.diagnostics],
        sourceNames: built.contributingSources
    };
}
