/**
 * Section Walker - collects the files of one section directory.
 *
 * Recursive walks are top-down: a directory's files (sorted by name) come
 * before its subdirectories (sorted by name). Symlinked directories are
 * listed but never entered; symlinked files count as files.
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import { hasExtension, isExcludedFile, isUnderExcludedDir, resolveExcludedDirs } from './patterns.js';
import type { SectionRule } from '../types/rules.js';
import type { SelectionWarning } from '../types/selection.js';

interface WalkContext {
    extensions: string[];
    excludedFiles: string[];
    excludedDirAnchors: string[];
    files: string[];
    warnings: SelectionWarning[];
}

export interface SectionFiles {
    files: string[];
    /** Directories that could not be listed; their subtrees were skipped */
    warnings: SelectionWarning[];
}

function byName(a: Dirent, b: Dirent): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}

function isFileEntry(dirPath: string, entry: Dirent): boolean {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        return statSync(join(dirPath, entry.name)).isFile();
    } catch {
        // Dangling link
        return false;
    }
}

function accepts(fileName: string, ctx: WalkContext): boolean {
    return hasExtension(fileName, ctx.extensions) && !isExcludedFile(fileName, ctx.excludedFiles);
}

function listDir(dirPath: string, ctx: WalkContext): Dirent[] | undefined {
    try {
        return readdirSync(dirPath, { withFileTypes: true }).sort(byName);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        ctx.warnings.push({
            kind: 'unreadable-dir',
            path: dirPath,
            message: `Cannot read directory '${dirPath}': ${reason}. Skipping...`,
        });
        return undefined;
    }
}

function walkDir(dirPath: string, ctx: WalkContext): void {
    if (isUnderExcludedDir(dirPath, ctx.excludedDirAnchors)) return;

    const entries = listDir(dirPath, ctx);
    if (!entries) return;

    for (const entry of entries) {
        if (isFileEntry(dirPath, entry) && accepts(entry.name, ctx)) {
            ctx.files.push(join(dirPath, entry.name));
        }
    }

    for (const entry of entries) {
        if (entry.isDirectory()) {
            walkDir(join(dirPath, entry.name), ctx);
        }
    }
}

/**
 * Collect absolute paths of the files in `dirPath` that satisfy `rule`.
 * `dirPath` must be an absolute, existing directory.
 */
export function collectSectionFiles(dirPath: string, rule: SectionRule): SectionFiles {
    const ctx: WalkContext = {
        extensions: rule.extensions,
        excludedFiles: rule.excludedFiles,
        excludedDirAnchors: resolveExcludedDirs(dirPath, rule.excludedDirs),
        files: [],
        warnings: [],
    };

    if (rule.includeSubdirs) {
        walkDir(dirPath, ctx);
        return { files: ctx.files, warnings: ctx.warnings };
    }

    for (const entry of listDir(dirPath, ctx) ?? []) {
        if (isFileEntry(dirPath, entry) && accepts(entry.name, ctx)) {
            ctx.files.push(join(dirPath, entry.name));
        }
    }
    return { files: ctx.files, warnings: ctx.warnings };
}
