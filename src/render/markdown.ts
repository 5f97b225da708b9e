/**
 * Document Renderer - turns selected files into one markdown document
 * plus a manifest of relative paths.
 */

import { readFileSync } from 'fs';
import { relative } from 'path';
import { languageForFile } from './language.js';
import type { SelectionWarning } from '../types/selection.js';

export const DOCUMENT_TITLE = 'Project Code Collection';

export interface RenderOptions {
    /** Timestamp printed under the title (default: now) */
    generatedAt?: Date;
}

export interface RenderedDocument {
    markdown: string;
    /** Absolute paths in document order */
    files: string[];
    /** Files that could not be read; each got an inline notice */
    warnings: SelectionWarning[];
}

function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Sort absolute paths by their path relative to `baseDirectory`.
 */
export function sortByRelativePath(files: readonly string[], baseDirectory: string): string[] {
    return [...files].sort((a, b) =>
        compareStrings(relative(baseDirectory, a), relative(baseDirectory, b))
    );
}

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}

/**
 * Render the document. Files are sorted by relative path; a file that cannot
 * be read is replaced by an error line and reported in `warnings`.
 */
export function renderDocument(
    files: readonly string[],
    baseDirectory: string,
    options: RenderOptions = {}
): RenderedDocument {
    const generatedAt = options.generatedAt ?? new Date();
    const ordered = sortByRelativePath(files, baseDirectory);
    const warnings: SelectionWarning[] = [];

    let markdown = `# ${DOCUMENT_TITLE}\n\n`;
    markdown += `Generated on: ${formatTimestamp(generatedAt)}\n\n`;

    for (const filePath of ordered) {
        markdown += `## ${relative(baseDirectory, filePath)}\n\n`;
        try {
            const content = readFileSync(filePath, 'utf-8');
            markdown += `\`\`\`${languageForFile(filePath)}\n${content}\n\`\`\`\n\n`;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            markdown += `Error reading ${filePath}: ${reason}\n\n`;
            warnings.push({
                kind: 'unreadable-file',
                path: filePath,
                message: `Error reading ${filePath}: ${reason}`,
            });
        }
    }

    return { markdown, files: ordered, warnings };
}

/**
 * One relative path per line, in the order given.
 */
export function renderManifest(files: readonly string[], baseDirectory: string): string {
    return files.map(file => `${relative(baseDirectory, file)}\n`).join('');
}
