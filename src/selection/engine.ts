/**
 * Selection Engine - evaluates a RuleModel against a base directory.
 *
 * 1. Validate the base directory (fatal if missing)
 * 2. Walk each section directory in declared order
 * 3. Append specific files that exist and are not globally excluded
 *
 * Problems with individual sections or files become warnings; nothing here logs.
 */

import { existsSync, statSync } from 'fs';
import { resolve, basename } from 'path';
import { DirectoryNotFoundError } from '../errors.js';
import { collectSectionFiles } from './walk.js';
import { isExcludedFile } from './patterns.js';
import type { RuleModel } from '../types/rules.js';
import type { SectionReport, SelectionResult, SelectionWarning } from '../types/selection.js';

function isDirectory(path: string): boolean {
    return existsSync(path) && statSync(path).isDirectory();
}

function isRegularFile(path: string): boolean {
    return existsSync(path) && statSync(path).isFile();
}

/**
 * Resolve and validate the base directory. Returns its absolute path.
 */
export function validateBaseDirectory(baseDirectory: string): string {
    const abs = resolve(baseDirectory);
    if (!isDirectory(abs)) {
        throw new DirectoryNotFoundError(baseDirectory);
    }
    return abs;
}

/**
 * Select the files described by `rules` under `baseDirectory`.
 * Files keep walk order; callers that present them sort by relative path.
 */
export function selectFiles(baseDirectory: string, rules: RuleModel): SelectionResult {
    const base = validateBaseDirectory(baseDirectory);

    const files: string[] = [];
    const seen = new Set<string>();
    const warnings: SelectionWarning[] = [];
    const sections: SectionReport[] = [];
    const specificFiles: string[] = [];

    const add = (path: string): void => {
        if (seen.has(path)) return;
        seen.add(path);
        files.push(path);
    };

    for (const rule of rules.sections) {
        const dirPath = resolve(base, rule.name);

        if (!isDirectory(dirPath)) {
            warnings.push({
                kind: 'missing-section-dir',
                path: dirPath,
                message: `Directory '${dirPath}' does not exist. Skipping...`,
            });
            sections.push({ name: rule.name, directory: dirPath, found: false, fileCount: 0 });
            continue;
        }

        const collected = collectSectionFiles(dirPath, rule);
        collected.files.forEach(add);
        warnings.push(...collected.warnings);
        sections.push({ name: rule.name, directory: dirPath, found: true, fileCount: collected.files.length });
    }

    for (const specific of rules.specificFiles) {
        const fullPath = resolve(base, specific);

        if (!isRegularFile(fullPath)) {
            warnings.push({
                kind: 'missing-specific-file',
                path: specific,
                message: `Specific file '${specific}' not found. Skipping...`,
            });
            continue;
        }

        if (isExcludedFile(basename(specific), rules.global.excludedFiles)) {
            warnings.push({
                kind: 'excluded-specific-file',
                path: specific,
                message: `Skipping excluded specific file: ${specific}`,
            });
            continue;
        }

        add(fullPath);
        specificFiles.push(fullPath);
    }

    return { files, warnings, sections, specificFiles };
}
