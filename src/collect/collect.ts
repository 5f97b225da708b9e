/**
 * Collection Pipeline:
 *
 * 1. Load rules (ConfigError aborts before any walk)
 * 2. Validate the base directory
 * 3. Select files per section, then specific files
 * 4. Optionally let the operator deselect files
 * 5. Render the document and manifest
 * 6. Write both
 *
 * Warnings are printed as they arise and returned with the result.
 */

import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { EmptySelectionError } from '../errors.js';
import { loadRules } from '../config/rules.js';
import { selectFiles, validateBaseDirectory } from '../selection/index.js';
import { renderDocument, renderManifest } from '../render/index.js';
import { pickFiles, type PickFilesFn } from './picker.js';
import { DEFAULT_MANIFEST, ensureParentDir, resolveOutputPath } from './output.js';
import type { SectionReport, SelectionWarning } from '../types/selection.js';

export interface CollectOptions {
    baseDirectory: string;
    /** Path of the rules file to load */
    configPath: string;
    /** Config name used for the default output name (default: configPath) */
    configName?: string;
    /** Document destination, see resolveOutputPath */
    output?: string;
    /** Manifest destination (default: files.txt) */
    manifest?: string;
    /** Show the file checklist before writing */
    interactive?: boolean;
    /** Checklist implementation (default: inquirer prompt) */
    pickFiles?: PickFilesFn;
    /** Timestamp for the document header (default: now) */
    generatedAt?: Date;
    verbose?: boolean;
}

export interface CollectResult {
    /** Absolute path of the written document */
    outputPath: string;
    /** Absolute path of the written manifest */
    manifestPath: string;
    /** Files in document order */
    files: string[];
    /** Document length in characters */
    totalChars: number;
    sections: SectionReport[];
    warnings: SelectionWarning[];
    /** Directories created for the outputs */
    createdDirs: string[];
    timing: {
        selectMs: number;
        renderMs: number;
        totalMs: number;
    };
}

function report(warnings: SelectionWarning[]): void {
    for (const warning of warnings) {
        console.warn(`⚠️  ${warning.message}`);
    }
}

export async function collect(options: CollectOptions): Promise<CollectResult> {
    const totalStart = Date.now();
    const { verbose = false } = options;

    const rules = loadRules(options.configPath);
    const base = validateBaseDirectory(options.baseDirectory);

    if (verbose) {
        if (rules.global.excludedDirs.length > 0) {
            console.log(`  Global excluded directories: ${rules.global.excludedDirs.join(', ')}`);
        }
        if (rules.global.excludedFiles.length > 0) {
            console.log(`  Global excluded files: ${rules.global.excludedFiles.join(', ')}`);
        }
    }

    // ── Select ───────────────────────────────────────────────────────────────
    const selectStart = Date.now();
    const selection = selectFiles(base, rules);
    const selectMs = Date.now() - selectStart;

    report(selection.warnings);
    if (verbose) {
        for (const section of selection.sections) {
            if (section.found) console.log(`  Found ${section.fileCount} files in ${section.directory}`);
        }
        selection.specificFiles.forEach(file => console.log(`  Added specific file: ${file}`));
        console.log(`  Selected ${selection.files.length} files in ${selectMs}ms`);
    }

    let files = selection.files;
    if (files.length > 0 && options.interactive) {
        files = await pickFiles(files, base, options.pickFiles);
        if (verbose) console.log(`  Kept ${files.length} of ${selection.files.length} files`);
    }

    if (files.length === 0) {
        throw new EmptySelectionError(
            selection.files.length === 0 ? 'No matching files found.' : 'No files selected.',
            selection.warnings
        );
    }

    // ── Render ───────────────────────────────────────────────────────────────
    const renderStart = Date.now();
    const document = renderDocument(files, base, { generatedAt: options.generatedAt });
    const manifest = renderManifest(document.files, base);
    const renderMs = Date.now() - renderStart;

    report(document.warnings);

    // ── Write ────────────────────────────────────────────────────────────────
    const outputPath = resolve(resolveOutputPath(options.output, options.configName ?? options.configPath));
    const manifestPath = resolve(options.manifest ?? DEFAULT_MANIFEST);
    const createdDirs: string[] = [];

    for (const target of [outputPath, manifestPath]) {
        const created = ensureParentDir(target);
        if (created) {
            createdDirs.push(created);
            if (verbose) console.log(`  Created directory: ${created}`);
        }
    }

    writeFileSync(outputPath, document.markdown, 'utf-8');
    writeFileSync(manifestPath, manifest, 'utf-8');

    return {
        outputPath,
        manifestPath,
        files: document.files,
        totalChars: [...document.markdown].length,
        sections: selection.sections,
        warnings: [...selection.warnings, ...document.warnings],
        createdDirs,
        timing: { selectMs, renderMs, totalMs: Date.now() - totalStart },
    };
}
