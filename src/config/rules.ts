/**
 * Extraction Rules - turns a sectioned config into a RuleModel.
 *
 * Recognized sections:
 *   [global]          excluded_dirs, excluded_files (applied to every section)
 *   [specific_files]  files (paths relative to the base directory)
 *   [<dir>]           extensions (required), include_subdirs, excluded_dirs, excluded_files
 *
 * List values are comma separated, or one entry per line when no comma is present.
 */

import { readFileSync, existsSync, statSync } from 'fs';
import { resolve, join } from 'path';
import { ConfigError } from '../errors.js';
import { parseConfigText, type ConfigDocument } from './config-parser.js';
import type { GlobalExclusions, RuleModel, SectionRule } from '../types/rules.js';

export const GLOBAL_SECTION = 'global';
export const SPECIFIC_FILES_SECTION = 'specific_files';

const RESERVED_SECTIONS = new Set([GLOBAL_SECTION, SPECIFIC_FILES_SECTION]);

/**
 * Split a list value. If the text contains a comma it is split on commas only,
 * so newline-separated items inside a comma list stay joined to their neighbour.
 */
export function parseList(text: string | undefined): string[] {
    if (!text) return [];
    const separator = text.includes(',') ? ',' : '\n';
    return text
        .split(separator)
        .map(item => item.trim())
        .filter(item => item.length > 0);
}

function normalizeExtension(ext: string): string {
    return ext.startsWith('.') ? ext : `.${ext}`;
}

function readGlobal(doc: ConfigDocument): GlobalExclusions {
    if (!doc.hasSection(GLOBAL_SECTION)) {
        return { excludedDirs: [], excludedFiles: [] };
    }
    return {
        excludedDirs: parseList(doc.get(GLOBAL_SECTION, 'excluded_dirs')),
        excludedFiles: parseList(doc.get(GLOBAL_SECTION, 'excluded_files')),
    };
}

function readSection(doc: ConfigDocument, name: string, global: GlobalExclusions): SectionRule {
    const rawExtensions = doc.get(name, 'extensions');
    if (rawExtensions === undefined) {
        throw new ConfigError(`Section "${name}" is missing required key "extensions"`, doc.source);
    }

    const extensions = parseList(rawExtensions).map(normalizeExtension);
    if (extensions.length === 0) {
        throw new ConfigError(`Section "${name}" has an empty "extensions" list`, doc.source);
    }

    return {
        name,
        extensions,
        includeSubdirs: doc.getBoolean(name, 'include_subdirs', true),
        excludedDirs: [...global.excludedDirs, ...parseList(doc.get(name, 'excluded_dirs'))],
        excludedFiles: [...global.excludedFiles, ...parseList(doc.get(name, 'excluded_files'))],
    };
}

/**
 * Build a RuleModel from config text.
 */
export function parseRules(text: string, source?: string): RuleModel {
    const doc = parseConfigText(text, source);
    const global = readGlobal(doc);

    const sections = doc
        .sections()
        .filter(name => !RESERVED_SECTIONS.has(name))
        .map(name => readSection(doc, name, global));

    const specificFiles = doc.hasSection(SPECIFIC_FILES_SECTION)
        ? parseList(doc.get(SPECIFIC_FILES_SECTION, 'files'))
        : [];

    return { source, global, sections, specificFiles };
}

/**
 * Load and parse a rules file.
 * Throws ConfigError on a missing or unreadable file as well as on bad content.
 */
export function loadRules(configPath: string): RuleModel {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`, absolutePath);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Failed to read config file: ${absolutePath} (${reason})`, absolutePath);
    }

    return parseRules(raw, absolutePath);
}

/**
 * Map a config name to its file name:
 *   "web"              -> "web_extract.config"
 *   "web_extract.config" / "custom.config" -> unchanged
 */
export function configFileName(name: string): string {
    return name.endsWith('.config') ? name : `${name}_extract.config`;
}

/**
 * Locate a config by name. An existing file path is returned as-is;
 * otherwise the first search directory holding the mapped file name wins.
 */
export function findConfigFile(name: string, searchDirs: string[]): string | undefined {
    const direct = resolve(name);
    if (existsSync(direct) && statSync(direct).isFile()) return direct;

    const fileName = configFileName(name);
    for (const dir of searchDirs) {
        const candidate = resolve(join(dir, fileName));
        if (existsSync(candidate)) return candidate;
    }

    return undefined;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Starter config written by the `init` command.
 */
export const CONFIG_TEMPLATE = `# Extraction config
#
# Every section other than [global] and [specific_files] names a directory
# relative to the base directory. Lists are comma separated, or one entry
# per line (indented) when no comma is used.

[global]
excluded_dirs = node_modules, dist, build, .git
excluded_files = *.min.js, *.map, package-lock.json

[src]
extensions = ts, tsx, js
include_subdirs = true
excluded_dirs = generated
excluded_files = *.test.ts, *.spec.ts

[specific_files]
files =
    package.json
    README.md
`;
