/**
 * Exclusion matching.
 *
 * File patterns are compared against a base name only:
 *   "*.min.js"  - suffix match (checked first, so "*x*" is a suffix match on "x*")
 *   "test_*"    - prefix match
 *   "setup.py"  - exact match
 *
 * Directory exclusions are absolute anchors compared on path-separator boundaries.
 */

import { resolve, sep } from 'path';

export function matchesExclusion(pattern: string, fileName: string): boolean {
    if (pattern.startsWith('*')) return fileName.endsWith(pattern.slice(1));
    if (pattern.endsWith('*')) return fileName.startsWith(pattern.slice(0, -1));
    return fileName === pattern;
}

export function isExcludedFile(fileName: string, patterns: readonly string[]): boolean {
    return patterns.some(pattern => matchesExclusion(pattern, fileName));
}

export function hasExtension(fileName: string, extensions: readonly string[]): boolean {
    return extensions.some(ext => fileName.endsWith(ext));
}

/**
 * Resolve excluded directory entries against the directory they are relative to.
 * Absolute entries stay as they are.
 */
export function resolveExcludedDirs(baseDir: string, excludedDirs: readonly string[]): string[] {
    return excludedDirs.map(dir => resolve(baseDir, dir));
}

/**
 * True if `dirPath` equals an anchor or lies beneath one.
 * "/a/b" excludes "/a/b/c" but not "/a/bc".
 */
export function isUnderExcludedDir(dirPath: string, anchors: readonly string[]): boolean {
    const abs = resolve(dirPath);
    return anchors.some(anchor => {
        if (abs === anchor) return true;
        const prefix = anchor.endsWith(sep) ? anchor : anchor + sep;
        return abs.startsWith(prefix);
    });
}
