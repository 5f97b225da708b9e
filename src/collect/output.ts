/**
 * Output locations for the generated document and manifest.
 */

import { existsSync, mkdirSync } from 'fs';
import { basename, dirname, join } from 'path';

export const EXTRACTS_DIR = 'Extracts';
export const DEFAULT_MANIFEST = 'files.txt';

/**
 * Short name for a config, used in default output names:
 *   "web" / "web_extract.config" / "configs/web_extract.config" -> "web"
 */
export function configDisplayName(config: string): string {
    const name = basename(config);
    if (name.endsWith('_extract.config')) return name.slice(0, -'_extract.config'.length);
    if (name.endsWith('.config')) return name.slice(0, -'.config'.length);
    return name;
}

/**
 * Where the document goes:
 * - nothing given        -> Extracts/<config>_collection.md
 * - a bare file name     -> Extracts/<name>
 * - a path with folders  -> used as given
 */
export function resolveOutputPath(output: string | undefined, config: string): string {
    if (!output) return join(EXTRACTS_DIR, `${configDisplayName(config)}_collection.md`);
    if (basename(output) !== output) return output;
    return join(EXTRACTS_DIR, output);
}

/**
 * Create the parent directory of `filePath` if needed.
 * Returns the directory when it had to be created.
 */
export function ensureParentDir(filePath: string): string | undefined {
    const directory = dirname(filePath);
    if (existsSync(directory)) return undefined;
    mkdirSync(directory, { recursive: true });
    return directory;
}
