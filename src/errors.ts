/**
 * Fatal errors raised by the collection pipeline.
 * Anything non-fatal is reported as a SelectionWarning instead.
 */

import type { SelectionWarning } from './types/selection.js';

/**
 * Config source missing, unreadable, malformed, or missing a required key.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly source?: string,
        public readonly line?: number
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Base directory missing or not a directory.
 */
export class DirectoryNotFoundError extends Error {
    constructor(public readonly path: string) {
        super(`Directory '${path}' not found.`);
        this.name = 'DirectoryNotFoundError';
    }
}

/**
 * Nothing matched any rule. Carries the warnings gathered on the way,
 * which usually explain why.
 */
export class EmptySelectionError extends Error {
    constructor(
        message: string = 'No matching files found.',
        public readonly warnings: SelectionWarning[] = []
    ) {
        super(message);
        this.name = 'EmptySelectionError';
    }
}
