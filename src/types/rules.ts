/**
 * Rule model types: what an extraction config describes.
 */

/** Exclusions applied to every section before its own. */
export interface GlobalExclusions {
    excludedDirs: string[];
    /** Exclusion patterns: exact name, "*suffix" or "prefix*" */
    excludedFiles: string[];
}

export interface SectionRule {
    /** Section name, also the directory relative to the base directory */
    name: string;
    /** Non-empty, each with a leading dot */
    extensions: string[];
    includeSubdirs: boolean;
    /** Global entries first, then the section's own. Relative to the section directory. */
    excludedDirs: string[];
    /** Global patterns first, then the section's own */
    excludedFiles: string[];
}

export interface RuleModel {
    /** Where the rules were loaded from, if a file */
    source?: string;
    global: GlobalExclusions;
    sections: SectionRule[];
    /** Paths relative to the base directory, included regardless of extension */
    specificFiles: string[];
}
