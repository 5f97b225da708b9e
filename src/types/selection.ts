/**
 * Selection result types shared by the engine, renderer and CLI.
 */

export type WarningKind =
    | 'missing-section-dir'
    | 'unreadable-dir'
    | 'missing-specific-file'
    | 'excluded-specific-file'
    | 'unreadable-file';

export interface SelectionWarning {
    kind: WarningKind;
    /** The path the warning is about, as configured or resolved */
    path: string;
    message: string;
}

export interface SectionReport {
    name: string;
    /** Absolute section directory */
    directory: string;
    /** False when the directory did not exist */
    found: boolean;
    fileCount: number;
}

export interface SelectionResult {
    /** Unique absolute paths in selection order (not sorted) */
    files: string[];
    warnings: SelectionWarning[];
    sections: SectionReport[];
    /** Specific files that made it into `files` or were already there */
    specificFiles: string[];
}
