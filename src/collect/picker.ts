/**
 * Interactive file checklist.
 *
 * The prompt is injectable: pass your own function or a mock for tests.
 */

import inquirer from 'inquirer';
import { relative } from 'path';
import { sortByRelativePath } from '../render/index.js';

export interface FileChoice {
    /** Label shown in the checklist (path relative to the base directory) */
    name: string;
    /** Absolute path */
    value: string;
}

/** Receives every selected file, returns the absolute paths to keep. */
export type PickFilesFn = (choices: FileChoice[]) => Promise<string[]>;

export const promptFileChecklist: PickFilesFn = async (choices) => {
    const answer = await inquirer.prompt<{ files: string[] }>([
        {
            type: 'checkbox',
            name: 'files',
            message: `Select files to include (${choices.length} found)`,
            choices: choices.map(choice => ({ ...choice, checked: true })),
            pageSize: 20,
        },
    ]);
    return answer.files;
};

/**
 * Let the operator deselect files. Everything starts checked; the result keeps
 * relative-path order and ignores answers that were not offered.
 */
export async function pickFiles(
    files: readonly string[],
    baseDirectory: string,
    pick: PickFilesFn = promptFileChecklist
): Promise<string[]> {
    const ordered = sortByRelativePath(files, baseDirectory);
    const choices = ordered.map(file => ({ name: relative(baseDirectory, file), value: file }));
    const kept = new Set(await pick(choices));
    return ordered.filter(file => kept.has(file));
}
