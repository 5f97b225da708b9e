export { collect } from './collect.js';
export type { CollectOptions, CollectResult } from './collect.js';

// Output locations
export { resolveOutputPath, configDisplayName, ensureParentDir, EXTRACTS_DIR, DEFAULT_MANIFEST } from './output.js';

// Interactive checklist
export { pickFiles, promptFileChecklist } from './picker.js';
export type { FileChoice, PickFilesFn } from './picker.js';
