export { selectFiles, validateBaseDirectory } from './engine.js';

// Section walking
export { collectSectionFiles } from './walk.js';
export type { SectionFiles } from './walk.js';

// Pattern matching
export {
    matchesExclusion,
    isExcludedFile,
    hasExtension,
    resolveExcludedDirs,
    isUnderExcludedDir,
} from './patterns.js';
