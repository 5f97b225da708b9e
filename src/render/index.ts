export { renderDocument, renderManifest, sortByRelativePath, formatTimestamp, DOCUMENT_TITLE } from './markdown.js';
export type { RenderOptions, RenderedDocument } from './markdown.js';

export { languageForFile, FALLBACK_LANGUAGE } from './language.js';
