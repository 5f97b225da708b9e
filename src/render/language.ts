import { extname } from 'path';

export const FALLBACK_LANGUAGE = 'text';

/** Map file extension to markdown language hint */
const LANGUAGE_MAP: Record<string, string> = {
    '.ts': 'typescript', '.tsx': 'tsx',
    '.js': 'javascript', '.jsx': 'jsx', '.mjs': 'javascript', '.cjs': 'javascript',
    '.py': 'python',
    '.kt': 'kotlin', '.java': 'java',
    '.rs': 'rust',
    '.go': 'go',
    '.rb': 'ruby',
    '.php': 'php',
    '.cs': 'csharp',
    '.cpp': 'cpp', '.cc': 'cpp', '.h': 'cpp', '.c': 'c',
    '.swift': 'swift',
    '.sh': 'bash',
    '.sql': 'sql',
    '.html': 'html',
    '.css': 'css', '.scss': 'scss',
    '.json': 'json',
    '.yaml': 'yaml', '.yml': 'yaml',
    '.toml': 'toml',
    '.xml': 'xml',
    '.md': 'markdown',
    '.config': 'ini',
};

export function languageForFile(filePath: string): string {
    return LANGUAGE_MAP[extname(filePath).toLowerCase()] ?? FALLBACK_LANGUAGE;
}
