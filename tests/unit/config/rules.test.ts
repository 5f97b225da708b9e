import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  parseList,
  parseRules,
  loadRules,
  configFileName,
  findConfigFile,
  CONFIG_TEMPLATE,
} from '../../../src/config/rules.js';
import { ConfigError } from '../../../src/errors.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'codecollect-rules-test-' + Date.now());

function writeConfig(relativePath: string, content: string): string {
  const filepath = join(TEST_DIR, relativePath);
  mkdirSync(join(filepath, '..'), { recursive: true });
  writeFileSync(filepath, content, 'utf-8');
  return filepath;
}

// ── parseList ───────────────────────────────────────────────────────────────

describe('parseList', () => {
  it('splits on commas and trims', () => {
    expect(parseList(' a , b,c ')).toEqual(['a', 'b', 'c']);
  });

  it('splits on newlines when there is no comma', () => {
    expect(parseList('\nREADME.md\n  package.json \n')).toEqual(['README.md', 'package.json']);
  });

  it('drops empty tokens', () => {
    expect(parseList('a,,b, ,')).toEqual(['a', 'b']);
  });

  it('prefers commas when both separators appear', () => {
    expect(parseList('a\nb, c')).toEqual(['a\nb', 'c']);
  });

  it('returns [] for empty or missing text', () => {
    expect(parseList('')).toEqual([]);
    expect(parseList(undefined)).toEqual([]);
  });
});

// ── parseRules ──────────────────────────────────────────────────────────────

describe('parseRules', () => {
  it('builds a section with normalized extensions and defaults', () => {
    const rules = parseRules('[src]\nextensions = py, .pyi\n');
    expect(rules.sections).toEqual([
      {
        name: 'src',
        extensions: ['.py', '.pyi'],
        includeSubdirs: true,
        excludedDirs: [],
        excludedFiles: [],
      },
    ]);
    expect(rules.global).toEqual({ excludedDirs: [], excludedFiles: [] });
    expect(rules.specificFiles).toEqual([]);
  });

  it('puts global exclusions before section exclusions', () => {
    const rules = parseRules([
      '[global]',
      'excluded_dirs = build',
      'excluded_files = *.min.js',
      '',
      '[web]',
      'extensions = js',
      'excluded_dirs = vendor',
      'excluded_files = test_*, setup.js',
    ].join('\n'));

    expect(rules.global).toEqual({ excludedDirs: ['build'], excludedFiles: ['*.min.js'] });
    expect(rules.sections[0].excludedDirs).toEqual(['build', 'vendor']);
    expect(rules.sections[0].excludedFiles).toEqual(['*.min.js', 'test_*', 'setup.js']);
  });

  it('does not treat global or specific_files as directory sections', () => {
    const rules = parseRules([
      '[global]',
      'excluded_files = *.log',
      '[src]',
      'extensions = ts',
      '[specific_files]',
      'files = README.md, docs/guide.md',
    ].join('\n'));

    expect(rules.sections.map(s => s.name)).toEqual(['src']);
    expect(rules.specificFiles).toEqual(['README.md', 'docs/guide.md']);
  });

  it('accepts a specific_files section without a files key', () => {
    const rules = parseRules('[specific_files]\n');
    expect(rules.specificFiles).toEqual([]);
  });

  it('reads include_subdirs', () => {
    const rules = parseRules('[res]\nextensions = xml\ninclude_subdirs = false\n');
    expect(rules.sections[0].includeSubdirs).toBe(false);
  });

  it('keeps sections in declaration order', () => {
    const rules = parseRules('[b]\nextensions = x\n[a]\nextensions = y\n[c]\nextensions = z\n');
    expect(rules.sections.map(s => s.name)).toEqual(['b', 'a', 'c']);
  });

  it('throws ConfigError when a section has no extensions key', () => {
    expect(() => parseRules('[src]\ninclude_subdirs = true\n'))
      .toThrow('Section "src" is missing required key "extensions"');
  });

  it('throws ConfigError when extensions is empty', () => {
    expect(() => parseRules('[src]\nextensions =\n')).toThrow(ConfigError);
  });

  it('throws ConfigError on an invalid boolean', () => {
    expect(() => parseRules('[src]\nextensions = ts\ninclude_subdirs = sometimes\n')).toThrow(ConfigError);
  });

  it('parses the init template', () => {
    const rules = parseRules(CONFIG_TEMPLATE);
    expect(rules.sections.map(s => s.name)).toEqual(['src']);
    expect(rules.sections[0].extensions).toEqual(['.ts', '.tsx', '.js']);
    expect(rules.sections[0].excludedDirs).toEqual(['node_modules', 'dist', 'build', '.git', 'generated']);
    expect(rules.specificFiles).toEqual(['package.json', 'README.md']);
  });
});

// ── loadRules / findConfigFile ──────────────────────────────────────────────

describe('loadRules', () => {
  afterEach(() => {
    try { rmSync(TEST_DIR, { recursive: true, force: true }); } catch { /* ignore */ }
  });

  it('throws ConfigError if the file does not exist', () => {
    expect(() => loadRules('/nonexistent/path/web_extract.config')).toThrow(ConfigError);
    expect(() => loadRules('/nonexistent/path/web_extract.config')).toThrow('Config file not found');
  });

  it('records the source path', () => {
    const path = writeConfig('web_extract.config', '[src]\nextensions = ts\n');
    const rules = loadRules(path);
    expect(rules.source).toBe(path);
    expect(rules.sections).toHaveLength(1);
  });

  it('throws ConfigError with the source on malformed content', () => {
    const path = writeConfig('bad.config', 'no header here\n');
    try {
      loadRules(path);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) expect(error.source).toBe(path);
    }
  });
});

describe('configFileName', () => {
  it('maps a preset name to <name>_extract.config', () => {
    expect(configFileName('web')).toBe('web_extract.config');
  });

  it('keeps names that already end with .config', () => {
    expect(configFileName('web_extract.config')).toBe('web_extract.config');
    expect(configFileName('custom.config')).toBe('custom.config');
  });
});

describe('findConfigFile', () => {
  afterEach(() => {
    try { rmSync(TEST_DIR, { recursive: true, force: true }); } catch { /* ignore */ }
  });

  it('searches directories in order', () => {
    const first = join(TEST_DIR, 'first');
    const second = join(TEST_DIR, 'second');
    writeConfig('second/web_extract.config', '[src]\nextensions = ts\n');
    expect(findConfigFile('web', [first, second])).toBe(join(second, 'web_extract.config'));

    writeConfig('first/web_extract.config', '[src]\nextensions = js\n');
    expect(findConfigFile('web', [first, second])).toBe(join(first, 'web_extract.config'));
  });

  it('returns an existing file path directly', () => {
    const path = writeConfig('elsewhere/mine.config', '[src]\nextensions = ts\n');
    expect(findConfigFile(path, [])).toBe(path);
  });

  it('returns undefined when nothing matches', () => {
    expect(findConfigFile('missing-preset', [TEST_DIR])).toBeUndefined();
  });
});
