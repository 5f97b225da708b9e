/**
 * Sectioned Config Parser
 *
 * Reads the key-value format used by extraction configs:
 *   [section]                 - Start a section (names are case-sensitive)
 *   key = value / key: value  - Option (names are lower-cased)
 *   # comment / ; comment     - Full-line comments only
 *
 * A line indented deeper than the option that opened it continues that
 * option's value, so lists can be written one entry per line. Keys under
 * [DEFAULT] are fallbacks for every other section. Values are literal.
 */

import { ConfigError } from '../errors.js';

export const DEFAULT_SECTION = 'DEFAULT';

const TRUE_VALUES = new Set(['1', 'yes', 'true', 'on']);
const FALSE_VALUES = new Set(['0', 'no', 'false', 'off']);

type OptionMap = Map<string, string>;

interface PendingOption {
    key: string;
    lines: string[];
    indent: number;
    target: OptionMap;
}

export class ConfigDocument {
    constructor(
        private readonly sectionMap: Map<string, OptionMap>,
        private readonly defaults: OptionMap,
        readonly source?: string
    ) {}

    /** Section names in declaration order, without DEFAULT. */
    sections(): string[] {
        return [...this.sectionMap.keys()];
    }

    hasSection(name: string): boolean {
        return this.sectionMap.has(name);
    }

    has(section: string, key: string): boolean {
        return this.get(section, key) !== undefined;
    }

    get(section: string, key: string): string | undefined {
        const options = this.sectionMap.get(section);
        if (!options) return undefined;
        const optionName = key.toLowerCase();
        return options.get(optionName) ?? this.defaults.get(optionName);
    }

    getBoolean(section: string, key: string, fallback: boolean): boolean {
        const raw = this.get(section, key);
        if (raw === undefined) return fallback;

        const lower = raw.toLowerCase();
        if (TRUE_VALUES.has(lower)) return true;
        if (FALSE_VALUES.has(lower)) return false;
        throw new ConfigError(
            `Config "${section}.${key}" is not a boolean: "${raw}"`,
            this.source
        );
    }
}

function indentOf(line: string): number {
    return line.length - line.trimStart().length;
}

function finishOption(pending: PendingOption): void {
    const lines = [...pending.lines];
    while (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
    pending.target.set(pending.key, lines.join('\n'));
}

/**
 * Parse config text into a ConfigDocument.
 * Throws ConfigError (with the 1-based line number) on malformed input.
 */
export function parseConfigText(text: string, source?: string): ConfigDocument {
    const sectionMap = new Map<string, OptionMap>();
    const defaults: OptionMap = new Map();
    const where = source ?? '<string>';

    let current: OptionMap | undefined;
    let pending: PendingOption | undefined;

    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const raw = lines[i];
        const lineNo = i + 1;
        const stripped = raw.trim();

        if (stripped.startsWith('#') || stripped.startsWith(';')) continue;

        if (stripped === '') {
            if (pending) pending.lines.push('');
            continue;
        }

        const indent = indentOf(raw);

        // Continuation of a multi-line value
        if (pending && indent > pending.indent) {
            pending.lines.push(stripped);
            continue;
        }

        if (pending) {
            finishOption(pending);
            pending = undefined;
        }

        // Anything after the last ']' on a header line is ignored
        const header = /^\[(.+)\]/.exec(stripped);
        if (header) {
            const name = header[1].trim();
            if (name === DEFAULT_SECTION) {
                current = defaults;
            } else if (sectionMap.has(name)) {
                throw new ConfigError(
                    `Section "${name}" already exists (${where}, line ${lineNo})`,
                    source,
                    lineNo
                );
            } else {
                current = new Map();
                sectionMap.set(name, current);
            }
            continue;
        }

        if (!current) {
            throw new ConfigError(
                `File contains no section headers (${where}, line ${lineNo})`,
                source,
                lineNo
            );
        }

        const delimiter = stripped.search(/[=:]/);
        const key = delimiter === -1 ? '' : stripped.slice(0, delimiter).trim().toLowerCase();
        if (!key) {
            throw new ConfigError(
                `Cannot parse line ${lineNo} in ${where}: ${stripped}`,
                source,
                lineNo
            );
        }
        if (current.has(key)) {
            throw new ConfigError(
                `Option "${key}" already exists in this section (${where}, line ${lineNo})`,
                source,
                lineNo
            );
        }

        pending = {
            key,
            lines: [stripped.slice(delimiter + 1).trim()],
            indent,
            target: current,
        };
    }

    if (pending) finishOption(pending);

    return new ConfigDocument(sectionMap, defaults, source);
}
