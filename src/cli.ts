#!/usr/bin/env node

/**
 * codecollect CLI
 *
 * Collect a project's source files into one markdown document.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve, basename } from 'path';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { collect } from './collect/index.js';
import { findConfigFile, loadRules, CONFIG_TEMPLATE } from './config/rules.js';
import { EmptySelectionError } from './errors.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const BUNDLED_CONFIGS_DIR = fileURLToPath(new URL('../configs/', import.meta.url));
const DEFAULT_CONFIG = 'default';

const program = new Command();

interface CollectCommandOptions {
    config: string;
    output?: string;
    manifest: string;
    interactive?: boolean;
    verbose?: boolean;
}

/**
 * Config search order: ./configs, the working directory, then the presets shipped with the package.
 */
function configSearchDirs(): string[] {
    return [resolve('configs'), resolve('.'), BUNDLED_CONFIGS_DIR];
}

function locateConfig(name: string): string {
    const configPath = findConfigFile(name, configSearchDirs());
    if (!configPath) {
        console.error(`Error: Config file for '${name}' not found in 'configs/', the working directory, or the bundled presets.`);
        process.exit(1);
    }
    return configPath;
}

program
    .name('codecollect')
    .description('Collect project source files into a single markdown document')
    .version(pkg.version);

/**
 * Collect command - default
 */
program
    .command('collect', { isDefault: true })
    .description('Collect files from a project directory using an extraction config')
    .argument('<directory>', 'Base directory of the project')
    .option('-c, --config <name>', 'Config to use: a preset name (e.g. web, android) or a .config file', DEFAULT_CONFIG)
    .option('-o, --output <file>', 'Output file (a bare file name goes into Extracts/)')
    .option('-m, --manifest <file>', 'Manifest listing the collected files', 'files.txt')
    .option('-i, --interactive', 'Choose files from a checklist before writing')
    .option('--verbose', 'Verbose output')
    .action(async (directory: string, options: CollectCommandOptions) => {
        try {
            const startTime = Date.now();
            const configPath = locateConfig(options.config);

            console.log(`📄 Using config: ${basename(configPath)}`);
            console.log(`📁 Scanning base directory: ${directory}`);
            if (options.verbose) {
                console.log(`  Config path: ${configPath}`);
            }

            const result = await collect({
                baseDirectory: directory,
                configPath,
                configName: options.config,
                output: options.output,
                manifest: options.manifest,
                interactive: options.interactive ?? false,
                verbose: options.verbose ?? false,
            });

            const totalTime = Date.now() - startTime;
            console.log(`✅ Successfully wrote content to ${result.outputPath}`);
            console.log(`📦 Total size: ${result.totalChars.toLocaleString('en-US')} characters (${result.files.length} files)`);
            console.log(`📋 Generated ${result.manifestPath} listing all extracted files.`);
            if (result.warnings.length > 0) {
                console.log(`⚠️  ${result.warnings.length} warning(s)`);
            }
            if (options.verbose) {
                const t = result.timing;
                console.log(`  select: ${t.selectMs}ms, render: ${t.renderMs}ms, total: ${(totalTime / 1000).toFixed(2)}s`);
            }
        } catch (error) {
            if (error instanceof EmptySelectionError) {
                console.error(`❌ ${error.message} Nothing was written.`);
            } else {
                console.error('❌ Error:', error instanceof Error ? error.message : error);
            }
            process.exit(1);
        }
    });

/**
 * Rules command - parse and show a config without collecting
 */
program
    .command('rules')
    .description('Parse an extraction config and print its rules')
    .argument('[config]', 'Config name or path', DEFAULT_CONFIG)
    .action((name: string) => {
        try {
            const rules = loadRules(locateConfig(name));

            console.log(`Config: ${rules.source}`);
            if (rules.global.excludedDirs.length > 0 || rules.global.excludedFiles.length > 0) {
                console.log('\nGlobal:');
                console.log(`  excluded dirs:  ${rules.global.excludedDirs.join(', ') || '-'}`);
                console.log(`  excluded files: ${rules.global.excludedFiles.join(', ') || '-'}`);
            }
            console.log('\nSections:');
            for (const section of rules.sections) {
                console.log(`  - [${section.name}] ${section.extensions.join(' ')}${section.includeSubdirs ? '' : ' (top level only)'}`);
                if (section.excludedDirs.length > 0) console.log(`      excluded dirs:  ${section.excludedDirs.join(', ')}`);
                if (section.excludedFiles.length > 0) console.log(`      excluded files: ${section.excludedFiles.join(', ')}`);
            }
            if (rules.specificFiles.length > 0) {
                console.log('\nSpecific files:');
                rules.specificFiles.forEach(file => console.log(`  - ${file}`));
            }
        } catch (error) {
            console.error('Config error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter extraction config')
    .argument('[path]', 'Output path for config file', 'custom_extract.config')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            writeFileSync(absolutePath, CONFIG_TEMPLATE, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: codecollect <directory> --config ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// Parse arguments and run
program.parseAsync().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
});
