#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { realpathSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { checkPathsWith, createResolver, listIncludedPathsWith, type Resolver } from '../api.js';
import { describeCause, type IoError } from '../errors.js';

/**
 * CLI interface for gitignore-resolver
 */

type Command = 'check' | 'tree';

export interface CLIOptions {
  command?: Command;
  paths: string[];
  root: string;
  ignoreFile?: string;
  single: boolean;
  directory: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const HELP_TEXT = `
gitignore-resolver - Decide which paths .gitignore rules exclude, without git

USAGE:
  gitignore-resolver check <paths...> [options]
  gitignore-resolver tree [options]

COMMANDS:
  check                     Report whether each path is excluded
  tree                      List every path that is not excluded

OPTIONS:
  --root, -r <dir>          Repository root (default: current directory)
  --ignore-file, -f <name>  Ignore file name (default: .gitignore)
  --single, -s              Only use the ignore file at the root
  --directory, -d           Treat checked paths as directories
  --verbose, -v             Report dropped rules and unreadable files
  --help, -h                Show this help message
  --version, -V             Show version number

EXAMPLES:
  gitignore-resolver check dist src/index.ts
  gitignore-resolver check build --directory --single
  gitignore-resolver tree --root ./my-repo
`;

export const VERSION = '1.0.0';

const COMMANDS: readonly Command[] = ['check', 'tree'];

/**
 * Parse command line arguments
 * @throws Error if an option is unknown or the command is not recognized
 */
export function parseCliArgs(args: string[]): CLIOptions {
  const { values, positionals } = parseArgs({
    args,
    options: {
      root: {
        type: 'string',
        short: 'r',
      },
      'ignore-file': {
        type: 'string',
        short: 'f',
      },
      single: {
        type: 'boolean',
        short: 's',
        default: false,
      },
      directory: {
        type: 'boolean',
        short: 'd',
        default: false,
      },
      verbose: {
        type: 'boolean',
        short: 'v',
        default: false,
      },
      help: {
        type: 'boolean',
        short: 'h',
        default: false,
      },
      version: {
        type: 'boolean',
        short: 'V',
        default: false,
      },
    },
    allowPositionals: true,
  });

  const [commandName, ...paths] = positionals;
  let command: Command | undefined;
  if (commandName !== undefined) {
    command = COMMANDS.find(candidate => candidate === commandName);
    if (!command) {
      throw new Error(`Unknown command: ${commandName}`);
    }
  }

  return {
    command,
    paths,
    root: values.root ?? process.cwd(),
    ignoreFile: values['ignore-file'],
    single: values.single ?? false,
    directory: values.directory ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

/**
 * Validate parsed options, returning the problems found
 */
export function validateOptions(options: CLIOptions): string[] {
  const errors: string[] = [];

  if (!options.command) {
    errors.push('A command is required: check or tree');
  }
  if (options.command === 'check' && options.paths.length === 0) {
    errors.push('At least one path must be given to check');
  }
  if (options.command === 'tree' && options.paths.length > 0) {
    errors.push('tree does not take paths');
  }
  if (options.ignoreFile !== undefined && options.ignoreFile.trim() === '') {
    errors.push('Empty ignore file name provided');
  }

  return errors;
}

/**
 * Load the rules the command consults, once per run
 * @throws IoError if the root (or, with --single, its ignore file) cannot be read
 */
export function createCliResolver(options: CLIOptions): Resolver {
  return createResolver(options.root, {
    ignoreFileName: options.ignoreFile,
    single: options.single,
  });
}

/**
 * Output lines for the check command, one `File: <path>, Excluded: <bool>` per path
 */
export function runCheck(options: CLIOptions, resolver: Resolver = createCliResolver(options)): string[] {
  const checks = checkPathsWith(resolver, options.paths, {
    directory: options.directory || undefined,
  });

  return checks.map(check => `File: ${check.path}, Excluded: ${check.ignored}`);
}

/**
 * Output lines for the tree command: included paths relative to the root
 */
export function runTree(
  options: CLIOptions,
  resolver: Resolver = createCliResolver(options),
  onSkip?: (error: IoError) => void
): string[] {
  const root = path.resolve(options.root);
  const included = listIncludedPathsWith(resolver, { onSkip });

  return included.map(absolutePath => path.relative(root, absolutePath));
}

/**
 * Diagnostics about rules and ignore files the resolver left out
 */
export function collectDiagnostics(resolver: Resolver): string[] {
  const ruleSets = resolver.kind === 'single' ? [resolver.ruleSet] : [...resolver.hierarchy.ruleSets.values()];
  const lines: string[] = [];

  for (const ruleSet of ruleSets) {
    for (const invalid of ruleSet.invalidRules) {
      lines.push(`${ruleSet.source}:${invalid.line}: ${invalid.error.message}`);
    }
  }
  if (resolver.kind === 'hierarchy') {
    for (const failure of resolver.hierarchy.failures) {
      lines.push(failure.error.message);
    }
  }

  return lines;
}

/**
 * Main CLI entry point
 * @returns Process exit code
 */
export function main(args: string[] = process.argv.slice(2)): number {
  let options: CLIOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    console.error('Error parsing arguments:', describeCause(error));
    return 1;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (options.version) {
    console.log(VERSION);
    return 0;
  }

  const errors = validateOptions(options);
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`Error: ${error}`);
    }
    console.error(HELP_TEXT);
    return 1;
  }

  try {
    if (options.verbose) {
      console.log('CLI Options:', {
        command: options.command,
        root: options.root,
        ignoreFile: options.ignoreFile,
        single: options.single,
      });
    }

    const resolver = createCliResolver(options);
    if (options.verbose) {
      for (const line of collectDiagnostics(resolver)) {
        console.warn(`Warning: ${line}`);
      }
    }

    const output =
      options.command === 'check'
        ? runCheck(options, resolver)
        : runTree(
            options,
            resolver,
            options.verbose ? error => console.warn(`Warning: ${error.message}`) : undefined
          );

    for (const line of output) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    console.error('Error:', describeCause(error));
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  process.exitCode = main();
}
