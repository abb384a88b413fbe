#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { lintFiles } from './index.js';
import { BUILTIN_RULES, createCatalog } from './core/rules/catalog.js';
import { ConfigError } from './core/config/errors.js';
import { loadConfigFile } from './core/config/parse.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import type { OutputFormat, FormatOptions, Report } from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_ERRORS = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_CONFIG_ERROR = 3;

function printUsage(): void {
  process.stdout.write(
    `Usage: pg-schema-lint [options] <file.sql...>

Options:
  --config <path>       Rule override document (JSON)
  --format <fmt>        Output format: json | text (default: text)
  --out <path>          Write output to file instead of stdout
  --no-timestamp        Omit timestamp from output
  --pretty              Pretty-print JSON output
  --diagnostics-only    Omit summary and per-file sections from JSON output
  --verbose             Report progress and timing on stderr
  --list-rules          Print the effective rule catalog and exit
  --help                Show this help message

Exit codes: 0 passed, 1 error diagnostics, 2 usage error, 3 invalid configuration.
`,
  );
}

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      format: { type: 'string', default: 'text' },
      out: { type: 'string' },
      'no-timestamp': { type: 'boolean', default: false },
      pretty: { type: 'boolean', default: false },
      'diagnostics-only': { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      'list-rules': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

function listRules(configPath: string | undefined): string {
  const overrides = configPath !== undefined ? loadConfigFile(configPath).rules : {};
  const catalog = createCatalog(overrides, BUILTIN_RULES, configPath ?? null);
  const lines = catalog.entries.map((entry) => {
    const state = entry.enabled ? '' : ' (disabled)';
    return `${entry.id.padEnd(36)}${entry.category.padEnd(13)}${entry.severity.padEnd(9)}${entry.description}${state}`;
  });
  return lines.join('\n');
}

function writeOutput(output: string, outPath: string | undefined): void {
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }
}

export async function main(argv?: string[]): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;

  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  const { values, positionals } = args;

  if (values.help === true) {
    printUsage();
    return EXIT_OK;
  }

  // Resolve config path if provided
  let configPath: string | undefined;
  if (values.config !== undefined) {
    configPath = resolve(values.config);
    if (!existsSync(configPath)) {
      process.stderr.write(`Error: Config file not found: ${configPath}\n`);
      return EXIT_CLI_ERROR;
    }
  }

  if (values['list-rules'] === true) {
    try {
      writeOutput(listRules(configPath), values.out);
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        process.stderr.write(`Error: ${error.message}\n`);
        return EXIT_CONFIG_ERROR;
      }
      throw error;
    }
    return EXIT_OK;
  }

  // Validate format
  const format = values.format ?? 'text';
  if (format !== 'json' && format !== 'text') {
    process.stderr.write(
      `Error: Invalid format "${format}". Must be "json" or "text".\n`,
    );
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;

  if (positionals.length === 0) {
    process.stderr.write('Error: No input files. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }

  const missing = positionals.filter((path) => !existsSync(resolve(path)));
  if (missing.length > 0) {
    for (const path of missing) {
      process.stderr.write(`Error: Input file not found: ${path}\n`);
    }
    return EXIT_CLI_ERROR;
  }

  const verbose = values.verbose === true;
  const formatOptions: FormatOptions = { diagnosticsOnly: values['diagnostics-only'] === true };
  const started = performance.now();

  // Run lint
  let report: Report;
  try {
    report = await lintFiles({
      paths: positionals,
      configPath,
      noTimestamp: values['no-timestamp'] === true,
      onFile: verbose ? (path) => process.stderr.write(`Linting ${path}\n`) : undefined,
    });
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return EXIT_CONFIG_ERROR;
    }
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: Failed to read input. ${detail}\n`);
    return EXIT_CLI_ERROR;
  }

  if (verbose) {
    const elapsed = Math.round(performance.now() - started);
    process.stderr.write(
      `Linted ${String(report.summary.files)} file(s), ${String(report.summary.total)} diagnostic(s) in ${String(elapsed)} ms\n`,
    );
  }

  // Format output
  const output =
    outputFormat === 'json' ? toJson(report, values.pretty === true, formatOptions) : toText(report);
  writeOutput(output, values.out);

  return report.passed ? EXIT_OK : EXIT_ERRORS;
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Error: ${detail}\n`);
      process.exitCode = EXIT_CLI_ERROR;
    });
}
