#!/usr/bin/env node

/**
 * Command line entry point.
 *
 * Usage:
 *   evalkit <config> [--no-predictions] [--json] [--log-level LEVEL] [--output-dir DIR]
 *   evalkit --help
 */

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createDefaultRegistries } from './components.js';
import { loadConfigFromFile } from './config/loader.js';
import type { EvaluationConfig } from './config/schema.js';
import { ConfigurationError } from './errors.js';
import { createLogger, isLogLevel, LOG_LEVELS, type LogLevel } from './logger.js';
import { renderResult } from './reporting/renderer.js';
import { toPredictionJson } from './runner/result.js';
import { EvaluationRunner } from './runner/runner.js';

export interface CliArgs {
  configFile?: string;
  savePredictions: boolean;
  json: boolean;
  logLevel: LogLevel;
  outputDir?: string;
  help: boolean;
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const USAGE = [
  'Usage: evalkit <config> [options]',
  '',
  'Run the evaluation described by a YAML or JSON config file.',
  '',
  'Options:',
  '  --no-predictions     Neither print nor save per-example predictions',
  '  --json               Print a JSON summary instead of the metric table',
  `  --log-level <level>  One of ${LOG_LEVELS.join(', ')} (default: info)`,
  '  --output-dir <dir>   Override the output directory from the config',
  '  --help, -h           Show this help message',
].join('\n');

/**
 * Parse arguments (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { savePredictions: true, json: false, logLevel: 'info', help: false };

  const valueOf = (i: number, flag: string): string => {
    const value = argv[i];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Option '${flag}' expects a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--no-predictions') {
      args.savePredictions = false;
    } else if (arg === '--json') {
      args.json = true;
    } else if (arg === '--log-level') {
      const level = valueOf(++i, arg);
      if (!isLogLevel(level)) {
        throw new ConfigurationError(
          `Invalid log level '${level}'. Valid choices: ${LOG_LEVELS.join(', ')}`,
        );
      }
      args.logLevel = level;
    } else if (arg === '--output-dir') {
      args.outputDir = valueOf(++i, arg);
    } else if (arg.startsWith('-')) {
      throw new ConfigurationError(`Unknown option '${arg}'`);
    } else if (args.configFile === undefined) {
      args.configFile = arg;
    } else {
      throw new ConfigurationError(`Unexpected argument '${arg}'`);
    }
  }

  return args;
}

/**
 * Apply command line overrides to a loaded config.
 */
export function applyOverrides(config: EvaluationConfig, args: CliArgs): EvaluationConfig {
  return {
    ...config,
    output: {
      directory: args.outputDir === undefined ? config.output.directory : resolve(args.outputDir),
      savePredictions: config.output.savePredictions && args.savePredictions,
    },
  };
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    io.stderr(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    io.stderr(USAGE);
    return 2;
  }

  if (args.help || args.configFile === undefined) {
    (args.help ? io.stdout : io.stderr)(USAGE);
    return args.help ? 0 : 2;
  }

  const logger = createLogger({
    level: args.logLevel,
    sink: (_level, line) => io.stderr(line),
  });

  try {
    const config = applyOverrides(loadConfigFromFile(args.configFile), args);
    const runner = new EvaluationRunner(config, { registries: createDefaultRegistries(), logger });
    const result = await runner.run();

    if (args.json) {
      const summary = {
        name: result.name,
        task: result.task,
        metrics: result.metrics,
        output_path: result.outputPath,
      };
      io.stdout(JSON.stringify(summary, null, 2));
    } else {
      io.stdout(renderResult(result));
    }

    if (args.savePredictions) {
      io.stdout('Predictions:');
      for (const prediction of result.predictions) {
        io.stdout(JSON.stringify(toPredictionJson(prediction)));
      }
    }
    return 0;
  } catch (error) {
    if (error instanceof Error) {
      io.stderr(`${error.name}: ${error.message}`);
    } else {
      io.stderr(`Error: ${String(error)}`);
    }
    return 1;
  }
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Unexpected error:', error);
      process.exitCode = 1;
    },
  );
}
