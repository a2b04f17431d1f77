#!/usr/bin/env node

/**
 * Fusion CLI
 *
 * Reads per-image recognition results from a JSON file, fuses them and
 * prints the fused result to stdout, or writes it as JSON with --output.
 */

import { existsSync, realpathSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { pathToFileURL } from 'url';
import { ConfigLoader } from '../config/ConfigLoader.js';
import {
  validateRecognitionConfig,
  type FusionConfigInput,
  type RecognitionConfig,
} from '../config/ConfigSchema.js';
import type { FusionOutcome, PerImageResult } from '../types/fusion.js';
import { fuse } from '../recognition/fusion/MultiSourceFusion.js';
import { asRecord, parsePerImageResult } from '../recognition/parsing.js';

export interface FuseCliOptions {
  file?: string;
  configPath?: string;
  outputPath?: string;
  overrides: FusionConfigInput;
  help: boolean;
}

// Injected in tests
export interface FuseCliDependencies {
  readInput: (file: string) => Promise<string>;
  loadConfig: (configPath?: string) => Promise<RecognitionConfig>;
  writeOutput: (file: string, contents: string) => Promise<void>;
  print: (text: string) => void;
  printError: (text: string) => void;
}

const defaultDependencies: FuseCliDependencies = {
  readInput: (file) => readFile(file, 'utf-8'),
  loadConfig: (configPath) => ConfigLoader.loadRecognitionConfig(configPath),
  writeOutput: (file, contents) => writeFile(file, contents, 'utf-8'),
  print: (text) => console.log(text),
  printError: (text) => console.error(text),
};

/**
 * Parse command line arguments
 *
 * @param argv Arguments after the script name
 */
export function parseArgs(argv: string[]): FuseCliOptions {
  const options: FuseCliOptions = { overrides: {}, help: false };
  const overrides: { -readonly [K in keyof FusionConfigInput]: FusionConfigInput[K] } = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--method' && i + 1 < argv.length) {
      overrides.fusionMethod = argv[++i];
    } else if (arg === '--max-images' && i + 1 < argv.length) {
      const value = parseInt(argv[++i], 10);
      if (Number.isFinite(value)) {
        overrides.maxImages = value;
      }
    } else if (arg === '--no-alternatives') {
      overrides.returnAlternatives = false;
    } else if ((arg === '--output' || arg === '-o') && i + 1 < argv.length) {
      options.outputPath = argv[++i];
    } else if (arg === '--config' && i + 1 < argv.length) {
      options.configPath = argv[++i];
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (!arg.startsWith('--') && options.file === undefined) {
      options.file = arg;
    }
  }

  options.overrides = overrides;
  return options;
}

function printHelp(print: (text: string) => void): void {
  print(`
Usage: wheel-fuse <results.json> [options]

Fuse the per-image results of several photos of the same wheel hub.
The file holds an array of results, or an object with a "results" array;
each result has "observations" (or "results") and optional "lines".

Options:
  --method <name>       Fusion method: voting, weighted, smart or merge
  --max-images <n>      Use at most n images
  --no-alternatives     Omit alternative readings
  --config <path>       Configuration file (default: ./config/recognition.json)
  -o, --output <path>   Write the fused result as JSON instead of a summary
  -h, --help            Show this help
`);
}

/**
 * Per-image results from the input file contents
 */
export function parseResultsFile(contents: string): PerImageResult[] {
  const parsed: unknown = JSON.parse(contents);
  const list = Array.isArray(parsed) ? parsed : asRecord(parsed)?.results;

  if (!Array.isArray(list)) {
    throw new Error('Input must be an array of results or an object with a "results" array');
  }

  return list.map((item, index) => {
    const result = parsePerImageResult(item);
    if (!result) {
      throw new Error(`Result ${index + 1} has no observations array`);
    }
    return result;
  });
}

function formatOutcome(outcome: FusionOutcome): string {
  if (!outcome.success) {
    return `Fusion failed (${outcome.code}): ${outcome.error}`;
  }

  const lines = [
    `Fused text: ${outcome.mergedText}`,
    `Confidence: ${outcome.confidence.toFixed(3)}`,
    `Method: ${outcome.fusionMethod}`,
    `Images used: ${outcome.sourceCount}`,
  ];

  outcome.lines.forEach((line, index) => {
    lines.push(`Line ${index + 1}: ${line.text} (confidence: ${line.confidence.toFixed(2)}, seen ${line.occurrenceCount}x)`);
  });

  outcome.alternatives?.forEach((alternative, index) => {
    lines.push(`Alternative ${index + 1}: ${alternative.text} (confidence: ${alternative.confidence.toFixed(3)})`);
  });

  return lines.join('\n');
}

/**
 * Run the CLI and return the process exit code
 */
export async function run(argv: string[], dependencies: Partial<FuseCliDependencies> = {}): Promise<number> {
  const deps: FuseCliDependencies = { ...defaultDependencies, ...dependencies };
  const options = parseArgs(argv);

  if (options.help) {
    printHelp(deps.print);
    return 0;
  }

  if (!options.file) {
    printHelp(deps.print);
    deps.printError('Missing input file');
    return 1;
  }

  let results: PerImageResult[];
  try {
    results = parseResultsFile(await deps.readInput(options.file));
  } catch (error) {
    deps.printError(`Cannot read ${options.file}: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const config = ConfigLoader.withOverrides(await deps.loadConfig(options.configPath), {
    multiAngle: options.overrides,
  });
  const validation = validateRecognitionConfig(config);
  if (!validation.valid) {
    deps.printError(`Invalid configuration: ${validation.errors.join('; ')}`);
    return 1;
  }

  const outcome = fuse(results, config.multiAngle);

  if (options.outputPath) {
    try {
      await deps.writeOutput(options.outputPath, `${JSON.stringify(outcome, null, 2)}\n`);
    } catch (error) {
      deps.printError(`Cannot write ${options.outputPath}: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  }

  if (!outcome.success) {
    deps.printError(formatOutcome(outcome));
    return 1;
  }

  deps.print(options.outputPath ? `Results saved to ${options.outputPath}` : formatOutcome(outcome));
  return 0;
}

/**
 * Whether the script path names this module. npm installs bin entries as
 * symlinks, so the path is resolved before comparing.
 */
export function isMainModule(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return moduleUrl === pathToFileURL(realpathSync(scriptPath)).href;
}

// Run the main function if this script is executed directly
if (isMainModule(process.argv[1], import.meta.url)) {
  run(process.argv.slice(2))
    .then((exitCode) => process.exit(exitCode))
    .catch((error) => {
      console.error('Fatal error:');
      console.error(error);
      process.exit(1);
    });
}
