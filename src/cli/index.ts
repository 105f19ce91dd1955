#!/usr/bin/env node
/**
 * speechgate CLI - Speech recognition from the command line
 *
 * Usage:
 *   speechgate transcribe <wav-file> [options]
 *   speechgate listen [options] < audio.pcm
 *   speechgate doctor [options]
 *
 * Recognized text is written to stdout, one line per frame. Progress,
 * warnings and errors go to stderr so the output can be piped.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { Command, InvalidArgumentError } from 'commander';

import {
  SettingsError,
  SettingsManager,
  resolveSettingsPath,
  type SettingsInput,
} from '../main/settings';
import { BACKEND_IDS, CREDENTIAL_TIERS, isBackendId, isCredentialTier } from '../shared/types';
import {
  CLIError,
  DictationPipeline,
  EXIT_SIGINT,
  EXIT_SUCCESS,
  EXIT_SYSTEM_ERROR,
  EXIT_USER_ERROR,
  type DictationResult,
} from './DictationPipeline';
import { runDoctorChecks } from './doctor';

const VERSION = readVersion();

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  warn: '⚠',     // warning sign
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  line: '─',     // horizontal line
} as const;

function banner(): void {
  console.error();
  console.error(`  speechgate v${VERSION} ${SYMBOLS.bullet} CLI Mode`);
  console.error(`  ${SYMBOLS.line.repeat(40)}`);
  console.error();
}

function step(message: string): void {
  console.error(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.error(`  ${SYMBOLS.check} ${message}`);
}

function warn(message: string): void {
  console.error(`  ${SYMBOLS.warn} ${message}`);
}

function fail(message: string): void {
  console.error(`  ${SYMBOLS.cross} ${message}`);
}

function emitText(text: string): void {
  process.stdout.write(`${text}\n`);
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    console.error(`  could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0-dev';
}

// ============================================================================
// Option parsing
// ============================================================================

interface CommonOptions {
  backend?: string;
  tier?: string;
  language?: string;
  settings?: string;
  verbose: boolean;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('--backend <id>', `Recognition backend (${BACKEND_IDS.join(', ')})`)
    .option('--tier <tier>', `Credential tier (${CREDENTIAL_TIERS.join(', ')})`)
    .option('--language <code>', 'Language code, e.g. en-US or ru-RU')
    .option('--settings <file>', 'Settings file (default: $SPEECHGATE_SETTINGS or ~/.speechgate/settings.json)')
    .option('--verbose', 'Verbose output', false);
}

/**
 * Load settings and apply command-line overrides on top.
 */
async function loadSettings(options: CommonOptions): Promise<{ settings: SettingsManager; path: string }> {
  const path = options.settings ? resolve(options.settings) : resolveSettingsPath();
  if (options.settings && !existsSync(path)) {
    throw new CLIError(`Settings file not found: ${path}`, 'user');
  }

  const overrides: SettingsInput = {};
  if (options.backend !== undefined) {
    if (!isBackendId(options.backend)) {
      throw new CLIError(`Unknown backend "${options.backend}". Available: ${BACKEND_IDS.join(', ')}`, 'user');
    }
    overrides.backend = options.backend;
  }
  if (options.tier !== undefined) {
    if (!isCredentialTier(options.tier)) {
      throw new CLIError(`Unknown tier "${options.tier}". Available: ${CREDENTIAL_TIERS.join(', ')}`, 'user');
    }
    overrides.tier = options.tier;
  }
  if (options.language !== undefined) {
    overrides.language = options.language;
  }

  try {
    const loaded = await SettingsManager.load(path);
    return { settings: loaded.withOverrides(overrides), path };
  } catch (error) {
    if (error instanceof SettingsError) {
      throw new CLIError(error.message, 'user');
    }
    throw error;
  }
}

function exitWithError(error: unknown, verbose: boolean): never {
  console.error();
  const message = error instanceof Error ? error.message : String(error);
  fail(message);

  if (verbose && error instanceof Error && error.stack) {
    console.error();
    console.error(error.stack);
  }

  const exitCode = error instanceof CLIError && error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
  process.exit(exitCode);
}

function printSummary(result: DictationResult): void {
  console.error();
  success('Recognition finished');
  console.error();
  console.error(`  Frames:          ${result.framesProcessed}`);
  console.error(`  Recognized:      ${result.recognized}${result.viaFallback > 0 ? ` (${result.viaFallback} offline fallback)` : ''}`);
  console.error(`  No speech:       ${result.noSpeech}`);
  console.error(`  Failed:          ${result.failed}`);
  console.error(`  Processing time: ${result.durationSeconds.toFixed(1)}s`);
  console.error();
}

// ============================================================================
// Signal handling
// ============================================================================

let activePipeline: DictationPipeline | null = null;

function setupSignalHandlers(): void {
  const handler = async () => {
    console.error('\n  Interrupted, finishing the current frame...');
    if (activePipeline) {
      await activePipeline.abort();
    }
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('speechgate')
  .description('Transcribe speech with a local model or cloud speech services')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// transcribe command
// ============================================================================

withCommonOptions(
  program
    .command('transcribe')
    .description('Transcribe a WAV file frame by frame')
    .argument('<wav-file>', 'Path to a PCM16 or float32 WAV file')
    .option('--frame-seconds <seconds>', 'Length of each recognition frame', parsePositiveNumber, 5)
).action(async (wavFile: string, options: CommonOptions & { frameSeconds: number }) => {
  banner();

  try {
    const { settings } = await loadSettings(options);
    const selection = settings.getAll();
    const audioPath = resolve(wavFile);

    step(`Audio:    ${audioPath}`);
    step(`Backend:  ${selection.backend} (${selection.tier}, ${selection.language})`);
    console.error();

    const pipeline = new DictationPipeline(
      { settings, frameSeconds: options.frameSeconds },
      emitText,
      options.verbose ? step : warn
    );
    activePipeline = pipeline;

    const result = await pipeline.transcribeFile(audioPath);
    printSummary(result);

    if (result.framesProcessed > 0 && result.failed === result.framesProcessed) {
      fail('Every frame failed to transcribe.');
      process.exit(EXIT_USER_ERROR);
    }
  } catch (error) {
    exitWithError(error, options.verbose);
  } finally {
    activePipeline = null;
  }
});

// ============================================================================
// listen command
// ============================================================================

withCommonOptions(
  program
    .command('listen')
    .description('Transcribe raw 16-bit little-endian PCM read from stdin until EOF')
    .option('--rate <hz>', 'Sample rate of the input', parsePositiveInt, 16000)
    .option('--channels <count>', 'Channel count of the input', parsePositiveInt, 1)
    .option('--frame-seconds <seconds>', 'Length of each recognition frame', parsePositiveNumber, 5)
).action(async (options: CommonOptions & { rate: number; channels: number; frameSeconds: number }) => {
  banner();

  if (process.stdin.isTTY) {
    fail('listen reads PCM audio from stdin; pipe audio into it');
    step('Example: arecord -f S16_LE -r 16000 -c 1 -t raw | speechgate listen');
    process.exit(EXIT_USER_ERROR);
  }

  try {
    const { settings } = await loadSettings(options);
    const selection = settings.getAll();

    step(`Input:    stdin (${options.rate} Hz, ${options.channels} channel(s))`);
    step(`Backend:  ${selection.backend} (${selection.tier}, ${selection.language})`);
    step('Press Ctrl+C to stop');
    console.error();

    const pipeline = new DictationPipeline(
      { settings, frameSeconds: options.frameSeconds },
      emitText,
      options.verbose ? step : warn
    );
    activePipeline = pipeline;

    const result = await pipeline.listen(process.stdin, { sampleRate: options.rate, channels: options.channels });
    printSummary(result);
  } catch (error) {
    exitWithError(error, options.verbose);
  } finally {
    activePipeline = null;
  }
});

// ============================================================================
// doctor command
// ============================================================================

withCommonOptions(
  program.command('doctor').description('Check that recognition can start with the current settings')
).action(async (options: CommonOptions) => {
  banner();

  try {
    const { settings, path } = await loadSettings(options);
    const result = await runDoctorChecks({ settings, settingsPath: path });

    for (const check of result.checks) {
      const line = `${check.name}: ${check.message}`;
      if (check.status === 'pass') success(line);
      else if (check.status === 'warn') warn(line);
      else fail(line);
      if (check.hint && check.status !== 'pass') {
        for (const hintLine of check.hint.split('\n')) {
          console.error(`      ${hintLine}`);
        }
      }
    }

    console.error();
    console.error(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
    console.error();
    process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  } catch (error) {
    exitWithError(error, options.verbose);
  }
});

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

program.parseAsync().catch((error: unknown) => exitWithError(error, false));
