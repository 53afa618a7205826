/**
 * Analyze command implementation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';

import { parseCliOptions, VERSION } from '../cli.js';
import type { CliOptions, MovegradeConfig } from '../config/schema.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { InputError, OutputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { orchestrateAnalysis } from '../orchestrator/orchestrator.js';
import { performHealthChecks, initializeServices, closeServices } from '../orchestrator/services.js';
import { renderJson, renderText } from '../output/render.js';
import { formatConfigDisplay, formatFileSize } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Read PGN input from file or stdin
 */
async function readInput(inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    if (!fs.existsSync(inputPath)) {
      throw new InputError(`Input file not found: ${inputPath}`, 'Check the file path and try again');
    }
    return fs.readFileSync(inputPath, 'utf-8');
  }

  if (process.stdin.isTTY) {
    throw new InputError('No input provided', 'Provide a PGN file with --input or pipe PGN data to stdin');
  }

  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    const rl = readline.createInterface({
      input: process.stdin,
      crlfDelay: Infinity,
    });

    rl.on('line', (line) => {
      chunks.push(line);
    });

    rl.on('close', () => {
      resolve(chunks.join('\n'));
    });

    process.stdin.on('error', (err) => {
      reject(new InputError(`Failed to read from stdin: ${err.message}`));
    });
  });
}

/**
 * Write output to file or stdout
 */
function writeOutput(output: string, outputPath: string | undefined): void {
  if (outputPath) {
    try {
      fs.writeFileSync(outputPath, output, 'utf-8');
    } catch (error) {
      throw new OutputError(
        `Failed to write output file: ${outputPath}`,
        error instanceof Error ? error.message : 'unknown error',
      );
    }
  } else {
    process.stdout.write(output);
  }
}

/**
 * Validate setup without running analysis
 */
async function dryRun(options: CliOptions, config: MovegradeConfig, reporter: ProgressReporter): Promise<void> {
  const healthStatus = await performHealthChecks(config);
  reporter.reportServiceStatus(healthStatus);

  const unhealthy = healthStatus.filter((s) => !s.healthy);
  if (unhealthy.length === 0) {
    reporter.printSuccess('Engine and book ready. Ready to analyze.');
  } else {
    reporter.warnSafe('Some services unavailable:');
    for (const service of unhealthy) {
      reporter.printMessage(`  - ${service.name}: ${service.error ?? 'unavailable'}`);
    }
  }

  if (options.input) {
    const inputPath = resolveAbsolutePath(options.input);
    if (fs.existsSync(inputPath)) {
      reporter.printSuccess(`Input file exists: ${inputPath}`);
    } else {
      reporter.printError(`Input file not found: ${inputPath}`);
    }
  }

  if (options.output) {
    const outputDir = path.dirname(resolveAbsolutePath(options.output));
    if (fs.existsSync(outputDir)) {
      reporter.printSuccess(`Output directory exists: ${outputDir}`);
    } else {
      reporter.warnSafe(`Output directory does not exist: ${outputDir}`);
    }
  }

  reporter.printMessage('');
  reporter.printMessage('Dry-run complete. No analysis was performed.');
}

/**
 * Main analyze command handler
 */
export async function analyzeCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  // Ctrl-C stops in-flight engine searches; the run then exits with status 130
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    reporter.printHeader(VERSION);

    if (options.dryRun) {
      await dryRun(options, config, reporter);
      return;
    }

    reporter.startPhase('initializing');
    const services = await initializeServices(config, {
      onEngineError: (error, fen) => reporter.warnSafe(`Evaluation failed for ${fen}: ${error.message}`),
      onWarning: (message) => reporter.warnSafe(message),
    });
    reporter.completePhase('initializing');

    try {
      const pgnInput = await readInput(options.input);

      reporter.startAnalysis();
      const { results, stats } = await orchestrateAnalysis(pgnInput, config, services, reporter, controller.signal);

      reporter.startPhase('rendering');
      const renderOptions = {
        reviewOnly: config.output.reviewOnly,
        color: !options.noColor && !options.output && Boolean(process.stdout.isTTY),
      };
      const output =
        config.output.format === 'text' ? renderText(results, renderOptions) : renderJson(results, renderOptions);
      writeOutput(output, options.output);
      reporter.completePhase('rendering', formatFileSize(Buffer.byteLength(output)));

      reporter.printSummary(stats);
      if (options.output) {
        reporter.printOutputLocation(options.output);
      }
    } finally {
      closeServices(services);
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
