// src/cli/index.ts

import { Command } from 'commander';
import path from 'node:path';
import process from 'node:process';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import type { ILogger, IProgressBar, StegoResult } from '../@types/index.ts';
import { config } from '../config/index.ts';
import { decodeFile } from '../core/decoder/index.ts';
import { encodeFile } from '../core/encoder/index.ts';
import { checkCarrierCapacity } from '../core/encoder/lib/capacityChecker.ts';
import { DecoderStates, EncoderStates } from '../stateMachine/definedStates.ts';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';
import { filePathExists } from '../utils/storage/storageUtils.ts';

interface ILoggingFlags {
    log?: boolean;
    verbose?: boolean;
}

/**
 * Creates a progress bar sized for the given number of state transitions.
 */
function createProgressBar(steps: number): IProgressBar {
    const progressBar = new cliProgress.SingleBar({
        format: 'Processing |{bar}| {percentage}% || {value}/{total} state: {state}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
    }, cliProgress.Presets.shades_grey);
    progressBar.start(steps, 0);
    return progressBar;
}

/**
 * Number of progress increments a state machine emits: one per state except the error state.
 */
function stepCount(states: object): number {
    return Object.keys(states).length - 1;
}

function createLogger(name: string, flags: ILoggingFlags): ILogger {
    return getLogger(name, flags.log ? console : NoopLogFacility, flags.verbose ?? false);
}

/**
 * Asks before an existing file is replaced, unless `force` is set.
 */
async function confirmOverwrite(filePath: string, force: boolean | undefined): Promise<boolean> {
    if (force || !filePathExists(filePath)) {
        return true;
    }
    const answers = await inquirer.prompt<{ overwrite: boolean }>([
        {
            type: 'confirm',
            name: 'overwrite',
            message: `"${filePath}" already exists. Overwrite it?`,
            default: false,
        },
    ]);
    return answers.overwrite;
}

/**
 * Prints the outcome of an operation and sets the process exit code accordingly.
 */
function reportOutcome<T>(result: StegoResult<T>, describe: (value: T) => string): void {
    if (result.ok) {
        const message = describe(result.value);
        console.log(result.status === 'empty' ? chalk.yellow(message) : chalk.green(message));
        process.exitCode = 0;
    } else {
        console.error(chalk.red(`Error (${result.error.kind}): ${result.error.message}`));
        process.exitCode = 1;
    }
}

export function createProgram(): Command {
    const program = new Command();
    program
        .name('lsb-veil')
        .description('Hide a file in the least-significant bits of an image, and recover it')
        .version('1.0.0');

    program
        .command('encode')
        .description('Encode a secret file into a carrier image')
        .requiredOption('-c, --carrier <image>', 'Carrier image (PNG, BMP or any format sharp can read)')
        .requiredOption('-s, --secret <file>', 'Secret file to hide')
        .option('-o, --output <image>', 'Output PNG image', config.defaultEncodeOutput)
        .option('-f, --force', 'Overwrite the output image without asking')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .option('--no-verify', 'Skip verification step during encoding')
        .showHelpAfterError()
        .action(async (options) => {
            const outputFile = path.resolve(options.output);
            if (!(await confirmOverwrite(outputFile, options.force))) {
                console.error('Aborted: output image was not overwritten.');
                process.exitCode = 1;
                return;
            }

            const logger = createLogger('encoder', options);
            const progressBar = options.log ? undefined : createProgressBar(stepCount(EncoderStates));
            const result = await encodeFile({
                carrierFile: path.resolve(options.carrier),
                secretFile: path.resolve(options.secret),
                outputFile,
                verbose: options.verbose ?? false,
                verify: options.verify !== false,
                logger,
                progressBar,
            });
            progressBar?.stop();
            reportOutcome(
                result,
                (summary) =>
                    `Success! Data encoded and saved to ${summary.outputFile} (${summary.usedBits} of ${summary.capacityBits} bits used).`,
            );
        });

    program
        .command('decode')
        .description('Decode the hidden file from a steganographic image')
        .requiredOption('-i, --input <image>', 'Steganographic image')
        .option('-o, --output <file>', 'Output file for the decoded data', config.defaultDecodeOutput)
        .option('-f, --force', 'Overwrite the output file without asking')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError()
        .action(async (options) => {
            const outputFile = path.resolve(options.output);
            if (!(await confirmOverwrite(outputFile, options.force))) {
                console.error('Aborted: output file was not overwritten.');
                process.exitCode = 1;
                return;
            }

            const logger = createLogger('decoder', options);
            const progressBar = options.log ? undefined : createProgressBar(stepCount(DecoderStates));
            const result = await decodeFile({
                inputFile: path.resolve(options.input),
                outputFile,
                verbose: options.verbose ?? false,
                logger,
                progressBar,
            });
            progressBar?.stop();
            reportOutcome(
                result,
                (summary) =>
                    summary.outputFile === null
                        ? 'Warning: Decoded size is 0. Nothing to extract.'
                        : `Success! Decoded data saved to ${summary.outputFile} (${summary.payloadBytes} bytes).`,
            );
        });

    program
        .command('capacity')
        .description('Report how much data a carrier image can hide')
        .requiredOption('-c, --carrier <image>', 'Carrier image')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError()
        .action(async (options) => {
            const logger = createLogger('capacity', { log: options.verbose, verbose: options.verbose });
            const result = await checkCarrierCapacity(path.resolve(options.carrier), logger);
            reportOutcome(
                result,
                (capacity) =>
                    `${capacity.width}x${capacity.height} image: ${capacity.capacityBits} bits, up to ${capacity.maxPayloadBytes} bytes of payload.`,
            );
        });

    return program;
}
