// src/core/decoder/index.ts

import type { IDecodeOptions, IDecodeSummary, ILogger, IPixelBuffer, StegoResult } from '../../@types/index.ts';
import { StegoError, succeed } from '../errors/StegoError.ts';
import { extractPayload } from '../lib/extraction.ts';
import { DecodeStateMachine } from './stateMachine.ts';

/**
 * Recovers a payload hidden in the carrier's channel LSBs. See `extractPayload`.
 */
export function decode(pixels: IPixelBuffer, logger?: ILogger): StegoResult<Uint8Array> {
    return extractPayload(pixels, logger);
}

/**
 * Decodes the hidden file from a steganographic image based on the specified options.
 *
 * @param {IDecodeOptions} options - The decoding options to configure the state machine.
 * @return {Promise<StegoResult<IDecodeSummary>>} The written output, status `empty` when the image carries
 * no payload, or the failure that stopped the run.
 */
export async function decodeFile(options: IDecodeOptions): Promise<StegoResult<IDecodeSummary>> {
    const stateMachine = new DecodeStateMachine(options);
    try {
        await stateMachine.run();
    } catch (error) {
        if (error instanceof StegoError) {
            return { ok: false, error: error.toFailure() };
        }
        throw error;
    }
    const summary = stateMachine.result;
    if (!summary) {
        throw new Error('Decoding finished without producing a summary.');
    }
    return succeed(summary, summary.outputFile === null ? 'empty' : 'success');
}
