// src/core/encoder/index.ts

import type { IEncodeOptions, IEncodeSummary, ILogger, IPixelBuffer, StegoResult } from '../../@types/index.ts';
import { StegoError, succeed } from '../errors/StegoError.ts';
import { injectPayload } from '../lib/injection.ts';
import { EncodeStateMachine } from './stateMachine.ts';

/**
 * Hides `payload` in the carrier's channel LSBs. See `injectPayload`.
 */
export function encode(pixels: IPixelBuffer, payload: Uint8Array, logger?: ILogger): StegoResult<IPixelBuffer> {
    return injectPayload(pixels, payload, logger);
}

/**
 * Encodes a secret file into a carrier image using a state machine based on provided options.
 *
 * @param {IEncodeOptions} options - The options to configure the encoding process.
 * @return {Promise<StegoResult<IEncodeSummary>>} The summary of the written image, or the failure that stopped it.
 */
export async function encodeFile(options: IEncodeOptions): Promise<StegoResult<IEncodeSummary>> {
    const stateMachine = new EncodeStateMachine(options);
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
        throw new Error('Encoding finished without producing a summary.');
    }
    return succeed(summary);
}
