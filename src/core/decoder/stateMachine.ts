// src/core/decoder/stateMachine.ts

import type { IDecodeOptions, IDecodeSummary } from '../../@types/index.ts';
import { StegoErrorKind } from '../../@types/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { DecoderStates } from '../../stateMachine/definedStates.ts';
import { writeBufferToFile } from '../../utils/storage/storageUtils.ts';
import { describeError, StegoError } from '../errors/StegoError.ts';
import { loadImageData } from '../imageProcessing/processor.ts';
import { extractPayload } from '../lib/extraction.ts';
import { RawPixelBuffer } from '../lib/pixelBuffer.ts';

export class DecodeStateMachine extends AbstractStateMachine<DecoderStates, IDecodeOptions> {
    private stegoImage: RawPixelBuffer | null = null;
    private payload: Uint8Array | null = null;
    private summary: IDecodeSummary | null = null;

    constructor(options: IDecodeOptions) {
        super(DecoderStates.INIT, options);
        this.stateTransitions = [
            { state: DecoderStates.INIT, handler: this.init },
            { state: DecoderStates.LOAD_STEGO_IMAGE, handler: this.loadStegoImage },
            { state: DecoderStates.EXTRACT_PAYLOAD, handler: this.extractHiddenData },
            { state: DecoderStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    get result(): IDecodeSummary | null {
        return this.summary;
    }

    protected getCompletionState(): DecoderStates {
        return DecoderStates.COMPLETED;
    }

    protected getErrorState(): DecoderStates {
        return DecoderStates.ERROR;
    }

    private init(): void {
        const { logger, verbose } = this.options;
        if (verbose) logger.info('Initializing decoding process...');
    }

    private async loadStegoImage(): Promise<void> {
        const { inputFile, imageProcessor, logger } = this.options;
        logger.debug(`Loading steganographic image: ${inputFile}`);
        try {
            this.stegoImage = RawPixelBuffer.fromImageData(await loadImageData(inputFile, imageProcessor));
        } catch (error) {
            throw new StegoError(
                StegoErrorKind.CarrierLoadFailed,
                `Could not load the steganographic image "${inputFile}": ${describeError(error)}`,
                { cause: error },
            );
        }
    }

    /**
     * Reads the hidden payload. A zero-length header is a valid carrier with nothing embedded:
     * it is reported, and the output step writes nothing.
     */
    private extractHiddenData(): void {
        const { logger } = this.options;
        if (!this.stegoImage) {
            throw new Error(`No steganographic image loaded in state "${this.state}".`);
        }
        const result = extractPayload(this.stegoImage, logger);
        if (!result.ok) {
            throw new StegoError(result.error.kind, result.error.message);
        }
        if (result.status === 'empty') {
            logger.warn('Decoded size is 0. Nothing to extract.');
            this.summary = { outputFile: null, payloadBytes: 0 };
            return;
        }
        this.payload = result.value;
        logger.info(`Extracted ${result.value.length} bytes of hidden data.`);
    }

    private writeOutput(): void {
        const { outputFile, logger } = this.options;
        if (!this.payload) {
            logger.debug('No payload to write.');
            return;
        }
        try {
            writeBufferToFile(outputFile, this.payload);
        } catch (error) {
            throw new StegoError(
                StegoErrorKind.OutputWriteFailed,
                `Could not create output file for decoded data "${outputFile}": ${describeError(error)}`,
                { cause: error },
            );
        }
        this.summary = { outputFile, payloadBytes: this.payload.length };
        logger.success(`Success! Decoded data saved to ${outputFile}`);
    }
}
