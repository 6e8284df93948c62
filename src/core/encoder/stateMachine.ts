// src/core/encoder/stateMachine.ts

import type { IEncodeOptions, IEncodeSummary } from '../../@types/index.ts';
import { StegoErrorKind } from '../../@types/index.ts';
import { Buffer } from 'node:buffer';
import { config } from '../../config/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { EncoderStates } from '../../stateMachine/definedStates.ts';
import { getFileExtension, readBufferFromFile } from '../../utils/storage/storageUtils.ts';
import { describeError, StegoError } from '../errors/StegoError.ts';
import { loadImageData, writeImageData } from '../imageProcessing/processor.ts';
import { checkCapacity } from '../lib/capacity.ts';
import { extractPayload } from '../lib/extraction.ts';
import { injectPayload } from '../lib/injection.ts';
import { RawPixelBuffer } from '../lib/pixelBuffer.ts';

export class EncodeStateMachine extends AbstractStateMachine<EncoderStates, IEncodeOptions> {
    private secretData: Uint8Array | null = null;
    private carrier: RawPixelBuffer | null = null;
    private summary: IEncodeSummary | null = null;

    constructor(options: IEncodeOptions) {
        super(EncoderStates.INIT, options);
        this.stateTransitions = [
            { state: EncoderStates.INIT, handler: this.init },
            { state: EncoderStates.READ_SECRET, handler: this.readSecret },
            { state: EncoderStates.LOAD_CARRIER, handler: this.loadCarrier },
            { state: EncoderStates.CHECK_CAPACITY, handler: this.checkCapacity },
            { state: EncoderStates.EMBED_PAYLOAD, handler: this.embedPayload },
            { state: EncoderStates.WRITE_OUTPUT, handler: this.writeOutput },
            { state: EncoderStates.VERIFY_ENCODING, handler: this.verifyEncoding },
        ];
    }

    get result(): IEncodeSummary | null {
        return this.summary;
    }

    protected getCompletionState(): EncoderStates {
        return EncoderStates.COMPLETED;
    }

    protected getErrorState(): EncoderStates {
        return EncoderStates.ERROR;
    }

    /**
     * Validates the output target before any file is touched. Only lossless formats keep the LSB plane intact.
     */
    private init(): void {
        const { logger, verbose, outputFile } = this.options;
        if (verbose) logger.info('Initializing encoding process...');
        const extension = getFileExtension(outputFile);
        if (!config.outputExtensions.includes(extension)) {
            throw new StegoError(
                StegoErrorKind.UnsupportedOutputFormat,
                `Output image "${outputFile}" must use one of: ${config.outputExtensions.join(', ')}.`,
            );
        }
    }

    private readSecret(): void {
        const { secretFile, logger } = this.options;
        logger.debug(`Reading secret file: ${secretFile}`);
        let secret: Uint8Array;
        try {
            secret = readBufferFromFile(secretFile);
        } catch (error) {
            throw new StegoError(
                StegoErrorKind.SecretReadFailed,
                `Could not open secret file "${secretFile}": ${describeError(error)}`,
                { cause: error },
            );
        }
        this.secretData = secret;
        logger.debug(`Secret file read (${secret.length} bytes).`);
    }

    private async loadCarrier(): Promise<void> {
        const { carrierFile, imageProcessor, logger } = this.options;
        logger.debug(`Loading carrier image: ${carrierFile}`);
        let carrier: RawPixelBuffer;
        try {
            carrier = RawPixelBuffer.fromImageData(await loadImageData(carrierFile, imageProcessor));
        } catch (error) {
            throw new StegoError(
                StegoErrorKind.CarrierLoadFailed,
                `Could not load carrier image "${carrierFile}": ${describeError(error)}`,
                { cause: error },
            );
        }
        this.carrier = carrier;
        logger.debug(`Carrier loaded (${carrier.width}x${carrier.height}, ${carrier.channels} channels).`);
    }

    /**
     * Rejects the run before anything is written when the carrier cannot hold header and payload.
     */
    private checkCapacity(): void {
        const { logger } = this.options;
        const carrier = this.requireCarrier();
        const secret = this.requireSecret();
        const capacity = checkCapacity(carrier.width, carrier.height, secret.length);
        logger.info(`Capacity check: ${capacity.requiredBits} of ${capacity.capacityBits} bits required.`);
        if (!capacity.isSufficient) {
            throw new StegoError(
                StegoErrorKind.InsufficientCapacity,
                `Carrier image is too small to hold the secret data (${capacity.requiredBits} bits required, ${capacity.capacityBits} available).`,
            );
        }
    }

    private embedPayload(): void {
        const { logger } = this.options;
        const carrier = this.requireCarrier();
        const secret = this.requireSecret();
        logger.info('Embedding secret data...');
        const result = injectPayload(carrier, secret, logger);
        if (!result.ok) {
            throw new StegoError(result.error.kind, result.error.message);
        }
        const capacity = checkCapacity(carrier.width, carrier.height, secret.length);
        this.summary = {
            outputFile: this.options.outputFile,
            payloadBytes: secret.length,
            usedBits: capacity.requiredBits,
            capacityBits: capacity.capacityBits,
        };
    }

    private async writeOutput(): Promise<void> {
        const { outputFile, imageProcessor, logger } = this.options;
        const carrier = this.requireCarrier();
        try {
            await writeImageData(carrier.data, carrier.info, outputFile, imageProcessor);
        } catch (error) {
            throw new StegoError(
                StegoErrorKind.OutputWriteFailed,
                `Failed to save the output image "${outputFile}": ${describeError(error)}`,
                { cause: error },
            );
        }
        logger.success(`Success! Data encoded and saved to ${outputFile}`);
    }

    /**
     * Reloads the written image and checks that the hidden payload reads back unchanged.
     */
    private async verifyEncoding(): Promise<void> {
        const { logger, verify, outputFile, imageProcessor } = this.options;
        if (verify === false) {
            logger.info('Verification step skipped.');
            return;
        }
        logger.info('Starting verification step...');
        const secret = this.requireSecret();
        let written: RawPixelBuffer;
        try {
            written = RawPixelBuffer.fromImageData(await loadImageData(outputFile, imageProcessor));
        } catch (error) {
            throw new StegoError(
                StegoErrorKind.VerificationFailed,
                `Verification failed: could not reload "${outputFile}": ${describeError(error)}`,
                { cause: error },
            );
        }
        const decoded = extractPayload(written);
        if (!decoded.ok || !Buffer.from(decoded.value).equals(Buffer.from(secret))) {
            throw new StegoError(
                StegoErrorKind.VerificationFailed,
                'Verification failed: Decoded data does not match original data.',
            );
        }
        logger.success('Verification successful: Decoded data matches original data.');
    }

    private requireCarrier(): RawPixelBuffer {
        if (!this.carrier) {
            throw new Error(`No carrier image loaded in state "${this.state}".`);
        }
        return this.carrier;
    }

    private requireSecret(): Uint8Array {
        if (!this.secretData) {
            throw new Error(`No secret data read in state "${this.state}".`);
        }
        return this.secretData;
    }
}
