// src/core/encoder/lib/capacityChecker.ts

import type { ICarrierCapacity, ILogger, ImageProcessor, StegoResult } from '../../../@types/index.ts';
import { StegoErrorKind } from '../../../@types/index.ts';
import { describeError, fail, succeed } from '../../errors/StegoError.ts';
import { loadImageData } from '../../imageProcessing/processor.ts';
import { capacityBits, maxPayloadBytes } from '../../lib/capacity.ts';

/**
 * Loads a carrier image and reports how much data it can hide.
 *
 * @param {string} carrierFile - Path of the image to analyze.
 * @param {ILogger} logger - Logger instance for logging information.
 * @param {ImageProcessor} [imageProcessor] - Processor used to decode the image.
 * @return {Promise<StegoResult<ICarrierCapacity>>} Dimensions and capacity, or `CarrierLoadFailed`.
 */
export async function checkCarrierCapacity(
    carrierFile: string,
    logger: ILogger,
    imageProcessor?: ImageProcessor,
): Promise<StegoResult<ICarrierCapacity>> {
    logger.debug(`Analyzing capacity of "${carrierFile}"...`);
    let width: number;
    let height: number;
    try {
        ({ width, height } = (await loadImageData(carrierFile, imageProcessor)).info);
    } catch (error) {
        return fail(
            StegoErrorKind.CarrierLoadFailed,
            `Could not load carrier image "${carrierFile}": ${describeError(error)}`,
        );
    }

    const capacity = capacityBits(width, height);
    const maxBytes = maxPayloadBytes(capacity);
    logger.debug(`Capacity of "${carrierFile}": ${capacity} bits, ${maxBytes} bytes of payload.`);
    return succeed({ width, height, capacityBits: capacity, maxPayloadBytes: maxBytes });
}
