// src/core/lib/extraction.ts

import type { ILogger, IPixelBuffer, StegoResult } from '../../@types/index.ts';
import { StegoErrorKind } from '../../@types/index.ts';
import { fail, succeed } from '../errors/StegoError.ts';
import { HEADER_BITS, capacityBits, requiredBits } from './capacity.ts';
import { SlotCursor } from './traversal.ts';

/**
 * Recovers a payload hidden by `injectPayload`. The carrier is only read.
 *
 * The length check is a plausibility test: any image whose header announces a payload that fits
 * is treated as a carrier.
 *
 * @param {IPixelBuffer} pixels - Carrier to read.
 * @param {ILogger} [logger] - Optional logger for debug output.
 * @return {StegoResult<Uint8Array>} The payload; status `empty` when the header announces zero bytes,
 * or an `InvalidLength` failure when the announced length cannot fit the carrier.
 */
export function extractPayload(pixels: IPixelBuffer, logger?: ILogger): StegoResult<Uint8Array> {
    const capacity = capacityBits(pixels.width, pixels.height);
    if (capacity < HEADER_BITS) {
        return fail(
            StegoErrorKind.InvalidLength,
            `Image has ${capacity} slots, fewer than the ${HEADER_BITS}-bit length header.`,
        );
    }

    const cursor = new SlotCursor(pixels);
    const length = cursor.readBits(HEADER_BITS);
    logger?.debug(`Length header announces ${length} bytes.`);

    if (requiredBits(length) > capacity) {
        return fail(
            StegoErrorKind.InvalidLength,
            `Decoded size is invalid or larger than image capacity (${length} bytes announced, ${capacity} slots available).`,
        );
    }
    if (length === 0) {
        return succeed(new Uint8Array(0), 'empty');
    }

    const payload = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        payload[i] = cursor.readBits(8);
    }
    logger?.debug(`Extracted ${length} bytes from slots ${HEADER_BITS}-${cursor.position - 1}.`);

    return succeed(payload);
}
