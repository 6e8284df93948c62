// src/core/lib/injection.ts

import type { ILogger, IPixelBuffer, StegoResult } from '../../@types/index.ts';
import { StegoErrorKind } from '../../@types/index.ts';
import { fail, succeed } from '../errors/StegoError.ts';
import { checkCapacity, HEADER_BITS, MAX_PAYLOAD_LENGTH } from './capacity.ts';
import { SlotCursor } from './traversal.ts';

/**
 * Hides a payload in the carrier's channel LSBs: a 32-bit length header followed by the payload bytes,
 * every value written least-significant bit first in traversal order.
 *
 * Capacity is validated before the first write, so a failed call leaves the carrier untouched.
 *
 * @param {IPixelBuffer} pixels - Carrier, mutated in place.
 * @param {Uint8Array} payload - Bytes to hide.
 * @param {ILogger} [logger] - Optional logger for debug output.
 * @return {StegoResult<IPixelBuffer>} The mutated carrier, or an `InsufficientCapacity` failure.
 */
export function injectPayload(pixels: IPixelBuffer, payload: Uint8Array, logger?: ILogger): StegoResult<IPixelBuffer> {
    const capacity = checkCapacity(pixels.width, pixels.height, payload.length);

    if (payload.length > MAX_PAYLOAD_LENGTH) {
        return fail(
            StegoErrorKind.InsufficientCapacity,
            `Payload of ${payload.length} bytes does not fit the ${HEADER_BITS}-bit length header.`,
        );
    }
    if (!capacity.isSufficient) {
        return fail(
            StegoErrorKind.InsufficientCapacity,
            `Carrier image is too small to hold the secret data (${capacity.requiredBits} bits required, ${capacity.capacityBits} available).`,
        );
    }

    const cursor = new SlotCursor(pixels);
    cursor.writeBits(payload.length, HEADER_BITS);
    logger?.debug(`Length header (${payload.length} bytes) written to slots 0-${cursor.position - 1}.`);

    for (const byte of payload) {
        cursor.writeBits(byte, 8);
    }
    logger?.debug(
        `Injected ${payload.length} bytes, ${cursor.position} of ${capacity.capacityBits} slots used.`,
    );

    return succeed(pixels);
}
