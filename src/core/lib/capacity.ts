// src/core/lib/capacity.ts

import { CHANNELS_PER_PIXEL } from './traversal.ts';

/** Width of the length prefix, written LSB-first ahead of the payload. */
export const HEADER_BITS = 32;

export const MAX_PAYLOAD_LENGTH = 0xffffffff;

export interface CapacityCheckResult {
    isSufficient: boolean;
    capacityBits: number;
    requiredBits: number;
}

/**
 * Total number of slots in a carrier. Exact for any image whose slot count stays below 2^53.
 */
export function capacityBits(width: number, height: number): number {
    return width * height * CHANNELS_PER_PIXEL;
}

/**
 * Number of slots needed for the length header plus `payloadLength` bytes.
 */
export function requiredBits(payloadLength: number): number {
    return HEADER_BITS + payloadLength * 8;
}

/**
 * Largest payload, in bytes, a carrier of the given capacity can hold.
 */
export function maxPayloadBytes(capacity: number): number {
    if (capacity < HEADER_BITS) {
        return 0;
    }
    return Math.min(Math.floor((capacity - HEADER_BITS) / 8), MAX_PAYLOAD_LENGTH);
}

export function checkCapacity(width: number, height: number, payloadLength: number): CapacityCheckResult {
    const capacity = capacityBits(width, height);
    const required = requiredBits(payloadLength);
    return {
        isSufficient: payloadLength <= MAX_PAYLOAD_LENGTH && required <= capacity,
        capacityBits: capacity,
        requiredBits: required,
    };
}
