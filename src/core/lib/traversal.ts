// src/core/lib/traversal.ts

import type { ChannelSequence, IPixelBuffer, ISlotPosition } from '../../@types/index.ts';
import { bitAt, embedBit, extractBit } from '../../utils/bitManipulation/bitUtils.ts';

export const CHANNEL_SEQUENCE: readonly ChannelSequence[] = ['R', 'G', 'B'];

/** Channels per pixel that carry data; alpha never does. */
export const CHANNELS_PER_PIXEL = 3;

/**
 * Maps a linear slot index onto the carrier: pixels are scanned row by row and each pixel
 * yields its red, green and blue channel before the scan moves on.
 *
 * @param {number} slotIndex - Zero-based slot index.
 * @param {number} width - Carrier width in pixels.
 * @return {ISlotPosition} Pixel coordinates and channel for the slot.
 */
export function getSlotPosition(slotIndex: number, width: number): ISlotPosition {
    const pixelIndex = Math.floor(slotIndex / CHANNELS_PER_PIXEL);
    return {
        x: pixelIndex % width,
        y: Math.floor(pixelIndex / width),
        channel: CHANNEL_SEQUENCE[slotIndex % CHANNELS_PER_PIXEL],
    };
}

/**
 * Helper function to get the channel offset based on the channel name.
 * @param channel - The channel name ('R', 'G', 'B').
 * @returns The channel offset index.
 */
export function getChannelOffset(channel: ChannelSequence): number {
    switch (channel) {
        case 'R':
            return 0;
        case 'G':
            return 1;
        case 'B':
            return 2;
    }
}

/**
 * Walks the slots of a carrier in traversal order, reading or writing one LSB per slot.
 */
export class SlotCursor {
    private slotIndex = 0;
    readonly totalSlots: number;

    constructor(private readonly pixels: IPixelBuffer) {
        this.totalSlots = pixels.width * pixels.height * CHANNELS_PER_PIXEL;
    }

    get position(): number {
        return this.slotIndex;
    }

    writeBit(bit: 0 | 1): void {
        const { x, y, channel } = this.next();
        this.pixels.setChannel(x, y, channel, embedBit(this.pixels.getChannel(x, y, channel), bit));
    }

    readBit(): 0 | 1 {
        const { x, y, channel } = this.next();
        return extractBit(this.pixels.getChannel(x, y, channel));
    }

    /**
     * Writes the low `bitCount` bits of an unsigned value, least-significant bit first.
     */
    writeBits(value: number, bitCount: number): void {
        for (let b = 0; b < bitCount; b++) {
            this.writeBit(bitAt(value, b));
        }
    }

    /**
     * Reads `bitCount` bits, least-significant bit first, into an unsigned value.
     */
    readBits(bitCount: number): number {
        let value = 0;
        for (let b = 0; b < bitCount; b++) {
            value += this.readBit() * 2 ** b;
        }
        return value;
    }

    private next(): ISlotPosition {
        if (this.slotIndex >= this.totalSlots) {
            throw new RangeError(`Slot cursor exhausted the carrier after ${this.totalSlots} slots.`);
        }
        const position = getSlotPosition(this.slotIndex, this.pixels.width);
        this.slotIndex++;
        return position;
    }
}
