// src/utils/bitManipulation/bitUtils.ts

/**
 * Extracts a specific number of bits from a given byte, starting from a specified bit position.
 *
 * @param {number} byte - The byte from which bits are to be extracted.
 * @param {number} startBit - The starting bit position for extraction.
 * @param {number} bitCount - The number of bits to be extracted.
 * @return {number} - The extracted bits as a number.
 */
export function extractBits(byte: number, startBit: number, bitCount: number): number {
    const mask = (1 << bitCount) - 1;
    return (byte >> startBit) & mask;
}

/**
 * Inserts a specified number of bits into a given byte at a specified starting position.
 *
 * @param {number} byte - The original byte where bits will be inserted.
 * @param {number} bits - The bits to insert into the original byte.
 * @param {number} startBit - The starting position (0-indexed) within the byte to insert the bits.
 * @param {number} bitCount - The number of bits to insert.
 * @return {number} - The byte resulting from inserting the specified bits at the given position.
 */
export function insertBits(byte: number, bits: number, startBit: number, bitCount: number): number {
    const mask = ((1 << bitCount) - 1) << startBit;
    return ((byte & ~mask) | ((bits << startBit) & mask)) & 0xff;
}

/**
 * Sets the least-significant bit of a channel byte, leaving the upper seven bits untouched.
 */
export function embedBit(channelByte: number, bit: 0 | 1): number {
    return insertBits(channelByte, bit, 0, 1);
}

/**
 * Reads the least-significant bit of a channel byte.
 */
export function extractBit(channelByte: number): 0 | 1 {
    return extractBits(channelByte, 0, 1) === 1 ? 1 : 0;
}

/**
 * Returns bit `index` (0 = least significant) of an unsigned 32-bit value.
 */
export function bitAt(value: number, index: number): 0 | 1 {
    return Math.floor(value / 2 ** index) % 2 === 1 ? 1 : 0;
}
