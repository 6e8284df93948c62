// src/core/lib/pixelBuffer.ts

import type {
    ChannelSequence,
    IAssembledImageData,
    IPixelBuffer,
    OutputInfo,
    PixelChannelCount,
} from '../../@types/index.ts';
import { getChannelOffset } from './traversal.ts';

/**
 * Pixel buffer backed by interleaved raw image bytes (RGB or RGBA). The alpha byte of an RGBA
 * pixel is never addressed.
 */
export class RawPixelBuffer implements IPixelBuffer {
    constructor(
        readonly data: Uint8Array,
        readonly width: number,
        readonly height: number,
        readonly channels: PixelChannelCount = 3,
    ) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
            throw new RangeError(`Image dimensions must be positive integers, got ${width}x${height}.`);
        }
        const expectedLength = width * height * channels;
        if (data.length !== expectedLength) {
            throw new RangeError(
                `Raw image data holds ${data.length} bytes, expected ${expectedLength} for ${width}x${height}x${channels}.`,
            );
        }
    }

    static fromImageData({ data, info }: IAssembledImageData): RawPixelBuffer {
        return new RawPixelBuffer(data, info.width, info.height, info.channels);
    }

    get info(): OutputInfo {
        return { width: this.width, height: this.height, channels: this.channels };
    }

    getChannel(x: number, y: number, channel: ChannelSequence): number {
        return this.data[this.byteIndex(x, y, channel)];
    }

    setChannel(x: number, y: number, channel: ChannelSequence, value: number): void {
        this.data[this.byteIndex(x, y, channel)] = value;
    }

    private byteIndex(x: number, y: number, channel: ChannelSequence): number {
        if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
            throw new RangeError(`Pixel (${x}, ${y}) lies outside the ${this.width}x${this.height} image.`);
        }
        return (y * this.width + x) * this.channels + getChannelOffset(channel);
    }
}
