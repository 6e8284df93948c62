// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { IAssembledImageData, ImageProcessor, OutputInfo, PixelChannelCount } from '../../../@types/index.ts';
import { config } from '../../../config/index.ts';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Loads image data from a given file path, converts it to the sRGB color space and returns the raw
     * interleaved pixel data. An alpha channel, when present, is kept so that it survives a rewrite.
     *
     * @param {string} imagePath - The file path to the image to be processed.
     * @return {Promise<IAssembledImageData>} A promise that resolves to the raw image data and its layout.
     */
    public async loadImageData(imagePath: string): Promise<IAssembledImageData> {
        const { data, info } = await sharp(imagePath)
            .toColourspace('srgb')
            .raw()
            .toBuffer({ resolveWithObject: true });
        const channels = toPixelChannelCount(info.channels);
        return {
            data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
            info: { width: info.width, height: info.height, channels },
        };
    }

    /**
     * Writes image data to a file in lossless, non-palette PNG format.
     *
     * @param {Uint8Array} imageData - The raw image data to be written.
     * @param {OutputInfo} info - Information about the image such as width, height, and channels.
     * @param {string} outputPngPath - The path where the PNG file will be saved.
     * @return {Promise<void>} A promise that resolves when the file has been written.
     */
    public async writeImageData(imageData: Uint8Array, info: OutputInfo, outputPngPath: string): Promise<void> {
        await sharp(imageData, {
            raw: {
                width: info.width,
                height: info.height,
                channels: info.channels,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toFile(outputPngPath);
    }
}

function toPixelChannelCount(channels: number): PixelChannelCount {
    if (channels === 3 || channels === 4) {
        return channels;
    }
    throw new Error(`Unsupported channel layout: expected RGB or RGBA data, got ${channels} channel(s).`);
}
