// src/core/imageProcessing/strategies/BmpImageProcessor.ts

import bmp from 'bmp-js';
import type { IAssembledImageData } from '../../../@types/index.ts';
import { readBufferFromFile } from '../../../utils/storage/storageUtils.ts';
import { SharpImageProcessor } from './SharpImageProcessor.ts';

/**
 * Reads Windows bitmaps, which sharp cannot decode. Output still goes through sharp as PNG.
 */
export class BmpImageProcessor extends SharpImageProcessor {
    /**
     * Decodes a BMP file into interleaved RGB bytes. Bitmap alpha is dropped.
     *
     * @param {string} imagePath - The file path to the bitmap.
     * @return {Promise<IAssembledImageData>} A promise that resolves to the raw RGB data and its layout.
     */
    public override async loadImageData(imagePath: string): Promise<IAssembledImageData> {
        const { width, height, data } = bmp.decode(readBufferFromFile(imagePath));
        const pixelCount = width * height;
        if (data.length < pixelCount * 4) {
            throw new Error(`Bitmap "${imagePath}" decoded to ${data.length} bytes, expected ${pixelCount * 4}.`);
        }

        const rgb = new Uint8Array(pixelCount * 3);
        for (let pixel = 0; pixel < pixelCount; pixel++) {
            // ABGR -> RGB
            rgb[pixel * 3] = data[pixel * 4 + 3];
            rgb[pixel * 3 + 1] = data[pixel * 4 + 2];
            rgb[pixel * 3 + 2] = data[pixel * 4 + 1];
        }
        return { data: rgb, info: { width, height, channels: 3 } };
    }
}
