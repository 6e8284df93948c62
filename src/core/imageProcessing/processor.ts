// src/core/imageProcessing/processor.ts

import type { IAssembledImageData, ImageProcessor, OutputInfo } from '../../@types/index.ts';
import {
    ImageProcessorStrategyMap,
    strategyForImage,
    SupportedImageProcessorStrategies,
} from './imageProcessorStrategies.ts';

export const defaultImageProcessor: ImageProcessor = ImageProcessorStrategyMap[SupportedImageProcessorStrategies.Sharp];

/**
 * Asynchronously loads raw image data from the specified file. Without an explicit processor the
 * strategy is chosen from the file extension.
 *
 * @param {string} imagePath - The file path of the image to be loaded.
 * @param {ImageProcessor} [processor] - The processor used to decode the image.
 * @return {Promise<IAssembledImageData>} A promise that resolves to the assembled image data object.
 */
export async function loadImageData(
    imagePath: string,
    processor: ImageProcessor = ImageProcessorStrategyMap[strategyForImage(imagePath)],
): Promise<IAssembledImageData> {
    return await processor.loadImageData(imagePath);
}

/**
 * Writes raw image data to a PNG file using the provided image processor.
 *
 * @param {Uint8Array} imageData - The raw image data to be written.
 * @param {OutputInfo} info - Metadata information about the image.
 * @param {string} outputPngPath - The path where the PNG file will be saved.
 * @param {ImageProcessor} processor - The processor used to encode the image.
 * @return {Promise<void>} A promise that resolves when the image data has been written.
 */
export async function writeImageData(
    imageData: Uint8Array,
    info: OutputInfo,
    outputPngPath: string,
    processor: ImageProcessor = defaultImageProcessor,
): Promise<void> {
    await processor.writeImageData(imageData, info, outputPngPath);
}
