// src/core/imageProcessing/imageProcessorStrategies.ts

import type { ImageProcessor } from '../../@types/index.ts';
import { getFileExtension } from '../../utils/storage/storageUtils.ts';
import { BmpImageProcessor } from './strategies/BmpImageProcessor.ts';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.ts';

/**
 * Enumeration of supported image processing strategies.
 */
export enum SupportedImageProcessorStrategies {
    Sharp = 'sharp',
    Bmp = 'bmp',
}

/**
 * Mapping of image processing strategy identifiers to their corresponding implementations.
 */
export const ImageProcessorStrategyMap: Record<SupportedImageProcessorStrategies, ImageProcessor> = {
    [SupportedImageProcessorStrategies.Sharp]: new SharpImageProcessor(),
    [SupportedImageProcessorStrategies.Bmp]: new BmpImageProcessor(),
};

/**
 * Picks the strategy able to read an image, by file extension.
 */
export function strategyForImage(imagePath: string): SupportedImageProcessorStrategies {
    return getFileExtension(imagePath) === '.bmp'
        ? SupportedImageProcessorStrategies.Bmp
        : SupportedImageProcessorStrategies.Sharp;
}
