// src/index.ts

export * from './@types/index.ts';
export { config } from './config/index.ts';
export { decode, decodeFile } from './core/decoder/index.ts';
export { encode, encodeFile } from './core/encoder/index.ts';
export { checkCarrierCapacity } from './core/encoder/lib/capacityChecker.ts';
export { StegoError } from './core/errors/StegoError.ts';
export { defaultImageProcessor, loadImageData, writeImageData } from './core/imageProcessing/processor.ts';
export { BmpImageProcessor } from './core/imageProcessing/strategies/BmpImageProcessor.ts';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor.ts';
export { capacityBits, checkCapacity, HEADER_BITS, maxPayloadBytes, requiredBits } from './core/lib/capacity.ts';
export { RawPixelBuffer } from './core/lib/pixelBuffer.ts';
export { CHANNEL_SEQUENCE, CHANNELS_PER_PIXEL, getSlotPosition, SlotCursor } from './core/lib/traversal.ts';
export { embedBit, extractBit } from './utils/bitManipulation/bitUtils.ts';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
