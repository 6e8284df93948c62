// tests/encoder.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { IProgressBar } from '../src/@types/index.ts';
import { StegoErrorKind } from '../src/@types/index.ts';
import { decodeFile } from '../src/core/decoder/index.ts';
import { encodeFile } from '../src/core/encoder/index.ts';
import { LsbStrippingImageProcessor, MemoryImageProcessor } from './helpers/memoryImageProcessor.ts';
import { MockLogger } from './helpers/mockLogger.ts';

describe('En-/Decoder pipelines', () => {
    let testDir: string;
    let secretFile: string;
    let processor: MemoryImageProcessor;
    let logger: MockLogger;

    const carrierFile = '/images/carrier.png';
    const outputFile = '/images/output.png';

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lsb-veil-pipeline-'));
        secretFile = path.join(testDir, 'secret.txt');
        fs.writeFileSync(secretFile, 'AB');
        processor = new MemoryImageProcessor();
        processor.addImage(carrierFile, new Uint8Array(300).fill(0x80), { width: 10, height: 10, channels: 3 });
        logger = new MockLogger();
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
    });

    describe('encodeFile', () => {
        it('should write the carrier with the secret embedded', async () => {
            const result = await encodeFile({
                carrierFile,
                secretFile,
                outputFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({
                ok: true,
                value: { outputFile, payloadBytes: 2, usedBits: 48, capacityBits: 300 },
                status: 'success',
            });
            const written = processor.images.get(outputFile);
            expect(written?.info).toEqual({ width: 10, height: 10, channels: 3 });
            expect(written?.data[1]).toBe(0x81);
            expect(written?.data[48]).toBe(0x80);
            expect(logger.successMessages).toEqual([
                `Success! Data encoded and saved to ${outputFile}`,
                'Verification successful: Decoded data matches original data.',
            ]);
        });

        it('should leave the alpha channel of an RGBA carrier untouched', async () => {
            const rgba = new Uint8Array(400);
            for (let i = 0; i < rgba.length; i++) {
                rgba[i] = i % 4 === 3 ? 0x7f : 0x80;
            }
            processor.addImage('/images/alpha.png', rgba, { width: 10, height: 10, channels: 4 });

            const result = await encodeFile({
                carrierFile: '/images/alpha.png',
                secretFile,
                outputFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result.ok).toBe(true);
            const written = processor.images.get(outputFile);
            expect(written?.info.channels).toBe(4);
            const alpha = written ? Array.from(written.data).filter((_, i) => i % 4 === 3) : [];
            expect(alpha.length).toBe(100);
            expect(alpha.every((value) => value === 0x7f)).toBe(true);
        });

        it('should reject output formats that are not lossless before reading anything', async () => {
            const result = await encodeFile({
                carrierFile,
                secretFile: path.join(testDir, 'missing.bin'),
                outputFile: '/images/output.jpg',
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({
                ok: false,
                error: {
                    kind: StegoErrorKind.UnsupportedOutputFormat,
                    message: 'Output image "/images/output.jpg" must use one of: .png.',
                },
            });
        });

        it('should report an unreadable secret file', async () => {
            const result = await encodeFile({
                carrierFile,
                secretFile: path.join(testDir, 'missing.bin'),
                outputFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe(StegoErrorKind.SecretReadFailed);
                expect(result.error.message).toContain(`Could not open secret file "${path.join(testDir, 'missing.bin')}"`);
            }
        });

        it('should report a carrier that cannot be loaded', async () => {
            const result = await encodeFile({
                carrierFile: '/images/nowhere.png',
                secretFile,
                outputFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({
                ok: false,
                error: {
                    kind: StegoErrorKind.CarrierLoadFailed,
                    message: 'Could not load carrier image "/images/nowhere.png": No such image: /images/nowhere.png',
                },
            });
        });

        it('should refuse an undersized carrier without writing any output', async () => {
            processor.addImage('/images/small.png', new Uint8Array(48), { width: 4, height: 4, channels: 3 });
            fs.writeFileSync(secretFile, 'ABC');

            const result = await encodeFile({
                carrierFile: '/images/small.png',
                secretFile,
                outputFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({
                ok: false,
                error: {
                    kind: StegoErrorKind.InsufficientCapacity,
                    message: 'Carrier image is too small to hold the secret data (56 bits required, 48 available).',
                },
            });
            expect(processor.images.has(outputFile)).toBe(false);
            expect(logger.errorMessages).toEqual([
                'Error occurred during "CHECK_CAPACITY": Carrier image is too small to hold the secret data (56 bits required, 48 available).',
                'ENCODER_ERROR failed: Carrier image is too small to hold the secret data (56 bits required, 48 available).',
            ]);
        });

        it('should fail verification when the written image loses its low bits', async () => {
            const lossy = new LsbStrippingImageProcessor();
            lossy.addImage(carrierFile, new Uint8Array(300).fill(0x80), { width: 10, height: 10, channels: 3 });

            const result = await encodeFile({
                carrierFile,
                secretFile,
                outputFile,
                verbose: false,
                logger,
                imageProcessor: lossy,
            });

            expect(result).toEqual({
                ok: false,
                error: {
                    kind: StegoErrorKind.VerificationFailed,
                    message: 'Verification failed: Decoded data does not match original data.',
                },
            });
        });

        it('should skip verification when asked to', async () => {
            const lossy = new LsbStrippingImageProcessor();
            lossy.addImage(carrierFile, new Uint8Array(300).fill(0x80), { width: 10, height: 10, channels: 3 });

            const result = await encodeFile({
                carrierFile,
                secretFile,
                outputFile,
                verbose: false,
                verify: false,
                logger,
                imageProcessor: lossy,
            });

            expect(result.ok).toBe(true);
            expect(logger.infoMessages).toContain('Verification step skipped.');
        });

        it('should advance the progress bar once per state', async () => {
            const progressBar: IProgressBar = { start: vi.fn(), stop: vi.fn(), increment: vi.fn() };

            await encodeFile({
                carrierFile,
                secretFile,
                outputFile,
                verbose: false,
                logger,
                progressBar,
                imageProcessor: processor,
            });

            expect(vi.mocked(progressBar.increment).mock.calls.map(([payload]) => payload)).toEqual([
                { state: 'INIT' },
                { state: 'READ_SECRET' },
                { state: 'LOAD_CARRIER' },
                { state: 'CHECK_CAPACITY' },
                { state: 'EMBED_PAYLOAD' },
                { state: 'WRITE_OUTPUT' },
                { state: 'VERIFY_ENCODING' },
                { state: 'COMPLETED' },
            ]);
        });
    });

    describe('decodeFile', () => {
        it('should recover the secret written by encodeFile', async () => {
            await encodeFile({ carrierFile, secretFile, outputFile, verbose: false, logger, imageProcessor: processor });
            const decodedFile = path.join(testDir, 'decoded', 'secret.txt');

            const result = await decodeFile({
                inputFile: outputFile,
                outputFile: decodedFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({
                ok: true,
                value: { outputFile: decodedFile, payloadBytes: 2 },
                status: 'success',
            });
            expect(fs.readFileSync(decodedFile, 'utf8')).toBe('AB');
        });

        it('should report an image with an empty payload without writing a file', async () => {
            fs.writeFileSync(secretFile, '');
            await encodeFile({ carrierFile, secretFile, outputFile, verbose: false, logger, imageProcessor: processor });
            const decodedFile = path.join(testDir, 'decoded.bin');

            const result = await decodeFile({
                inputFile: outputFile,
                outputFile: decodedFile,
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({ ok: true, value: { outputFile: null, payloadBytes: 0 }, status: 'empty' });
            expect(fs.existsSync(decodedFile)).toBe(false);
            expect(logger.warnMessages).toEqual(['Decoded size is 0. Nothing to extract.']);
        });

        it('should reject an image whose header cannot be valid', async () => {
            processor.addImage('/images/noise.png', new Uint8Array(300).fill(0xff), { width: 10, height: 10, channels: 3 });

            const result = await decodeFile({
                inputFile: '/images/noise.png',
                outputFile: path.join(testDir, 'out.bin'),
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe(StegoErrorKind.InvalidLength);
            }
        });

        it('should report a missing image', async () => {
            const result = await decodeFile({
                inputFile: '/images/nowhere.png',
                outputFile: path.join(testDir, 'out.bin'),
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result).toEqual({
                ok: false,
                error: {
                    kind: StegoErrorKind.CarrierLoadFailed,
                    message:
                        'Could not load the steganographic image "/images/nowhere.png": No such image: /images/nowhere.png',
                },
            });
        });

        it('should report an output file that cannot be created', async () => {
            await encodeFile({ carrierFile, secretFile, outputFile, verbose: false, logger, imageProcessor: processor });
            const blocker = path.join(testDir, 'blocker');
            fs.writeFileSync(blocker, 'not a directory');

            const result = await decodeFile({
                inputFile: outputFile,
                outputFile: path.join(blocker, 'out.bin'),
                verbose: false,
                logger,
                imageProcessor: processor,
            });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe(StegoErrorKind.OutputWriteFailed);
            }
        });
    });
});
