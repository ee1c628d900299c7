import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { isRiflError, type RiflError } from '../errors';
import { decodeRifl } from './codec';
import { encodeHeader, HEADER_SIZE } from './layout';
import { defaultHeader, Rifl } from './rifl';

const smallHeader = { ...defaultHeader, maxBufferSize: 4 };

function capture(pairData: string, header = smallHeader) {
    return Buffer.concat([encodeHeader(header), Buffer.from(pairData, 'hex')]);
}

function errorOf(fn: () => unknown): RiflError {
    try {
        fn();
    } catch (err) {
        if (isRiflError(err)) { return err; }
        throw err;
    }
    throw new Error('expected a RiflError');
}

describe('Rifl', () => {
    const pairs = [
        { pulse: 1, duration: 2 },
        { pulse: 3, duration: 4 },
        { pulse: 200, duration: 300 },
    ];

    describe('encoding', () => {
        it('should pack pairs into chunks of at most maxBufferSize bytes', () => {
            const bytes = new Rifl(smallHeader, pairs).toBuffer();
            expect(bytes.length).toBe(HEADER_SIZE + 16);
            expect(bytes.subarray(HEADER_SIZE).toString('hex')).toBe('04000000' + '01020304' + '04000000' + 'c801ac02');
        });

        it('should write one empty chunk without pairs', () => {
            const bytes = new Rifl(smallHeader, []).toBuffer();
            expect(bytes.subarray(HEADER_SIZE).toString('hex')).toBe('00000000');
        });

        it('should refuse a pair larger than a chunk', () => {
            const rifl = new Rifl({ ...smallHeader, maxBufferSize: 3 }, [{ pulse: 200, duration: 300 }]);
            expect(() => rifl.toBuffer()).toThrow(RangeError);
        });

        it('should decode what it encoded', () => {
            const rifl = new Rifl({ frequency: 134200, dutyCycle: 0.25 }, pairs);
            const decoded = Rifl.fromBuffer(rifl.toBuffer());
            expect(decoded.header).toEqual(rifl.header);
            expect(decoded.pulseAndDurations).toEqual(pairs);
        });

        it('should hold float fields at the precision the file stores', () => {
            const rifl = new Rifl({ frequency: 125000.1, dutyCycle: 0.3 }, [{ pulse: 1, duration: 2 }]);
            expect(rifl.header.dutyCycle).toBe(Math.fround(0.3));
            expect(rifl.header.frequency).toBe(Math.fround(125000.1));
            expect(Rifl.fromBuffer(rifl.toBuffer()).header).toEqual(rifl.header);
        });
    });

    describe('decoding', () => {
        it('should read pairs across chunks in stream order', () => {
            const rifl = Rifl.fromBuffer(capture('04000000' + '01020304' + '04000000' + 'c801ac02'));
            expect(rifl.header).toEqual(smallHeader);
            expect(rifl.pulseAndDurations).toEqual(pairs);
        });

        it('should accept a plain Uint8Array', () => {
            const bytes = new Uint8Array(capture('02000000' + '0305' + '00000000'));
            expect(Rifl.fromBuffer(bytes).pulseAndDurations).toEqual([{ pulse: 3, duration: 5 }]);
        });

        it('should accept a header without pair data', () => {
            expect(Rifl.fromBuffer(encodeHeader(defaultHeader)).pulseAndDurations).toEqual([]);
        });

        it('should be deterministic', () => {
            const bytes = capture('04000000' + '01020304');
            expect(decodeRifl(bytes)).toEqual(decodeRifl(bytes));
        });

        it('should reject trailing bytes that cannot hold a chunk size', () => {
            for (const trailing of ['00', '0000', '000000']) {
                const err = errorOf(() => Rifl.fromBuffer(capture('04000000' + '01020304' + trailing)));
                expect(err.kind).toBe('MisalignedPairData');
                expect(err.offset).toBe(HEADER_SIZE + 8);
            }
        });

        it('should reject a chunk larger than maxBufferSize', () => {
            expect(errorOf(() => Rifl.fromBuffer(capture('05000000' + '0102030405'))).kind).toBe('OversizedBuffer');
        });

        it('should reject a chunk that runs past the end of input', () => {
            const err = errorOf(() => Rifl.fromBuffer(capture('04000000' + '0102')));
            expect(err.kind).toBe('TruncatedInput');
            expect(err.message).toBe('tried to read 4 bytes got only 2');
        });

        it('should reject a chunk with an odd number of values', () => {
            expect(errorOf(() => Rifl.fromBuffer(capture('03000000' + '010203'))).kind).toBe('MisalignedPairData');
        });

        it('should reject a chunk ending inside a varint', () => {
            expect(errorOf(() => Rifl.fromBuffer(capture('02000000' + '0180'))).kind).toBe('MisalignedPairData');
        });

        it('should reject pairs with zero duration', () => {
            const err = errorOf(() => Rifl.fromBuffer(capture('02000000' + '0000')));
            expect(err.kind).toBe('MalformedPair');
            expect(err.index).toBe(0);
        });

        it('should report the index of a pulse longer than its duration', () => {
            const err = errorOf(() => Rifl.fromBuffer(capture('04000000' + '0102' + '0503')));
            expect(err.kind).toBe('MalformedPair');
            expect(err.index).toBe(1);
            expect(err.message).toBe('pair 1: pulse 5 exceeds duration 3');
        });
    });

    it('should reject malformed pairs on construction', () => {
        expect(errorOf(() => new Rifl({}, [{ pulse: 2, duration: 1 }])).kind).toBe('MalformedPair');
        expect(errorOf(() => new Rifl({}, [{ pulse: 0, duration: 0 }])).kind).toBe('MalformedPair');
    });

    it('should reject headers it could not read back', () => {
        const err = errorOf(() => new Rifl({ version: 2 }, pairs));
        expect(err.kind).toBe('UnsupportedVersion');
        expect(err.message).toBe('Unsupported RIFL version 2');
        expect(errorOf(() => new Rifl({ frequency: -5 }, [])).message).toBe('Invalid frequency -5');
        expect(errorOf(() => new Rifl({ frequency: 1e39 }, [])).kind).toBe('InvalidHeader');
        expect(errorOf(() => new Rifl({ maxBufferSize: 1 }, [])).message).toBe('Invalid max buffer size 1');
        expect(errorOf(() => new Rifl({ maxBufferSize: 2.5 }, [])).kind).toBe('InvalidHeader');
    });

    it('should expose frozen pairs', () => {
        const source = [{ pulse: 3, duration: 5 }];
        const rifl = new Rifl({}, source);
        source[0].pulse = 4;
        expect(rifl.pulseAndDurations).toEqual([{ pulse: 3, duration: 5 }]);
        expect(Object.isFrozen(rifl.pulseAndDurations)).toBe(true);
        expect(Object.isFrozen(rifl.pulseAndDurations[0])).toBe(true);
    });

    it('should derive the signal from its pairs', () => {
        const rifl = new Rifl({}, [{ pulse: 3, duration: 5 }, { pulse: 2, duration: 4 }]);
        expect(rifl.totalSamples).toBe(9);
        expect(Array.from(rifl.signal())).toEqual([1, 1, 1, 0, 0, 1, 1, 0, 0]);
    });

    describe('files', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'rifl-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should save and load a capture', async () => {
            const path = join(dir, 'capture.ask.raw');
            const rifl = new Rifl(defaultHeader, pairs);
            await rifl.save(path);

            const loaded = await Rifl.load(path);
            expect(loaded.header).toEqual(defaultHeader);
            expect(loaded.pulseAndDurations).toEqual(pairs);
        });

        it('should attach the path to decode errors', async () => {
            const path = join(dir, 'broken.psk.raw');
            writeFileSync(path, Buffer.alloc(7));

            const err = await Rifl.load(path).catch((e: unknown) => e);
            expect(isRiflError(err) && err.kind).toBe('TruncatedInput');
            expect(isRiflError(err) && err.path).toBe(path);
        });

        it('should pass file errors through', async () => {
            await expect(Rifl.load(join(dir, 'missing.ask.raw'))).rejects.toMatchObject({ code: 'ENOENT' });
        });
    });
});
