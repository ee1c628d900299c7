import { readFile, writeFile } from 'fs';
import { sumBy } from 'lodash';

import { isRiflError } from '../errors';
import { checkPair, padToSignal, type PulseAndDuration, type PulseAndDurations, type Signal } from '../signal/pad';
import { decodeRifl, encodeRifl } from './codec';
import { checkHeader, RIFL_VERSION, type RiflHeader } from './layout';

export const defaultHeader: Readonly<RiflHeader> = {
    version: RIFL_VERSION,
    frequency: 125000,
    dutyCycle: 0.5,
    maxBufferSize: 1024,
};

/**
 * A raw rfid capture (xyz.ask.raw or xyz.psk.raw).
 *
 * ```ts
 * const rifl = await Rifl.load('path/to/raw.ask.raw');
 * rifl.header.frequency;
 * rifl.pulseAndDurations;
 * rifl.signal();
 * ```
 */
export class Rifl {
    readonly header: Readonly<RiflHeader>;
    private readonly _pulseAndDurations: PulseAndDurations;

    constructor(header: Partial<RiflHeader>, pulseAndDurations: PulseAndDurations) {
        const { version, frequency, dutyCycle, maxBufferSize } = { ...defaultHeader, ...header };
        // float fields hold what the file will hold
        this.header = Object.freeze({
            version,
            frequency: Math.fround(frequency),
            dutyCycle: Math.fround(dutyCycle),
            maxBufferSize,
        });
        checkHeader(this.header);
        pulseAndDurations.forEach((pair, index) => checkPair(pair, index));
        this._pulseAndDurations = Object.freeze(
            pulseAndDurations.map(({ pulse, duration }): PulseAndDuration => Object.freeze({ pulse, duration })));
    }

    get pulseAndDurations(): PulseAndDurations {
        return this._pulseAndDurations;
    }

    /** Sum of all durations, the length of `signal()` */
    get totalSamples() {
        return sumBy(this._pulseAndDurations, p => p.duration);
    }

    signal(): Signal {
        return padToSignal(this._pulseAndDurations);
    }

    toBuffer() {
        return encodeRifl(this.header, this._pulseAndDurations);
    }

    static fromBuffer(bytes: Uint8Array) {
        const { header, pulseAndDurations } = decodeRifl(bytes);
        return new Rifl(header, pulseAndDurations);
    }

    static async load(path: string) {
        const data = await new Promise<Buffer>((resolve, reject) => {
            readFile(path, (err, content) => {
                if (err) { reject(err); } else { resolve(content); }
            });
        });
        try {
            return Rifl.fromBuffer(data);
        } catch (err) {
            throw isRiflError(err) ? err.withPath(path) : err;
        }
    }

    save(path: string) {
        const data = this.toBuffer();
        return new Promise<void>((resolve, reject) => {
            writeFile(path, data, err => {
                if (err) { reject(err); } else { resolve(); }
            });
        });
    }
}
