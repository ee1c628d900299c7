import { RiflError } from '../errors';

/**
 * One pulse and duration value as recorded by the reader:
 *
 * ```
 * ______________      __________
 *               ______          __________ ...
 * ^ - pulse0 - ^      ^-pulse1-^
 * ^ -    duration0  -^^ -    duration1  -^ ...
 * ```
 *
 * pulse is the number of samples while the output is high, duration the
 * number of samples until the next rising edge.
 */
export interface PulseAndDuration {
    readonly pulse: number;
    readonly duration: number;
}

export type PulseAndDurations = ReadonlyArray<PulseAndDuration>;

/** Dense reconstruction, one 0/1 entry per sample. */
export type Signal = Uint8Array;

const MAX_SAMPLES = 0xFFFFFFFF;

function isSampleCount(value: number) {
    return Number.isInteger(value) && value >= 0 && value <= MAX_SAMPLES;
}

/**
 * Throws a `MalformedPair` error unless pulse and duration are unsigned 32-bit
 * values with `pulse <= duration`. A zero duration only passes with `allowEmpty`.
 */
export function checkPair({ pulse, duration }: PulseAndDuration, index: number, allowEmpty = false) {
    if (!isSampleCount(pulse) || !isSampleCount(duration)) {
        throw new RiflError('MalformedPair',
            `pair ${index}: pulse (${pulse}) and duration (${duration}) must be unsigned 32-bit integers`, { index });
    }
    if (duration === 0 && !allowEmpty) {
        throw new RiflError('MalformedPair', `pair ${index}: duration is zero`, { index });
    }
    if (pulse > duration) {
        throw new RiflError('MalformedPair', `pair ${index}: pulse ${pulse} exceeds duration ${duration}`, { index });
    }
}

/**
 * Reconstruct the binary signal: `pulse` ones followed by `duration - pulse`
 * zeros for every pair. Pairs with a pulse longer than their duration are
 * rejected instead of being clamped.
 */
export function padToSignal(pulseAndDurations: PulseAndDurations): Signal {
    let length = 0;
    pulseAndDurations.forEach((pair, index) => {
        checkPair(pair, index, true);
        length += pair.duration;
    });

    // zero filled, only the high part of every pair needs writing
    const signal = new Uint8Array(length);
    let position = 0;
    for (const { pulse, duration } of pulseAndDurations) {
        signal.fill(1, position, position + pulse);
        position += duration;
    }
    return signal;
}

/**
 * Recover pulse and duration values from a binary signal. Every run of ones
 * together with the run of zeros after it becomes one pair.
 *
 * Boundaries: a signal starting low yields a first pair with pulse 0, and a
 * signal ending high yields a last pair whose pulse equals its duration.
 */
export function signalToPad(signal: ArrayLike<number>): PulseAndDuration[] {
    const length = signal.length;
    for (let i = 0; i < length; i++) {
        if (signal[i] !== 0 && signal[i] !== 1) {
            throw new RangeError(`signal sample ${i} is ${signal[i]}, expected 0 or 1`);
        }
    }

    const pulseAndDurations: PulseAndDuration[] = [];
    let position = 0;
    while (position < length) {
        const start = position;
        while (position < length && signal[position] === 1) { position++; }
        const pulse = position - start;
        while (position < length && signal[position] === 0) { position++; }
        pulseAndDurations.push({ pulse, duration: position - start });
    }
    return pulseAndDurations;
}

/** Index of the first sample that changes to `to`, -1 if the signal never does. */
export function findFirstTransitionIndex(signal: ArrayLike<number>, to: 0 | 1 = 1) {
    for (let i = 1; i < signal.length; i++) {
        if (signal[i] === to && signal[i - 1] !== to) {
            return i;
        }
    }
    return -1;
}
