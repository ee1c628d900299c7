import { max } from 'lodash';

/**
 * Count every integer value in its own bin, e.g. the pulse lengths of a
 * capture. There is one bin per value up to the largest, with no spare bins
 * past it; pass `minLength` to get a longer result.
 */
export function histogram(values: ArrayLike<number>, minLength = 0) {
    for (let i = 0; i < values.length; i++) {
        if (!Number.isInteger(values[i]) || values[i] < 0) {
            throw new RangeError(`histogram value ${i} is ${values[i]}, expected a non-negative integer`);
        }
    }

    const highest = max(Array.from(values));
    const bins = new Uint32Array(Math.max(highest === void 0 ? 0 : highest + 1, minLength));
    for (let i = 0; i < values.length; i++) {
        bins[values[i]]++;
    }
    return bins;
}

function gaussianKernel(sigma: number) {
    const radius = Math.floor(4 * sigma + 0.5);
    const kernel = new Float64Array(2 * radius + 1);
    let sum = 0;
    for (let x = -radius; x <= radius; x++) {
        const weight = Math.exp(-0.5 * x * x / (sigma * sigma));
        kernel[x + radius] = weight;
        sum += weight;
    }
    return kernel.map(w => w / sum);
}

/**
 * Gaussian filter over the signal. Samples beyond either end repeat the
 * nearest edge sample.
 */
export function smooth(signal: ArrayLike<number>, sigma = 10) {
    if (!isFinite(sigma) || sigma <= 0) {
        throw new RangeError(`sigma must be positive, got ${sigma}`);
    }

    const kernel = gaussianKernel(sigma);
    const radius = (kernel.length - 1) / 2;
    const last = signal.length - 1;
    const smoothed = new Float32Array(signal.length);
    for (let i = 0; i < signal.length; i++) {
        let value = 0;
        for (let k = -radius; k <= radius; k++) {
            const index = Math.min(Math.max(i + k, 0), last);
            value += kernel[k + radius] * signal[index];
        }
        smoothed[i] = value;
    }
    return smoothed;
}

export function binarize(values: ArrayLike<number>, threshold = 0.5) {
    const signal = new Uint8Array(values.length);
    for (let i = 0; i < values.length; i++) {
        signal[i] = values[i] > threshold ? 1 : 0;
    }
    return signal;
}

/**
 * Normalised autocorrelation: the mean is removed and every lag is divided by
 * variance and length, so lag 0 is 1. Lags run up to half the zero padded
 * size (the next power of two of `2n - 1`); lags of `n` and more are 0.
 * A constant signal has no variance and yields NaN.
 */
export function autocorrelate(signal: ArrayLike<number>) {
    const n = signal.length;
    if (n < 2) {
        return new Float32Array(0);
    }

    let mean = 0;
    for (let i = 0; i < n; i++) { mean += signal[i]; }
    mean /= n;

    const centered = new Float64Array(n);
    let variance = 0;
    for (let i = 0; i < n; i++) {
        centered[i] = signal[i] - mean;
        variance += centered[i] * centered[i];
    }
    variance /= n;

    const paddedSize = 2 ** Math.ceil(Math.log2(2 * n - 1));
    const corr = new Float32Array(paddedSize / 2);
    for (let lag = 0; lag < Math.min(n, corr.length); lag++) {
        let sum = 0;
        for (let i = 0; i + lag < n; i++) {
            sum += centered[i] * centered[i + lag];
        }
        corr[lag] = sum / variance / n;
    }
    return corr;
}
