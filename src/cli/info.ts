import type { Rifl } from '../rifl/rifl';
import { DEFAULT_TIME_BASE, formatCaptureLength } from '../util';

export function describeRifl(rifl: Rifl, timeBase = DEFAULT_TIME_BASE) {
    const { version, frequency, dutyCycle, maxBufferSize } = rifl.header;
    const samples = rifl.totalSamples;
    return [
        `version: ${version}`,
        `frequency: ${+frequency.toFixed(3)} Hz`,
        `duty cycle: ${+dutyCycle.toFixed(4)}`,
        `max buffer size: ${maxBufferSize}`,
        `pairs: ${rifl.pulseAndDurations.length}`,
        `samples: ${samples}`,
        `capture length: ${formatCaptureLength(samples, timeBase)} (${samples} samples @ ${timeBase} Hz)`,
    ];
}
