import moment from 'moment';
import { Observable, of } from 'rxjs';
import type { Writable } from 'stream';

import type { Logger } from './Logger';
import { StreamLayer } from './output/stream';

/** Reader timers count in microseconds. */
export const DEFAULT_TIME_BASE = 1e6;

export function getOutputLayer(target: string | undefined, logger: Logger, stdout: Writable): Observable<StreamLayer> {
    if (target === void 0 || target === '-') {
        return of(new StreamLayer(logger, stdout, { name: 'stdout', end: false }));
    }
    return StreamLayer.openFile(logger, target);
}

export function readParamAsNumber(value: string | undefined): number | undefined {
    if (value === void 0) { return undefined; }
    const numberValue = parseFloat(value);
    if (!isFinite(numberValue) || isNaN(numberValue)) { return undefined; }
    return numberValue;
}

/** `HH:mm:ss.SSS` for a number of samples taken at `timeBase` Hz */
export function formatCaptureLength(samples: number, timeBase = DEFAULT_TIME_BASE) {
    const duration = moment.duration(samples * 1000 / timeBase, 'milliseconds');
    return moment.utc(Math.floor(duration.asMilliseconds())).format('HH:mm:ss.SSS');
}
