import { from, Observable } from 'rxjs';
import { bufferCount, concatMap, map } from 'rxjs/operators';

import type { CsvRow } from '../output/csv';
import type { MessageLayer } from '../output/message';
import type { Rifl } from '../rifl/rifl';
import type { OutputFormat } from './args';

export interface ConvertConfig {
    format?: OutputFormat;
    /** rows handed to the output layer at once */
    batchSize?: number;
}

/**
 * Write a capture as CSV rows: `pulse,duration` per pair for "pad", one
 * sample per row for "signal".
 */
export function convert(
    rifl: Rifl,
    output: MessageLayer<ReadonlyArray<CsvRow>>,
    {
        format = 'pad',
        batchSize = 4096,
    }: ConvertConfig = {},
): Observable<never> {
    const rows: Observable<CsvRow> = format === 'pad'
        ? from(rifl.pulseAndDurations).pipe(map(({ pulse, duration }) => [pulse, duration]))
        : from(rifl.signal()).pipe(map(sample => [sample]));

    return rows.pipe(
        bufferCount(batchSize),
        concatMap(batch => output.send(batch)),
    );
}
