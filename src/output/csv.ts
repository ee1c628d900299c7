import { defer } from 'rxjs';

import type { MessageLayer } from './message';

export type CsvValue = string | number;
export type CsvRow = ReadonlyArray<CsvValue>;

const LineTerminator = '\r\n';

/** Frames batches of rows into CSV text for the layer below. */
export class CsvLayer implements MessageLayer<ReadonlyArray<CsvRow>> {
    constructor(
        private below: MessageLayer<Buffer>,
        private delimiter = ',',
    ) {
    }

    formatRow(row: CsvRow) {
        return row.map(value => this.formatValue(value)).join(this.delimiter) + LineTerminator;
    }

    private formatValue(value: CsvValue) {
        const text = String(value);
        if (text.includes(this.delimiter) || /["\r\n]/.test(text)) {
            return `"${text.replace(/"/g, '""')}"`;
        }
        return text;
    }

    send(rows: ReadonlyArray<CsvRow>) {
        return defer(() => {
            const text = rows.map(row => this.formatRow(row)).join('');
            return this.below.send(Buffer.from(text, 'utf8'));
        });
    }
}
