import { concat, lastValueFrom, throwError } from 'rxjs';
import { catchError, concatMap } from 'rxjs/operators';
import type { Writable } from 'stream';

import { isRiflError } from '../errors';
import type { Logger } from '../Logger';
import { CsvLayer } from '../output/csv';
import { Rifl } from '../rifl/rifl';
import { getOutputLayer } from '../util';
import { VERSION } from '../version';
import { parseArgs } from './args';
import { convert } from './convert';
import { describeRifl } from './info';
import { createLogger } from './logger';

export const USAGE = `Usage:
    rifl convert [-f <format>] RAW_FILE [OUTPUT_FILE]
    rifl info [--time-base <hz>] RAW_FILE
    rifl (-h | --help)
    rifl --version

Arguments:
    RAW_FILE        The raw rfid capture (xyz.ask.raw or xyz.psk.raw)
    OUTPUT_FILE     The converted file as csv (default: stdout)

Options:
    -h --help                 Show this screen.
    --version                 Show version.
    -f --format=(pad|signal)  "pad" writes one pulse,duration row per pair (samples),
                              "signal" writes the reconstructed signal, one 0/1 sample per row [default: pad]
    --time-base=<hz>          Sample clock used for the capture length [default: 1000000]
`;

export interface CliContext {
    stdout: Writable;
    /** receives usage and error messages */
    logger: Logger;
}

function defaultContext(): CliContext {
    return {
        stdout: process.stdout,
        logger: createLogger(process.stderr, { debug: !!process.env.RIFL_DEBUG }),
    };
}

function errorMessage(err: unknown) {
    if (isRiflError(err)) {
        return err.path ? `${err.message}: ${err.path}` : err.message;
    }
    return err instanceof Error ? err.message : String(err);
}

function write(stream: Writable, text: string) {
    return new Promise<void>((resolve, reject) => {
        stream.write(text, err => {
            if (err) { reject(err); } else { resolve(); }
        });
    });
}

/** Runs one command and resolves with the process exit code. */
export async function run(argv: ReadonlyArray<string>, context: CliContext = defaultContext()): Promise<number> {
    const { stdout, logger } = context;
    try {
        const command = parseArgs(argv);
        switch (command.command) {
            case 'help':
                await write(stdout, USAGE);
                return 0;

            case 'version':
                await write(stdout, `rifl ${VERSION}\n`);
                return 0;

            case 'convert': {
                const rifl = await Rifl.load(command.rawFile);
                logger.debug(`convert: ${rifl.pulseAndDurations.length} pairs from ${command.rawFile}`);
                const done = getOutputLayer(command.outputFile, logger, stdout).pipe(
                    concatMap(layer => concat(
                        convert(rifl, new CsvLayer(layer), { format: command.format }),
                        layer.close(),
                    ).pipe(
                        catchError((err: unknown) => {
                            layer.abort();
                            return throwError(() => err);
                        }),
                    )),
                );
                await lastValueFrom(done, { defaultValue: undefined });
                return 0;
            }

            case 'info': {
                const rifl = await Rifl.load(command.rawFile);
                await write(stdout, describeRifl(rifl, command.timeBase).join('\n') + '\n');
                return 0;
            }
        }
    } catch (err) {
        logger.error(USAGE);
        logger.error(`Error: ${errorMessage(err)}`);
        return 1;
    }
}
