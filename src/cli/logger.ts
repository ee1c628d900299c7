import type { Writable } from 'stream';

import type { Logger } from '../Logger';

/** Logger writing every level to one stream; debug is dropped unless enabled. */
export function createLogger(stream: Writable, { debug = false } = {}): Logger {
    const output = new console.Console({ stdout: stream, stderr: stream });
    return {
        debug: message => { if (debug) { output.debug(message); } },
        info: message => output.info(message),
        warn: message => output.warn(message),
        error: message => output.error(message),
    };
}
