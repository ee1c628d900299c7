import { createWriteStream } from 'fs';
import { defer, Observable } from 'rxjs';
import { ignoreElements } from 'rxjs/operators';
import type { Writable } from 'stream';

import type { Logger } from '../Logger';
import type { MessageLayer } from './message';

export interface StreamLayerConfig {
    name?: string;
    /** end the stream on close; off for stdout */
    end?: boolean;
}

export class StreamLayer implements MessageLayer<Buffer> {
    private readonly name: string;
    private readonly end: boolean;
    private error: Error | null = null;

    constructor(
        private logger: Logger,
        private stream: Writable,
        {
            name = 'stream',
            end = true,
        }: StreamLayerConfig = {},
    ) {
        this.name = name;
        this.end = end;
        stream.on('error', err => {
            this.logger.debug(`output.error (${this.name}): ${err.message}`);
            this.error = err;
        });
    }

    static openFile(logger: Logger, path: string) {
        return new Observable<StreamLayer>(observer => {
            logger.debug(`output: opening ${path}`);
            const stream = createWriteStream(path);
            const openHandler = () => {
                stream.off('error', errorHandler);
                observer.next(new StreamLayer(logger, stream, { name: path }));
                observer.complete();
            };
            const errorHandler = (err: Error) => {
                stream.off('open', openHandler);
                observer.error(err);
            };
            stream.once('open', openHandler);
            stream.once('error', errorHandler);
        });
    }

    send(data: Buffer): Observable<never> {
        return defer(() => new Promise<void>((resolve, reject) => {
            if (this.error) { throw this.error; }
            this.stream.write(data, err => {
                if (err) { reject(this.error || err); } else { resolve(); }
            });
        })).pipe(ignoreElements());
    }

    close(): Observable<never> {
        return defer(() => new Promise<void>((resolve, reject) => {
            if (this.error) { throw this.error; }
            if (!this.end) {
                resolve();
                return;
            }
            this.logger.debug(`output: closing ${this.name}`);
            this.stream.once('error', reject);
            this.stream.end(() => resolve());
        })).pipe(ignoreElements());
    }

    /** Drops a file stream after a failed write, stdout stays open. */
    abort() {
        if (this.end && !this.stream.destroyed) {
            this.logger.debug(`output: aborting ${this.name}`);
            this.stream.destroy();
        }
    }
}
