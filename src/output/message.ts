import type { Observable } from 'rxjs';

/** A layer that accepts values and completes once the layer below took them. */
export interface MessageLayer<T> {
    send(arg: T): Observable<never>;
}
