/**
 * Idle -> Connected -> {Receiving <-> Decoding} -> Closed
 *
 * Receiving is the only state in which the dispatcher waits.
 */
export enum DispatcherState {
    Idle = 'idle',
    Connected = 'connected',
    Receiving = 'receiving',
    Decoding = 'decoding',
    Closed = 'closed',
}
