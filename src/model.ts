import { EventEmitter } from "events";
import type { StompTimerService } from "./timers";

/**
 * Header names mapped to their values. Insertion order is the order the
 * headers are written on the wire.
 */
export type StompHeaders = { [key: string]: string };

export type StompClientCommand = 'CONNECT' | 'SEND' | 'SUBSCRIBE' | 'UNSUBSCRIBE' | 'ACK' | 'NACK' | 'DISCONNECT';

export type StompServerCommand = 'CONNECTED' | 'MESSAGE' | 'RECEIPT' | 'ERROR';

export type StompCommand = StompClientCommand | StompServerCommand;

export type StompAckMode = 'auto' | 'client' | 'client-individual';

export type StompTransportType = 'tcp' | 'ws';

export interface StompConfig {
    /** Extra time granted to the broker on top of the negotiated incoming heartbeat period. */
    heartbeatMargin?: number;
    /** Give up when no CONNECTED frame arrives within this many ms. */
    connectTimeout?: number;
    maxBufferSize?: number;
    headersFilter?: (headerName: string) => boolean;
    login?: string;
    passcode?: string;
    transport?: StompTransportType;
    /** Request path used by the WebSocket transport. */
    wsPath?: string;
    timers?: StompTimerService;
    idGenerator?: () => string;
}

export class StompError extends Error {

    constructor(message?: string, public details?: string) {
        super(message);
        this.name = 'StompError';
    }

}

export class SendError extends Error {

    constructor(public cause: unknown, public frame: StompFrame) {
        super("Frame Send Error");
        this.name = 'SendError';
    }
}

export class StompFrame {

    public headers: StompHeaders;
    public body: Buffer;

    constructor(readonly command: StompCommand, headers?: StompHeaders, body?: string | Buffer) {
        this.headers = headers || {};
        this.body = typeof body === 'string' ? Buffer.from(body) : body || Buffer.alloc(0);
    }

    public setHeader(key: string, value: string) {
        this.headers[key] = value;
    }

    public toString() {
        return JSON.stringify({ command: this.command, headers: this.headers, body: this.body.toString() });
    }
}

type EventMap<T> = { [K in keyof T]: unknown[] };

/**
 * EventEmitter with the event names and listener arguments fixed by `E`.
 */
export class StompEventEmitter<E extends EventMap<E>> {

    private readonly emitter = new EventEmitter();

    public on<K extends keyof E & string>(event: K, callback: (...args: E[K]) => void) {
        this.emitter.on(event, callback);
    }

    public off<K extends keyof E & string>(event: K, callback: (...args: E[K]) => void) {
        this.emitter.off(event, callback);
    }

    public emit<K extends keyof E & string>(event: K, ...args: E[K]) {
        this.emitter.emit(event, ...args);
    }

    public removeAllListeners() {
        this.emitter.removeAllListeners();
    }

}
