import { Socket } from 'net';
import WebSocket from 'ws';
import { StompEventEmitter, StompError, StompTransportType } from './model';
import { log } from './utils';

export interface StompStreamEvents {
    connect: [];
    data: [data: Buffer];
    error: [error: Error];
    end: [];
}

/**
 * Byte stream to the broker. `end` is emitted once the underlying
 * connection is gone, whatever the reason.
 */
export interface StompStreamLayer {

    readonly emitter: StompEventEmitter<StompStreamEvents>;

    connect(host: string, port: number): void;

    send(data: Buffer): Promise<void>;

    /** Flushes pending writes, then closes. */
    close(): Promise<void>;

    /** Drops the connection immediately. */
    destroy(): void;

}

export interface StompStreamOptions {
    transport?: StompTransportType;
    wsPath?: string;
}

export function openStream(options: StompStreamOptions = {}): StompStreamLayer {
    switch (options.transport || 'tcp') {
        case 'tcp':
            return new StompSocketStreamLayer();
        case 'ws':
            return new StompWebSocketStreamLayer(options.wsPath);
        default:
            throw new StompError('Unsupported transport type', `Transport '${options.transport}'`);
    }
}

export class StompSocketStreamLayer implements StompStreamLayer {

    public readonly emitter = new StompEventEmitter<StompStreamEvents>();
    private socket: Socket | null = null;

    public connect(host: string, port: number) {
        log.debug("StompSocketStreamLayer: connecting to %s:%d", host, port);
        const socket = new Socket();
        this.socket = socket;
        socket.setKeepAlive(true);
        socket.on('connect', () => this.onSocketConnect());
        socket.on('data', (data: Buffer) => this.onSocketData(data));
        socket.on('error', (err: Error) => this.onSocketError(err));
        socket.on('close', () => this.onSocketEnd());
        socket.connect(port, host);
    }

    private onSocketConnect() {
        log.debug("StompSocketStreamLayer: connected to %s", this.socket && this.socket.remoteAddress);
        this.emitter.emit('connect');
    }

    private onSocketData(data: Buffer) {
        log.silly("StompSocketStreamLayer: received data %j", data.toString());
        this.emitter.emit('data', data);
    }

    private onSocketError(err: Error) {
        log.debug("StompSocketStreamLayer: socket error %O", err);
        this.emitter.emit('error', err);
    }

    private onSocketEnd() {
        log.debug("StompSocketStreamLayer: socket closed");
        this.emitter.emit('end');
    }

    public async send(data: Buffer): Promise<void> {
        const socket = this.socket;
        if (!socket || socket.destroyed) {
            throw new StompError('Not connected');
        }
        log.silly("StompSocketStreamLayer: sending data %j", data.toString());
        return new Promise<void>((resolve, reject) => {
            socket.write(data, (err) => {
                if (err) {
                    log.debug("StompSocketStreamLayer: error while sending data %O", err);
                    reject(err);
                } else {
                    resolve();
                }
            });
        });
    }

    public async close(): Promise<void> {
        log.debug("StompSocketStreamLayer: closing");
        const socket = this.socket;
        if (!socket || socket.destroyed) {
            return;
        }
        return new Promise<void>((resolve) => {
            socket.end(() => resolve());
        });
    }

    public destroy() {
        log.debug("StompSocketStreamLayer: destroying");
        if (this.socket) {
            this.socket.destroy();
        }
    }

}

export class StompWebSocketStreamLayer implements StompStreamLayer {

    public readonly emitter = new StompEventEmitter<StompStreamEvents>();
    private webSocket: WebSocket | null = null;

    constructor(private readonly path = '/') { }

    public connect(host: string, port: number) {
        const url = `ws://${host}:${port}${this.path}`;
        log.debug("StompWebSocketStreamLayer: connecting to %s", url);
        const webSocket = new WebSocket(url, ['v12.stomp']);
        this.webSocket = webSocket;
        webSocket.on('open', () => this.emitter.emit('connect'));
        webSocket.on('message', (data: WebSocket.RawData) => this.onWsMessage(data));
        webSocket.on('error', (err: Error) => this.onWsError(err));
        webSocket.on('close', (code: number) => this.onWsEnd(code));
    }

    private onWsMessage(data: WebSocket.RawData) {
        const buffer = toBuffer(data);
        log.silly("StompWebSocketStreamLayer: received data %j", buffer.toString());
        this.emitter.emit('data', buffer);
    }

    private onWsError(err: Error) {
        log.debug("StompWebSocketStreamLayer: WebSocket error %O", err);
        this.emitter.emit('error', err);
    }

    private onWsEnd(code: number) {
        log.debug("StompWebSocketStreamLayer: WebSocket closed %d", code);
        this.emitter.emit('end');
    }

    public async send(data: Buffer): Promise<void> {
        const webSocket = this.webSocket;
        if (!webSocket || webSocket.readyState !== WebSocket.OPEN) {
            throw new StompError('Not connected');
        }
        log.silly("StompWebSocketStreamLayer: sending data %j", data.toString());
        return new Promise<void>((resolve, reject) => {
            webSocket.send(data, (err?: Error) => {
                if (err) {
                    log.debug("StompWebSocketStreamLayer: error while sending data %O", err);
                    reject(err);
                } else {
                    resolve();
                }
            });
        });
    }

    public async close(): Promise<void> {
        log.debug("StompWebSocketStreamLayer: closing");
        const webSocket = this.webSocket;
        if (webSocket && webSocket.readyState === WebSocket.OPEN) {
            webSocket.close();
        }
    }

    public destroy() {
        log.debug("StompWebSocketStreamLayer: destroying");
        if (this.webSocket && this.webSocket.readyState !== WebSocket.CLOSED) {
            this.webSocket.terminate();
        }
    }

}

function toBuffer(data: WebSocket.RawData): Buffer {
    if (Array.isArray(data)) {
        return Buffer.concat(data);
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data);
    }
    return data;
}
