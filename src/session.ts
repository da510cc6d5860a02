import {
    StompFrame, StompHeaders, StompError, SendError, StompConfig, StompEventEmitter, StompAckMode
} from './model';
import { StompFrameLayer } from './frame';
import { StompProtocolHandlerV12, StompServerCommandListener, isServerCommand } from './protocol';
import { validateFrame } from './validators';
import { Heartbeat, HeartbeatOptions, parseHeartbeat } from './heartbeat';
import { StompSubscriptionRegistry } from './subscriptions';
import { StompTimerHandle, StompTimerService, nodeTimers } from './timers';
import { log, randomId } from './utils';

export const DEFAULT_STOMP_PORT = 61613;

export enum StompConnectionState {
    UNCONNECTED = 'UNCONNECTED',
    CONNECTING = 'CONNECTING',
    CONNECTED = 'CONNECTED',
    DISCONNECTED = 'DISCONNECTED'
}

export interface StompClientEvents {
    SEND_FRAME: [data: Buffer];
    CONNECTED: [headers: StompHeaders];
    MESSAGE: [headers: StompHeaders, body: Buffer];
    RECEIPT: [headers: StompHeaders];
    ERROR: [headers: StompHeaders, body: Buffer];
    DISCONNECTED: [];
    PROTOCOL_ERROR: [error: StompError];
}

/**
 * Client side of a STOMP 1.2 session. One instance drives exactly one
 * connection: once disconnected, a new instance is needed.
 */
export class StompClientSessionLayer {

    public readonly emitter = new StompEventEmitter<StompClientEvents>();
    public readonly subscriptions = new StompSubscriptionRegistry();
    public readonly protocol = StompProtocolHandlerV12;

    public host: string | null = null;
    public port: number | null = null;
    public sessionId?: string;
    public version?: string;
    public server?: string;
    public heartbeat: Heartbeat | null = null;

    private currentState = StompConnectionState.UNCONNECTED;
    private connectTimer: StompTimerHandle | null = null;
    private readonly timers: StompTimerService;
    private readonly nextId: () => string;

    private readonly listener: StompServerCommandListener = {
        connected: (headers) => this.handleConnected(headers),
        message: (headers, body) => this.dispatch('MESSAGE', headers, body),
        receipt: (headers) => this.dispatch('RECEIPT', headers),
        error: (headers, body) => this.dispatch('ERROR', headers, body)
    };

    constructor(public readonly frameLayer: StompFrameLayer, private readonly config: StompConfig = {}) {
        log.debug("StompClientSessionLayer: initializing");
        this.timers = config.timers || nodeTimers;
        this.nextId = config.idGenerator || randomId;
        frameLayer.emitter.on('frame', (frame) => this.onFrame(frame));
        frameLayer.emitter.on('error', (error) => this.handleProtocolError(error));
        frameLayer.emitter.on('send', (data) => this.dispatch('SEND_FRAME', data));
        frameLayer.emitter.on('end', () => this.onEnd());
        frameLayer.stream.emitter.on('connect', () => this.onTransportConnect());
        frameLayer.stream.emitter.on('error', (error) => this.onTransportError(error));
    }

    get state() {
        return this.currentState;
    }

    get heartbeatIntervals(): HeartbeatOptions {
        return {
            outgoingPeriod: this.heartbeat ? this.heartbeat.outgoingPeriod : 0,
            incomingPeriod: this.heartbeat ? this.heartbeat.incomingPeriod : 0
        };
    }

    public isConnected() {
        return this.currentState === StompConnectionState.CONNECTED;
    }

    public on<K extends keyof StompClientEvents>(event: K, listener: (...args: StompClientEvents[K]) => void) {
        this.emitter.on(event, listener);
        return this;
    }

    public off<K extends keyof StompClientEvents>(event: K, listener: (...args: StompClientEvents[K]) => void) {
        this.emitter.off(event, listener);
        return this;
    }

    public onSendFrame(listener: (data: Buffer) => void) {
        return this.on('SEND_FRAME', listener);
    }

    public onConnected(listener: (headers: StompHeaders) => void) {
        return this.on('CONNECTED', listener);
    }

    public onDisconnected(listener: () => void) {
        return this.on('DISCONNECTED', listener);
    }

    public onMessage(listener: (headers: StompHeaders, body: Buffer) => void) {
        return this.on('MESSAGE', listener);
    }

    public onReceipt(listener: (headers: StompHeaders) => void) {
        return this.on('RECEIPT', listener);
    }

    public onError(listener: (headers: StompHeaders, body: Buffer) => void) {
        return this.on('ERROR', listener);
    }

    public onProtocolError(listener: (error: StompError) => void) {
        return this.on('PROTOCOL_ERROR', listener);
    }

    /**
     * Opens the transport. The CONNECT frame goes out as soon as the
     * transport is up; CONNECTED is emitted once the broker accepts it.
     */
    public connect(host: string, port = DEFAULT_STOMP_PORT, heartbeat: string | HeartbeatOptions = '0,0') {
        if (this.currentState !== StompConnectionState.UNCONNECTED) {
            throw new StompError('Session already used', `Cannot connect a session in state ${this.currentState}`);
        }
        const options = typeof heartbeat === 'string' ? parseHeartbeat(heartbeat) : heartbeat;
        log.debug("StompClientSessionLayer: connecting to %s:%d with heart-beat %j", host, port, options);
        this.host = host;
        this.port = port;
        this.heartbeat = new Heartbeat(this.frameLayer, (error) => this.onHeartbeatTimeout(error), options, {
            timers: this.timers,
            margin: this.config.heartbeatMargin
        });
        this.currentState = StompConnectionState.CONNECTING;
        const connectTimeout = this.config.connectTimeout;
        if (connectTimeout && connectTimeout > 0) {
            this.connectTimer = this.timers.schedule(connectTimeout, () => this.onConnectTimeout(connectTimeout));
        }
        this.frameLayer.stream.connect(host, port);
    }

    /**
     * Sends DISCONNECT and tears the session down right away, without
     * waiting for the broker's RECEIPT.
     */
    public async disconnect(): Promise<void> {
        if (this.currentState !== StompConnectionState.CONNECTING && this.currentState !== StompConnectionState.CONNECTED) {
            return;
        }
        let sending: Promise<void> | null = null;
        if (this.currentState === StompConnectionState.CONNECTED) {
            sending = this.sendInternal(new StompFrame('DISCONNECT', { receipt: this.nextId() }));
        }
        const closing = this.teardown(true);
        await sending;
        await closing;
    }

    public async subscribe(destination: string, ack: StompAckMode = 'auto', id?: string): Promise<string> {
        this.assertConnected();
        const existing = this.subscriptions.get(destination);
        if (existing) {
            log.debug("StompClientSessionLayer: already subscribed to %s as %s", destination, existing.id);
            return existing.id;
        }
        const subscription = { id: id || this.nextId(), destination, ack };
        this.subscriptions.add(subscription);
        log.debug("StompClientSessionLayer: subscribing to %s as %s", destination, subscription.id);
        try {
            await this.sendFrame(new StompFrame('SUBSCRIBE', { destination, id: subscription.id, ack }));
        } catch (e) {
            this.subscriptions.removeById(subscription.id);
            throw e;
        }
        return subscription.id;
    }

    public async unsubscribe(id: string): Promise<void> {
        this.assertConnected();
        const subscription = this.subscriptions.removeById(id);
        log.debug("StompClientSessionLayer: unsubscribing %s from %s", id, subscription ? subscription.destination : 'unknown destination');
        await this.sendFrame(new StompFrame('UNSUBSCRIBE', { id }));
    }

    public async send(destination: string, headers: StompHeaders = {}, body?: string | Buffer): Promise<void> {
        this.assertConnected();
        const frame = new StompFrame('SEND', Object.assign({}, headers), body);
        if (frame.headers['content-length'] === undefined) {
            frame.setHeader('content-length', String(frame.body.length));
        }
        frame.setHeader('destination', destination);
        await this.sendFrame(frame);
    }

    public async ack(messageId: string): Promise<void> {
        this.assertConnected();
        await this.sendFrame(new StompFrame('ACK', { id: messageId }));
    }

    public async nack(messageId: string): Promise<void> {
        this.assertConnected();
        await this.sendFrame(new StompFrame('NACK', { id: messageId }));
    }

    public sendErrorHandler(e: SendError) {
        log.warn("StompClientSessionLayer: error while sending frame %O", e);
    }

    protected async sendFrame(frame: StompFrame): Promise<void> {
        try {
            await this.frameLayer.send(frame);
        } catch (e) {
            throw new SendError(e, frame);
        }
    }

    /**
     * Writes a frame the session itself issues; failures go to {@link sendErrorHandler}.
     */
    private sendInternal(frame: StompFrame): Promise<void> {
        return this.sendFrame(frame).catch((e: unknown) => {
            this.sendErrorHandler(e instanceof SendError ? e : new SendError(e, frame));
        });
    }

    private assertConnected() {
        if (this.currentState !== StompConnectionState.CONNECTED) {
            throw new StompError('Not connected', `Session is ${this.currentState}`);
        }
    }

    private onTransportConnect() {
        if (this.currentState !== StompConnectionState.CONNECTING || !this.heartbeat) {
            return;
        }
        const headers: StompHeaders = {
            'accept-version': this.protocol.version,
            'host': this.host || '',
            'heart-beat': this.heartbeat.optionsString
        };
        if (this.config.login !== undefined) {
            headers.login = this.config.login;
        }
        if (this.config.passcode !== undefined) {
            headers.passcode = this.config.passcode;
        }
        log.debug("StompClientSessionLayer: sending CONNECT frame");
        this.sendInternal(new StompFrame('CONNECT', headers)).then(() => {
            log.silly("StompClientSessionLayer: CONNECT frame handled");
        });
    }

    private onFrame(frame: StompFrame) {
        if (this.currentState !== StompConnectionState.CONNECTING && this.currentState !== StompConnectionState.CONNECTED) {
            log.debug("StompClientSessionLayer: ignoring %s frame in state %s", frame.command, this.currentState);
            return;
        }
        if (frame.command === 'CONNECTED' && this.currentState !== StompConnectionState.CONNECTING) {
            log.debug("StompClientSessionLayer: ignoring duplicate CONNECTED frame");
            return;
        }
        if (!isServerCommand(frame.command)) {
            this.handleProtocolError(new StompError('No such command', `Unrecognized Command '${frame.command}'`));
            return;
        }
        const command = this.protocol.server[frame.command];
        const validation = validateFrame(frame, command.validators);
        if (!validation.isValid) {
            this.handleProtocolError(new StompError(validation.message, validation.details));
            if (frame.command === 'CONNECTED') {
                // the handshake cannot complete
                this.teardown(false);
            }
            return;
        }
        log.silly("StompClientSessionLayer: handling frame %s", frame.command);
        command.handle(frame, this.listener);
    }

    private handleConnected(headers: StompHeaders) {
        this.currentState = StompConnectionState.CONNECTED;
        this.releaseConnectTimer();
        this.sessionId = headers.session;
        this.version = headers.version;
        this.server = headers.server;
        if (this.heartbeat) {
            this.heartbeat.init(headers['heart-beat']);
        }
        log.debug("StompClientSessionLayer: session %s connected to %s", this.sessionId, this.server);
        this.dispatch('CONNECTED', headers);
    }

    private handleProtocolError(error: StompError) {
        log.debug("StompClientSessionLayer: protocol error %O", error);
        this.dispatch('PROTOCOL_ERROR', error);
    }

    private onTransportError(error: Error) {
        log.debug("StompClientSessionLayer: transport error %O", error);
        this.teardown(false);
    }

    private onEnd() {
        log.debug("StompClientSessionLayer: end event");
        this.teardown(false);
    }

    private onHeartbeatTimeout(error: StompError) {
        log.warn("StompClientSessionLayer: %s", error.message);
        this.teardown(false);
    }

    private onConnectTimeout(timeout: number) {
        this.connectTimer = null;
        if (this.currentState === StompConnectionState.CONNECTING) {
            log.warn("StompClientSessionLayer: no CONNECTED frame within %d ms", timeout);
            this.teardown(false);
        }
    }

    private releaseConnectTimer() {
        if (this.connectTimer) {
            this.timers.cancel(this.connectTimer);
            this.connectTimer = null;
        }
    }

    /**
     * Leaves the session in DISCONNECTED: timers cancelled, transport closed
     * (flushed first when graceful) and DISCONNECTED emitted. Runs once.
     */
    private teardown(graceful: boolean): Promise<void> {
        if (this.currentState === StompConnectionState.DISCONNECTED) {
            return Promise.resolve();
        }
        this.currentState = StompConnectionState.DISCONNECTED;
        this.releaseConnectTimer();
        if (this.heartbeat) {
            this.heartbeat.releaseTimers();
        }
        this.subscriptions.clear();
        let closing = Promise.resolve();
        if (graceful) {
            closing = this.frameLayer.close().catch((e: unknown) => {
                log.debug("StompClientSessionLayer: error while closing %O", e);
            });
        } else {
            this.frameLayer.destroy();
        }
        this.dispatch('DISCONNECTED');
        return closing;
    }

    private dispatch<K extends keyof StompClientEvents>(event: K, ...args: StompClientEvents[K]) {
        try {
            this.emitter.emit(event, ...args);
        } catch (e) {
            log.warn("StompClientSessionLayer: %s listener failed %O", event, e);
        }
    }

}
