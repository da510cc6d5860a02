import { StompFrameLayer } from "./frame";
import { StompError } from "./model";
import { StompTimerService, StompTimerHandle, nodeTimers } from "./timers";
import { log } from "./utils";

export interface HeartbeatOptions {
    outgoingPeriod: number;
    incomingPeriod: number;
}

export const DEFAULT_HEARTBEAT_MARGIN = 1000;

/**
 * Reads a `heart-beat` header value. Anything but two non-negative integers
 * means no heart-beating.
 */
export function parseHeartbeat(value: string | undefined): HeartbeatOptions {
    const match = value ? /^\s*(\d+)\s*,\s*(\d+)\s*$/.exec(value) : null;
    if (!match) {
        return { outgoingPeriod: 0, incomingPeriod: 0 };
    }
    return { outgoingPeriod: Number(match[1]), incomingPeriod: Number(match[2]) };
}

export function formatHeartbeat(options: HeartbeatOptions): string {
    return `${options.outgoingPeriod},${options.incomingPeriod}`;
}

/**
 * Effective periods for this side: outgoing is how often it must send,
 * incoming how long it waits for the other side. A zero on either end of a
 * direction switches that direction off.
 */
export function negotiateHeartbeat(local: HeartbeatOptions, remote: HeartbeatOptions): HeartbeatOptions {
    const outgoingPeriod = local.outgoingPeriod === 0 || remote.incomingPeriod === 0 ?
        0 : Math.max(local.outgoingPeriod, remote.incomingPeriod);
    const incomingPeriod = remote.outgoingPeriod === 0 || local.incomingPeriod === 0 ?
        0 : Math.max(remote.outgoingPeriod, local.incomingPeriod);
    return { outgoingPeriod, incomingPeriod };
}

export interface HeartbeatConfig {
    timers?: StompTimerService;
    margin?: number;
}

export class Heartbeat {

    public static defaultOptions: HeartbeatOptions = { outgoingPeriod: 0, incomingPeriod: 0 };

    readonly options: HeartbeatOptions;
    readonly optionsString: string;

    incomingPeriod = 0;
    outgoingPeriod = 0;

    incomingTimer: StompTimerHandle | null = null;
    outgoingTimer: StompTimerHandle | null = null;

    private readonly timers: StompTimerService;
    private readonly margin: number;
    private running = false;

    constructor(
        private readonly frameLayer: StompFrameLayer,
        private readonly onTimeout: (error: StompError) => void,
        options: HeartbeatOptions = Heartbeat.defaultOptions,
        config: HeartbeatConfig = {}) {

        this.options = options;
        this.optionsString = formatHeartbeat(options);
        this.timers = config.timers || nodeTimers;
        this.margin = config.margin !== undefined ? config.margin : DEFAULT_HEARTBEAT_MARGIN;

        this.frameLayer.emitter.on("send", () => this.resetupOutgoingTimer());
        this.frameLayer.stream.emitter.on("data", () => this.resetupIncomingTimer());
        this.frameLayer.emitter.on("end", () => this.releaseTimers());
    }

    /**
     * Negotiates with the server's `heart-beat` header and arms the timers.
     */
    init(heartbeat: string | undefined) {
        const negotiated = negotiateHeartbeat(this.options, parseHeartbeat(heartbeat));
        this.outgoingPeriod = negotiated.outgoingPeriod;
        this.incomingPeriod = negotiated.incomingPeriod;
        log.debug("Heartbeat: negotiated outgoing %d ms, incoming %d ms", this.outgoingPeriod, this.incomingPeriod);
        this.running = true;
        this.resetupOutgoingTimer();
        this.resetupIncomingTimer();
    }

    private setupOutgoingTimer() {
        const period = this.outgoingPeriod;
        if (period > 0) {
            this.outgoingTimer = this.timers.schedule(period, () => this.onOutgoingTimer());
        }
    }

    private onOutgoingTimer() {
        this.outgoingTimer = null;
        this.frameLayer.sendHeartbeat().catch((err: unknown) => {
            log.debug("Heartbeat: error while sending heartbeat %O", err);
        });
        this.resetupOutgoingTimer();
    }

    resetupOutgoingTimer() {
        if (!this.running) {
            return;
        }
        this.releaseTimer(this.outgoingTimer);
        this.outgoingTimer = null;
        this.setupOutgoingTimer();
    }

    private setupIncomingTimer() {
        const period = this.incomingPeriod;
        if (period > 0) {
            this.incomingTimer = this.timers.schedule(period + this.margin, () => this.onIncomingTimer());
        }
    }

    private onIncomingTimer() {
        this.incomingTimer = null;
        const message = `No heartbeat for the last ${this.incomingPeriod}+${this.margin} ms`;
        log.debug("Heartbeat: %s", message);
        this.releaseTimers();
        this.onTimeout(new StompError(message));
    }

    resetupIncomingTimer() {
        if (!this.running) {
            return;
        }
        this.releaseTimer(this.incomingTimer);
        this.incomingTimer = null;
        this.setupIncomingTimer();
    }

    releaseTimer(timer: StompTimerHandle | null) {
        timer && this.timers.cancel(timer);
    }

    releaseTimers() {
        this.running = false;
        this.releaseTimer(this.incomingTimer);
        this.incomingTimer = null;
        this.releaseTimer(this.outgoingTimer);
        this.outgoingTimer = null;
    }

}
