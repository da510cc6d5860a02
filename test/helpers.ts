import { StompEventEmitter, StompError } from '../src/model';
import { StompStreamLayer, StompStreamEvents } from '../src/stream';
import { StompTimerService, StompTimerHandle } from '../src/timers';

export function check(f: () => void, done: (err?: unknown) => void) {
    try {
        f();
        done();
    } catch (e) {
        done(e);
    }
}

export function countdownLatch(count: number, done: (err?: unknown) => void) {
    return (e?: unknown) => {
        if (e instanceof Error) {
            done(e);
        } else if (--count <= 0) {
            done();
        }
    };
}

export const noopFn = () => { };

/**
 * In-memory stream layer: records what is written, and lets tests push
 * incoming bytes with {@link receive}.
 */
export class FakeStreamLayer implements StompStreamLayer {

    public readonly emitter = new StompEventEmitter<StompStreamEvents>();
    public readonly written: Buffer[] = [];
    public connectedTo: { host: string, port: number } | null = null;
    public closed = false;
    public destroyed = false;

    connect(host: string, port: number) {
        this.connectedTo = { host, port };
    }

    async send(data: Buffer) {
        if (this.closed || this.destroyed) {
            throw new StompError('Not connected');
        }
        this.written.push(data);
    }

    async close() {
        this.closed = true;
    }

    destroy() {
        this.destroyed = true;
    }

    receive(data: string | Buffer) {
        this.emitter.emit('data', typeof data === 'string' ? Buffer.from(data) : data);
    }

    get writtenText(): string[] {
        return this.written.map((data) => data.toString());
    }

}

interface ManualTimer {
    at: number;
    seq: number;
    callback: () => void;
}

/**
 * Timer service driven by {@link advance} instead of the wall clock.
 */
export class ManualTimers implements StompTimerService {

    public now = 0;
    private seq = 0;
    private readonly pending = new Map<StompTimerHandle, ManualTimer>();

    schedule(delay: number, callback: () => void): StompTimerHandle {
        const handle = {};
        this.pending.set(handle, { at: this.now + delay, seq: this.seq++, callback });
        return handle;
    }

    cancel(handle: StompTimerHandle) {
        this.pending.delete(handle);
    }

    get pendingCount() {
        return this.pending.size;
    }

    /** Delays of the pending timers relative to now, shortest first. */
    pendingDelays(): number[] {
        return Array.from(this.pending.values()).map((timer) => timer.at - this.now).sort((a, b) => a - b);
    }

    advance(ms: number) {
        const target = this.now + ms;
        let next = this.nextDue(target);
        while (next) {
            const [handle, timer] = next;
            this.pending.delete(handle);
            this.now = timer.at;
            timer.callback();
            next = this.nextDue(target);
        }
        this.now = target;
    }

    private nextDue(target: number): [StompTimerHandle, ManualTimer] | null {
        let due: [StompTimerHandle, ManualTimer] | null = null;
        for (const entry of this.pending) {
            const timer = entry[1];
            if (timer.at <= target && (!due || timer.at < due[1].at || (timer.at === due[1].at && timer.seq < due[1].seq))) {
                due = entry;
            }
        }
        return due;
    }

}
