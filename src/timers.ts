import { setTimeout, clearTimeout } from "timers";

export type StompTimerHandle = object;

/**
 * One-shot timer scheduling used by the heartbeat monitor and the connect timeout.
 */
export interface StompTimerService {

    schedule(delay: number, callback: () => void): StompTimerHandle;

    cancel(handle: StompTimerHandle): void;

}

// setTimeout fires at once for delays above this
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

class NodeTimerHandle {
    constructor(readonly timeout: NodeJS.Timeout) { }
}

export const nodeTimers: StompTimerService = {

    schedule(delay: number, callback: () => void): StompTimerHandle {
        return new NodeTimerHandle(setTimeout(callback, Math.min(delay, MAX_TIMER_DELAY)));
    },

    cancel(handle: StompTimerHandle) {
        if (handle instanceof NodeTimerHandle) {
            clearTimeout(handle.timeout);
        }
    }

};
