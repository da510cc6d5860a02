import { randomUUID } from 'crypto';

export type LoggerFunction = (message: string, ...args: unknown[]) => unknown;

const logLevels: Array<keyof StompProtocolLoggingListeners> = ['error', 'warn', 'info', 'debug', 'silly'];
export interface StompProtocolLoggingListeners {

    readonly error: LoggerFunction;
    readonly warn: LoggerFunction;
    readonly info: LoggerFunction;
    readonly debug: LoggerFunction;
    readonly silly: LoggerFunction;

}

type MutableLoggingListeners = { -readonly [K in keyof StompProtocolLoggingListeners]: LoggerFunction };

const loggingListeners: MutableLoggingListeners = {
    error: noop,
    warn: noop,
    info: noop,
    debug: noop,
    silly: noop
};

/**
 * Routes the library's log output to the given listeners, one per level.
 * Until this is called every level is a no-op.
 */
export function setLoggingListeners(listeners: StompProtocolLoggingListeners) {
    for (let level of logLevels) {
        loggingListeners[level] = (message: string, ...args: unknown[]) => {
            try {
                return listeners[level](message, ...args);
            } catch (e) {
                // a broken logger must not break the protocol engine
                return undefined;
            }
        };
    }
}

export function resetLoggingListeners() {
    for (let level of logLevels) {
        loggingListeners[level] = noop;
    }
}

export const counter = (i = 0) => () => (i++).toString();

export const randomId = () => randomUUID();

function noop(): void { }

export const log: StompProtocolLoggingListeners = loggingListeners;
