import { openStream } from './stream';
import { StompClientSessionLayer } from './session';
import { StompFrameLayer } from './frame';
import { StompConfig } from './model';

export { StompClientSessionLayer, StompConnectionState, DEFAULT_STOMP_PORT } from './session';
export type { StompClientEvents } from './session';
export { StompFrameLayer, encodeFrame } from './frame';
export type { StompFrameEvents } from './frame';
export {
    escapeHeaderValue, unescapeHeaderValue, encodeHeaders, decodeHeaders, headersToString, stringToHeaders
} from './headers';
export { Heartbeat, negotiateHeartbeat, parseHeartbeat, formatHeartbeat, DEFAULT_HEARTBEAT_MARGIN } from './heartbeat';
export type { HeartbeatOptions } from './heartbeat';
export { StompSubscriptionRegistry } from './subscriptions';
export type { StompSubscription } from './subscriptions';
export { openStream, StompSocketStreamLayer, StompWebSocketStreamLayer } from './stream';
export type { StompStreamLayer, StompStreamEvents, StompStreamOptions } from './stream';
export { nodeTimers } from './timers';
export type { StompTimerService, StompTimerHandle } from './timers';
export { StompProtocolHandlerV12 } from './protocol';
export * from './model';
export { setLoggingListeners, resetLoggingListeners } from './utils';
export type { LoggerFunction, StompProtocolLoggingListeners } from './utils';

/**
 * Wires a transport, a frame layer and a session together. Call
 * `connect(host, port, heartbeat)` on the result once listeners are registered.
 */
export function createStompClientSession(config: StompConfig = {}): StompClientSessionLayer {
    const streamLayer = openStream({ transport: config.transport, wsPath: config.wsPath });
    const frameLayer = new StompFrameLayer(streamLayer, config);
    return new StompClientSessionLayer(frameLayer, config);
}
