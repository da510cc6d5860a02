import { StompFrame, StompHeaders, StompServerCommand } from './model';
import { StompValidator, requireHeader, requireAllHeaders } from './validators';
import { log } from './utils';

/**
 * Receives the broker frames once they passed validation.
 */
export interface StompServerCommandListener {

    connected(headers: StompHeaders): void;

    message(headers: StompHeaders, body: Buffer): void;
    receipt(headers: StompHeaders): void;
    error(headers: StompHeaders, body: Buffer): void;

}

export type StompCommandHandler = {
    validators: StompValidator[],
    handle: (frame: StompFrame, listener: StompServerCommandListener) => void
}

export type StompCommands = { [C in StompServerCommand]: StompCommandHandler };

export type StompProtocolHandler = {
    version: string,
    server: StompCommands // Server to client
}

export const StompProtocolHandlerV12: StompProtocolHandler = {
    version: '1.2',
    server: {
        CONNECTED: {
            validators: [requireHeader('version')],
            handle(frame: StompFrame, listener: StompServerCommandListener) {
                log.debug("StompProtocolHandler: connected %j", frame.headers);
                listener.connected(frame.headers);
            }
        },
        MESSAGE: {
            validators: [requireAllHeaders('destination', 'message-id', 'subscription')],
            handle(frame: StompFrame, listener: StompServerCommandListener) {
                log.silly("StompProtocolHandler: received message %s", frame.toString());
                listener.message(frame.headers, frame.body);
            }
        },
        RECEIPT: {
            validators: [requireHeader('receipt-id')],
            handle(frame: StompFrame, listener: StompServerCommandListener) {
                log.silly("StompProtocolHandler: received receipt %j", frame.headers);
                listener.receipt(frame.headers);
            }
        },
        ERROR: {
            validators: [],
            handle(frame: StompFrame, listener: StompServerCommandListener) {
                log.debug("StompProtocolHandler: received error %s", frame.toString());
                listener.error(frame.headers, frame.body);
            }
        }
    }
};

export function isServerCommand(command: string): command is StompServerCommand {
    return Object.prototype.hasOwnProperty.call(StompProtocolHandlerV12.server, command);
}
