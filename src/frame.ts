import { StompFrame, StompHeaders, StompEventEmitter, StompError, StompConfig, StompServerCommand } from "./model";
import { StompStreamLayer } from "./stream";
import { decodeHeaders, encodeHeaders, headersToString, stringToHeaders } from "./headers";
import { isServerCommand } from "./protocol";
import { log } from './utils';

enum StompFrameStatus {
    COMMAND = 0,
    HEADERS = 1,
    BODY = 2
}

export interface StompFrameEvents {
    frame: [frame: StompFrame];
    heartbeat: [];
    send: [data: Buffer];
    error: [error: StompError];
    end: [];
}

const LF = 0x0a;
const NULL = 0x00;
const EOL = '\n';
const NULL_BUFFER = Buffer.from([NULL]);
const HEARTBEAT = Buffer.from(EOL);

const acceptAllHeaders = (_headerName: string) => true;

/**
 * Serializes a frame. Only SEND carries a body, and CONNECT headers are
 * written without escaping.
 */
export function encodeFrame(frame: StompFrame, headerFilter: (headerName: string) => boolean = acceptAllHeaders): Buffer {
    const headers: StompHeaders = {};
    for (const [name, value] of Object.entries(frame.headers)) {
        if (headerFilter(name)) {
            headers[name] = value;
        }
    }
    const headerBlock = headersToString(frame.command === 'CONNECT' ? headers : encodeHeaders(headers));
    let head = frame.command + EOL;
    if (headerBlock.length > 0) {
        head += headerBlock + EOL;
    }
    head += EOL;
    const body = frame.command === 'SEND' ? frame.body : Buffer.alloc(0);
    return Buffer.concat([Buffer.from(head), body, NULL_BUFFER]);
}

export class StompFrameLayer {

    public readonly emitter = new StompEventEmitter<StompFrameEvents>();
    public maxBufferSize = 16 * 1024 * 1024;
    public headerFilter = acceptAllHeaders;
    private buffer: Buffer = Buffer.alloc(0);
    private status = StompFrameStatus.COMMAND;
    // null while skipping a frame whose command the client does not handle
    private command: StompServerCommand | null = null;
    private headerLines: string[] = [];
    private headers: StompHeaders = {};
    private decodeError: StompError | null = null;
    private contentLength = -1;

    constructor(public readonly stream: StompStreamLayer, options?: StompConfig) {
        stream.emitter.on('data', (data) => this.onData(data));
        stream.emitter.on('end', () => this.onEnd());
        if (options) {
            log.debug("StompFrameLayer: initializing with options %j", options);
            this.maxBufferSize = options.maxBufferSize || this.maxBufferSize;
            this.headerFilter = options.headersFilter || this.headerFilter;
        }
    }

    /**
     * Transmit a frame using the underlying stream layer. 'send' is emitted
     * once the stream accepted the bytes.
     */
    public async send(frame: StompFrame): Promise<Buffer> {
        const data = encodeFrame(frame, this.headerFilter);
        log.silly("StompFrameLayer: sending frame data %j", data.toString());
        await this.stream.send(data);
        this.emitter.emit('send', data);
        return data;
    }

    public async sendHeartbeat(): Promise<void> {
        log.silly("StompFrameLayer: sending heartbeat");
        await this.stream.send(HEARTBEAT);
    }

    /**
     * Closes the underlying stream layer.
     */
    public async close() {
        log.debug("StompFrameLayer: closing");
        await this.stream.close();
    }

    public destroy() {
        log.debug("StompFrameLayer: destroying");
        this.stream.destroy();
    }

    /**
     * Main entry point for frame parsing. It's a state machine that expects
     * the standard [ command - headers - body ] structure of a frame and
     * keeps its position between chunks.
     */
    private onData(data: Buffer) {
        this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, data]) : data;
        let progress = true;
        while (progress) {
            switch (this.status) {
                case StompFrameStatus.COMMAND:
                    progress = this.parseCommand();
                    break;
                case StompFrameStatus.HEADERS:
                    progress = this.parseHeaders();
                    break;
                case StompFrameStatus.BODY:
                    progress = this.parseBody();
                    break;
            }
        }
        if (this.buffer.length > this.maxBufferSize) {
            this.error(new StompError('Maximum buffer size exceeded.', `${this.buffer.length} bytes pending`));
            this.buffer = Buffer.alloc(0);
            this.destroy();
        }
    }

    private onEnd() {
        this.emitter.emit('end');
    }

    private parseCommand(): boolean {
        const line = this.popLine();
        if (line === null) {
            return false;
        }
        if (line.length === 0) {
            log.silly("StompFrameLayer: received heartbeat");
            this.emitter.emit('heartbeat');
            return true;
        }
        if (isServerCommand(line)) {
            this.command = line;
        } else {
            log.debug("StompFrameLayer: discarding frame with unsupported command %j", line);
            this.command = null;
        }
        this.headerLines = [];
        this.status = StompFrameStatus.HEADERS;
        return true;
    }

    private parseHeaders(): boolean {
        let line = this.popLine();
        while (line !== null) {
            if (line.length === 0) {
                this.onHeadersComplete();
                this.status = StompFrameStatus.BODY;
                return true;
            }
            this.headerLines.push(line);
            line = this.popLine();
        }
        return false;
    }

    /**
     * The body length has to be known before anything else is parsed, so
     * content-length is read from the raw header block.
     */
    private onHeadersComplete() {
        const rawHeaders = stringToHeaders(this.headerLines.join(EOL));
        this.contentLength = parseContentLength(rawHeaders['content-length']);
        try {
            this.headers = decodeHeaders(rawHeaders);
            this.decodeError = null;
        } catch (err) {
            this.headers = rawHeaders;
            this.decodeError = err instanceof StompError ? err : new StompError('Error decoding headers', String(err));
        }
    }

    /**
     * Parse frame body, using the content-length header when present and the
     * null char otherwise.
     */
    private parseBody(): boolean {
        let body: Buffer;
        if (this.contentLength > -1) {
            // one byte past the body is needed to tell whether the null char follows
            if (this.buffer.length <= this.contentLength) {
                return false;
            }
            body = this.buffer.subarray(0, this.contentLength);
            this.buffer = this.buffer.subarray(this.contentLength);
            if (this.buffer[0] === NULL) {
                this.buffer = this.buffer.subarray(1);
            }
        } else {
            const index = this.buffer.indexOf(NULL);
            if (index < 0) {
                return false;
            }
            body = this.buffer.subarray(0, index);
            this.buffer = this.buffer.subarray(index + 1);
        }
        this.status = StompFrameStatus.COMMAND;
        this.emitFrame(body);
        return true;
    }

    private emitFrame(body: Buffer) {
        const command = this.command;
        if (command === null) {
            return;
        }
        if (this.decodeError) {
            this.error(new StompError(this.decodeError.message, `${command} frame dropped: ${this.decodeError.details}`));
            return;
        }
        const frame = new StompFrame(command, this.headers, body);
        log.silly("StompFrameLayer: received frame %s", frame.toString());
        this.emitter.emit('frame', frame);
    }

    /**
     * Pops the next line from the buffer, without its line terminator.
     * @return null when no complete line is buffered yet
     */
    private popLine(): string | null {
        const index = this.buffer.indexOf(LF);
        if (index < 0) {
            return null;
        }
        const end = index > 0 && this.buffer[index - 1] === 0x0d ? index - 1 : index;
        const line = this.buffer.toString('utf8', 0, end);
        this.buffer = this.buffer.subarray(index + 1);
        return line;
    }

    private error(error: StompError) {
        log.debug("StompFrameLayer: stomp error %O", error);
        this.emitter.emit('error', error);
    }

}

function parseContentLength(value: string | undefined): number {
    if (value === undefined) {
        return -1;
    }
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        log.debug("StompFrameLayer: ignoring invalid content-length %j", value);
        return -1;
    }
    return parseInt(trimmed, 10);
}
