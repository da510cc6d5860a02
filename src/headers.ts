import { StompHeaders, StompError } from "./model";
import { log } from "./utils";

const EOL = '\n';

const escapes: { [char: string]: string } = {
    '\\': '\\\\',
    '\r': '\\r',
    '\n': '\\n',
    ':': '\\c'
};

const unescapes: { [char: string]: string } = {
    '\\': '\\',
    'r': '\r',
    'n': '\n',
    'c': ':'
};

export function escapeHeaderValue(value: string): string {
    return value.replace(/[\\\r\n:]/g, (char) => escapes[char]);
}

/**
 * Reverses {@link escapeHeaderValue}. Any other backslash sequence, a trailing
 * backslash included, is a protocol violation.
 */
export function unescapeHeaderValue(value: string): string {
    if (value.indexOf('\\') < 0) {
        return value;
    }
    return value.replace(/\\([\s\S]?)/g, (sequence: string, char: string) => {
        if (!Object.prototype.hasOwnProperty.call(unescapes, char)) {
            throw new StompError('Unsupported escape sequence', `Cannot decode '${sequence}' in '${value}'`);
        }
        return unescapes[char];
    });
}

/**
 * Stores `value` under `name` unless the name is already present.
 */
export function addHeader(headers: StompHeaders, name: string, value: string) {
    if (Object.prototype.hasOwnProperty.call(headers, name)) {
        return;
    }
    Object.defineProperty(headers, name, { value, enumerable: true, writable: true, configurable: true });
}

export function encodeHeaders(headers: StompHeaders): StompHeaders {
    const result: StompHeaders = {};
    for (const [name, value] of Object.entries(headers)) {
        addHeader(result, escapeHeaderValue(name), escapeHeaderValue(value));
    }
    return result;
}

export function decodeHeaders(headers: StompHeaders): StompHeaders {
    const result: StompHeaders = {};
    for (const [name, value] of Object.entries(headers)) {
        addHeader(result, unescapeHeaderValue(name), unescapeHeaderValue(value));
    }
    return result;
}

export function headersToString(headers: StompHeaders): string {
    return Object.entries(headers).map(([name, value]) => `${name}:${value}`).join(EOL);
}

/**
 * Parses a block of `name:value` lines. The first value of a repeated name
 * wins and lines without a colon are skipped.
 */
export function stringToHeaders(block: string): StompHeaders {
    const headers: StompHeaders = {};
    for (let line of block.split(EOL)) {
        if (line.endsWith('\r')) {
            line = line.slice(0, -1);
        }
        const index = line.indexOf(':');
        if (index < 0) {
            if (line.length > 0) {
                log.debug("StompHeaders: skipping malformed header line %j", line);
            }
            continue;
        }
        addHeader(headers, line.slice(0, index), line.slice(index + 1));
    }
    return headers;
}
