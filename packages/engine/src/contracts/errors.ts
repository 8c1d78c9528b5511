/**
 * Error taxonomy for the receiver.
 *
 * Only StartError crosses the engine boundary. The others are logged and
 * absorbed so one bad datagram never affects the next.
 */

export type ReceiverErrorCode =
    | "DECODE_ERROR"
    | "VALIDATION_ERROR"
    | "START_ERROR"
    | "RECEIVE_ERROR";

/**
 * Base class for all receiver errors.
 */
export class ReceiverError extends Error {
    readonly code: ReceiverErrorCode;

    constructor(code: ReceiverErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Datagram bytes are not UTF-8 JSON (or exceed the buffer size).
 */
export class DecodeError extends ReceiverError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("DECODE_ERROR", message, options);
    }
}

/**
 * JSON parsed but the message lacks a usable entity_id.
 */
export class ValidationError extends ReceiverError {
    constructor(message: string) {
        super("VALIDATION_ERROR", message);
    }
}

/**
 * The socket could not be bound. Fatal to the start attempt.
 */
export class StartError extends ReceiverError {
    readonly port: number;

    constructor(port: number, options?: { cause?: unknown }) {
        const reason = options?.cause === undefined ? "" : `: ${describeError(options.cause)}`;
        super("START_ERROR", `Failed to bind UDP port ${port}${reason}`, options);
        this.port = port;
    }
}

/**
 * Transient socket failure while receiving.
 */
export class ReceiveError extends ReceiverError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("RECEIVE_ERROR", message, options);
    }
}

/**
 * Render any thrown value as a log-friendly message.
 *
 * @param error - The caught value
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
