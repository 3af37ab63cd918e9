/**
 * Base class for every failure that aborts a report run.
 */
export class ReportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ReportError';
    }
}

/**
 * Missing or unusable command-line input.
 */
export class InputError extends ReportError {
    constructor(message: string) {
        super(message);
        this.name = 'InputError';
    }
}

/**
 * Connectivity failure, timeout, or non-2xx response.
 * `status` is 0 when no HTTP response was received.
 */
export class NetworkError extends ReportError {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'NetworkError';
    }
}

/**
 * Response body that is not JSON or not in the expected shape.
 */
export class ParseError extends ReportError {
    constructor(
        message: string,
        public readonly url: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ParseError';
    }
}
