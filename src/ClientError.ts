export interface ErrorMeta {
    /** HTTP status of the response that caused the error, if there was one */
    status?: number;
    /** underlying error */
    error?: unknown;
}

export class ClientError extends Error {
    constructor(public readonly code: string, public readonly msg: string, public readonly meta: ErrorMeta = {}) {
        super(msg);
        Object.setPrototypeOf(this, ClientError.prototype);
    }

    get name(): string {
        return 'ClientError';
    }
}

export enum ApiErrorCode {
    TRANSPORT = "transport",
    NOT_FOUND = "not_found",
    MALFORMED_RESPONSE = "malformed_response",
    REQUEST_FAILED = "request_failed"
}

export class ApiError extends ClientError {
    declare readonly code: ApiErrorCode;

    constructor(code: ApiErrorCode, msg: string, meta?: ErrorMeta) {
        super(code, msg, meta);
        Object.setPrototypeOf(this, ApiError.prototype);
    }

    get status(): number | undefined {
        return this.meta.status;
    }

    get name(): string {
        return 'ApiError';
    }
}

export enum TextureErrorCode {
    MISSING_TEXTURES = "missing_textures",
    DECODE_ERROR = "decode_error",
    MALFORMED_PAYLOAD = "malformed_payload"
}

export class TextureError extends ClientError {
    declare readonly code: TextureErrorCode;

    constructor(code: TextureErrorCode, msg: string, meta?: ErrorMeta) {
        super(code, msg, meta);
        Object.setPrototypeOf(this, TextureError.prototype);
    }

    get name(): string {
        return 'TextureError';
    }
}

export enum UsernameErrorCode {
    EMPTY = "empty",
    TOO_LONG = "too_long",
    INVALID_CHARACTER = "invalid_character"
}

export class UsernameError extends ClientError {
    declare readonly code: UsernameErrorCode;

    constructor(code: UsernameErrorCode, msg: string, public readonly character?: string) {
        super(code, msg);
        Object.setPrototypeOf(this, UsernameError.prototype);
    }

    get name(): string {
        return 'UsernameError';
    }
}
