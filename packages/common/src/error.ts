// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
/**
 * Indicates the type of error reported by {@link PalisadeError}
 */
export enum ErrorCode {

    /** Thrown by credential storage when a username does not exist.
     * Never leaves the session manager: converted to `InvalidCredentials` */
    UserNotExist = 0,

    /** Thrown when a password does not match.
     * Never leaves the session manager: converted to `InvalidCredentials` */
    PasswordInvalid,

    /** Returned by login instead of UserNotExist or PasswordInvalid so that
     * callers cannot tell which of the two was wrong */
    InvalidCredentials,

    /** A session id was presented that is not in session storage */
    SessionNotFound,

    /** A session id was presented for a session past its idle or absolute expiry */
    SessionExpired,

    /** The CSRF token on a state-changing request is missing or wrong */
    CsrfValidationFailed,

    /** The caller is authenticated but lacks the capability the resource needs */
    Unauthorized,

    /** The resource needs an authenticated caller and there is none */
    Forbidden,

    /** A key or cookie value is malformed or its signature does not verify */
    InvalidKey,

    /** Thrown if you try to create a key which already exists in key storage */
    KeyExists,

    /** Thrown when a hash, eg password, is not in the given format */
    InvalidHash,

    /** Thrown when an algorithm is requested but not supported, eg hashing algorithm */
    UnsupportedAlgorithm,

    /** Thrown when something is missing or inconsistent in configuration */
    Configuration,

    /** Thrown when there is a connection error, eg to a database */
    Connection,

    /** The request body or parameters are invalid */
    BadRequest,

    /** The request body is larger than the endpoint accepts */
    PayloadTooLarge,

    /** The request body has a content type the endpoint does not accept */
    UnsupportedMediaType,

    /** The requested resource does not exist */
    NotFound,

    /** Thrown for an condition not convered above. */
    UnknownError,
}

const defaults : {[code in ErrorCode]: {message: string, httpStatus: number}} = {
    [ErrorCode.UserNotExist]: {message: "User does not exist", httpStatus: 401},
    [ErrorCode.PasswordInvalid]: {message: "Password doesn't match", httpStatus: 401},
    [ErrorCode.InvalidCredentials]: {message: "Invalid username or password", httpStatus: 401},
    [ErrorCode.SessionNotFound]: {message: "Session not found", httpStatus: 401},
    [ErrorCode.SessionExpired]: {message: "Session has expired", httpStatus: 401},
    [ErrorCode.CsrfValidationFailed]: {message: "CSRF token is invalid", httpStatus: 403},
    [ErrorCode.Unauthorized]: {message: "You do not have permission to access this resource", httpStatus: 403},
    [ErrorCode.Forbidden]: {message: "You must be logged in to access this resource", httpStatus: 401},
    [ErrorCode.InvalidKey]: {message: "Key is invalid", httpStatus: 401},
    [ErrorCode.KeyExists]: {message: "Attempt to create a key that already exists", httpStatus: 500},
    [ErrorCode.InvalidHash]: {message: "Hash is not in a valid format", httpStatus: 500},
    [ErrorCode.UnsupportedAlgorithm]: {message: "Algorithm not supported", httpStatus: 500},
    [ErrorCode.Configuration]: {message: "There was an error in the configuration", httpStatus: 500},
    [ErrorCode.Connection]: {message: "Connection failure", httpStatus: 500},
    [ErrorCode.BadRequest]: {message: "The request is invalid", httpStatus: 400},
    [ErrorCode.PayloadTooLarge]: {message: "The request body is too large", httpStatus: 413},
    [ErrorCode.UnsupportedMediaType]: {message: "Content type is not supported", httpStatus: 415},
    [ErrorCode.NotFound]: {message: "Not found", httpStatus: 404},
    [ErrorCode.UnknownError]: {message: "Unknown error", httpStatus: 500},
};

/**
 * Thrown by Palisade functions whenever it encounters an error.
 */
export class PalisadeError extends Error {

    /** `typeof` won't work on this class.  To determine if the
     * object is a `PalisadeError`, check for presence of this member.
     */
    readonly isPalisadeError = true;

    /** The best HTTP status to report */
    readonly httpStatus: number;

    readonly code : ErrorCode;

    /** The name of `code` in the {@link ErrorCode} enum, eg `CsrfValidationFailed` */
    readonly codeName : string;

    /** A vector of error messages.  If there was only one, it will still be in this array.
     * The inherited property `message` is also always available.  If there were multiple messages,
     * it will be a concatenation of them with `". "` in between.
     */
    readonly messages : string[];

    /**
     * Creates a new error to throw,
     *
     * @param code describes the type of error
     * @param message if provided, this error will display.  Otherwise a default one for the error code will be used.
     */
    constructor(code : ErrorCode, message? : string | string[]) {
        let _message = defaults[code].message;
        if (Array.isArray(message)) _message = message.join(". ");
        else if (message != undefined) _message = message;
        super(_message);
        this.code = code;
        this.codeName = ErrorCode[code];
        this.httpStatus = defaults[code].httpStatus;
        this.name = 'PalisadeError';
        this.messages = Array.isArray(message) ? message : [_message];
        Object.setPrototypeOf(this, PalisadeError.prototype);
    }

    /**
     * The code name in upper snake case, eg `CSRF_VALIDATION_FAILED`.
     * This is what is sent to clients in JSON error responses.
     */
    get classification() : string {
        return this.codeName.replace(/([a-z])([A-Z])/g, "$1_$2").toUpperCase();
    }

    /**
     * If the passed object is a `PalisadeError` instance, simply returns
     * it.
     * Otherwise creates a `PalisadeError` object with {@link ErrorCode}
     * of `UnknownError` from it, setting the `message` if possible.
     *
     * @param e the error to convert.
     * @param defaultMessage used when `e` carries no message
     * @returns  a `PalisadeError` instance.
     */
    static asPalisadeError(e: unknown, defaultMessage? : string) : PalisadeError {
        if (e instanceof PalisadeError) return e;
        if (e instanceof Error) {
            return new PalisadeError(ErrorCode.UnknownError, e.message || defaultMessage);
        }
        if (typeof e == "string") return new PalisadeError(ErrorCode.UnknownError, e);
        if (typeof e == "object" && e != null && "message" in e && typeof e.message == "string") {
            return new PalisadeError(ErrorCode.UnknownError, e.message);
        }
        return new PalisadeError(ErrorCode.UnknownError, defaultMessage);
    }
}

/**
 * Returns the friendly name for an HTTP response code.
 *
 * If it is not a recognized one, returns the friendly name for 500.
 * @param status the HTTP response code, which, while being numeric,
 *        can be in a string or number.
 * @returns the string version of the response code.
 */
export function httpStatus(status: string|number) : string {
    if (typeof status == "number") status = ""+status;
    return FriendlyHttpStatus[status] ?? FriendlyHttpStatus['500'];
}

/**
 * Name for a numeric response code, as defined by the HTTP specification.
 */
const FriendlyHttpStatus : {[key:string]:string} = {
    '200': 'OK',
    '201': 'Created',
    '204': 'No Content',
    '301': 'Moved Permanently',
    '302': 'Found',
    '303': 'See Other',
    '304': 'Not Modified',
    '307': 'Temporary Redirect',
    '400': 'Bad Request',
    '401': 'Unauthorized',
    '403': 'Forbidden',
    '404': 'Not Found',
    '405': 'Method Not Allowed',
    '406': 'Not Acceptable',
    '408': 'Request Timeout',
    '409': 'Conflict',
    '411': 'Length Required',
    '413': 'Payload Too Large',
    '415': 'Unsupported Media Type',
    '429': 'Too Many Requests',
    '500': 'Internal Server Error',
    '501': 'Not Implemented',
    '502': 'Bad Gateway',
    '503': 'Service Unavailable',
    '504': 'Gateway Timeout',
};
