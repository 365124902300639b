// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
import { PalisadeError } from "./error";

/** A structured log record.  `msg` is always present once it has passed through {@link j} */
export type LogRecord = {[key:string]: unknown};

export interface PalisadeLoggerInterface {
    error(output: LogRecord|string) : void;
    warn(output: LogRecord|string) : void;
    info(output: LogRecord|string) : void;
    debug(output: LogRecord|string) : void;
}

export type LogLevel = 0 | 1 | 2 | 3 | 4;

/**
 *
 * A very simple logging class with no dependencies.
 *
 * Logs to console.
 *
 * The logging API is designed so that you can replace this with other common loggers, eg Pino.
 * To change it, use {@link PalisadeLogger.setLogger}.  This has a parameter to tell
 * Palisade whether your logger accepts JSON input or not.
 *
 * When writing logs, we use the helper function {@link j} to send JSON to the logger if it is
 * supprted, and a stringified JSON otherwise.
 *
 * The following fields may be present depending on context (`msg` is always present):
 *
 * - `msg` : main contents of the log
 * - `err` : an error object, with at least `message` and `stack`
 * - `errorCode`, `errorCodeName`, `httpStatus` : expanded from a {@link PalisadeError} passed as `cerr`
 * - `hashedSessionId` : session ids are never logged.  A hash is logged instead
 *                       so that errors from one session can be correlated.
 * - `hashedCsrfToken` : likewise for CSRF tokens
 * - `user` : username
 * - `method`, `url`, `ip` : the request being handled
 * - `port` : port the service is running on (only for starting a service)
 */
export class PalisadeLogger {

    /** Don't log anything */
    static readonly None = 0;

    /** Only log errors */
    static readonly Error = 1;

    /** Log errors and warning */
    static readonly Warn = 2;

    /** Log errors, warnings and info messages */
    static readonly Info = 3;

    /** Log everything */
    static readonly Debug = 4;

    static readonly levelName = ["NONE", "ERROR", "WARN", "INFO", "DEBUG"];

    /**
     * Return the process-wide logger.
     * @returns the logger
     */
    static get logger() : PalisadeLoggerInterface {
        return globalThis.palisadeLogger;
    }

    /** the log level. This can be set dynamically */
    level : LogLevel;

    /**
     * Create a logger with the given level.  If none is given, it is
     * taken from `PALISADE_LOG_LEVEL`, defaulting to `ERROR`.
     * @param level the level to report to
     */
    constructor(level?: LogLevel) {
        this.level = level ?? PalisadeLogger.levelFromName(process.env["PALISADE_LOG_LEVEL"]);
    }

    /**
     * Converts a level name such as `"debug"` to its number.
     * Unrecognised or missing names give `Error`.
     */
    static levelFromName(name : string|undefined) : LogLevel {
        switch ((name ?? "").toUpperCase()) {
            case "NONE": return PalisadeLogger.None;
            case "WARN": return PalisadeLogger.Warn;
            case "INFO": return PalisadeLogger.Info;
            case "DEBUG": return PalisadeLogger.Debug;
            default: return PalisadeLogger.Error;
        }
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    private log(level: LogLevel, output: LogRecord|string) {
        if (level > this.level) return;
        if (typeof output == "string") {
            console.log("Palisade " + PalisadeLogger.levelName[level] + " " + new Date().toISOString(), output);
        } else {
            console.log(JSON.stringify({level: PalisadeLogger.levelName[level], time: new Date().toISOString(), ...output}));
        }
    }

    error(output: LogRecord|string) {
        this.log(PalisadeLogger.Error, output);
    }

    warn(output: LogRecord|string) {
        this.log(PalisadeLogger.Warn, output);
    }

    info(output: LogRecord|string) {
        this.log(PalisadeLogger.Info, output);
    }

    debug(output: LogRecord|string) {
        this.log(PalisadeLogger.Debug, output);
    }

    /**
     * Override the default logger.
     *
     * The only requirement is that the logger has the functions `error()`, `warn()`, `info()` and `debug()`.
     * These functions must accept either an object or a string.  If they can only accept a string,
     * set `acceptsJson` to false.
     *
     * @param logger a new logger instance of any supported class
     * @param acceptsJson set this to false if the logger can only take strings.
     */
    static setLogger(logger : PalisadeLoggerInterface, acceptsJson : boolean) {
        globalThis.palisadeLogger = logger;
        globalThis.palisadeLoggerAcceptsJson = acceptsJson;
    }
}

/**
 * Normalises a log record before it is passed to the logger.
 *
 * An `err` gets its message copied to `msg` and its stack preserved.  A
 * `cerr` is expanded into `errorCode`, `errorCodeName` and `httpStatus`.
 * If the installed logger does not accept objects, the result is stringified.
 */
export function j(arg : LogRecord|string) : LogRecord|string {
    if (typeof arg == "string") return arg;
    const record : LogRecord = {...arg};
    const err = record.err;
    if (err instanceof Error) {
        record.err = {name: err.name, message: err.message, stack: err.stack};
        if (!("msg" in record)) record.msg = err.message;
    } else if ("err" in record && !("msg" in record)) {
        record.msg = "An unknown error occurred";
    }
    const cerr = record.cerr;
    if (cerr instanceof PalisadeError) {
        record.errorCode = cerr.code;
        record.errorCodeName = cerr.codeName;
        record.httpStatus = cerr.httpStatus;
        if (!("msg" in record)) record.msg = cerr.message;
        delete record.cerr;
    }
    return globalThis.palisadeLoggerAcceptsJson ? record : JSON.stringify(record);
}

declare global {
    var palisadeLogger : PalisadeLoggerInterface;
    var palisadeLoggerAcceptsJson : boolean;
}

globalThis.palisadeLogger = new PalisadeLogger(PalisadeLogger.None);
globalThis.palisadeLoggerAcceptsJson = true;
