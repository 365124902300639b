// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
export { Capability } from './interfaces';
export type {
    User,
    Identity,
    Session,
    Cookie,
    CookieOptions,
} from './interfaces';
export { PalisadeError, ErrorCode, httpStatus } from './error';
export { PalisadeLogger, j } from './logger';
export type { PalisadeLoggerInterface, LogRecord, LogLevel } from './logger';
