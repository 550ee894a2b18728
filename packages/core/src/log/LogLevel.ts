/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError } from "../HierfsError.js";

/**
 * Logging severity, lowest first.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    NOTICE = 2,
    WARN = 3,
    ERROR = 4,
    FATAL = 5,
}

export namespace LogLevel {
    /**
     * Parse a level by name (case-insensitive) or numeric value.
     */
    export function parse(value: string | number): LogLevel {
        if (typeof value === "number" || /^\d+$/.test(value)) {
            const numeric = Number(value);
            if (numeric >= LogLevel.DEBUG && numeric <= LogLevel.FATAL) {
                return numeric;
            }
            throw new ConfigurationError(`Log level ${value} is out of range`);
        }

        switch (value.toUpperCase()) {
            case "DEBUG":
                return LogLevel.DEBUG;
            case "INFO":
                return LogLevel.INFO;
            case "NOTICE":
                return LogLevel.NOTICE;
            case "WARN":
                return LogLevel.WARN;
            case "ERROR":
                return LogLevel.ERROR;
            case "FATAL":
                return LogLevel.FATAL;
        }

        throw new ConfigurationError(`Unknown log level "${value}"`);
    }

    export function nameOf(level: LogLevel) {
        return LogLevel[level];
    }
}
