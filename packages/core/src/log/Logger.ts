/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { VariableService } from "../environment/VariableService.js";
import { LogLevel } from "./LogLevel.js";

/**
 * Facility logger.
 *
 * Obtain one per module:
 *
 *     const logger = Logger.get("Copier");
 *     logger.debug("Copying", source, "to", target);
 *
 * Output is filtered by the global {@link Logger.level} and written to {@link Logger.destination}.
 */
export class Logger {
    static level = LogLevel.INFO;
    static destination: Logger.Destination = Logger.consoleDestination;

    readonly #facility: string;

    constructor(facility: string) {
        this.#facility = facility;
    }

    static get(facility: string) {
        return new Logger(facility);
    }

    /**
     * Apply `log.level` from configuration.
     */
    static configure(vars: VariableService) {
        const level = vars.string("log.level");
        if (level !== undefined) {
            Logger.level = LogLevel.parse(level);
        }
    }

    get facility() {
        return this.#facility;
    }

    debug(...values: unknown[]) {
        this.log(LogLevel.DEBUG, values);
    }

    info(...values: unknown[]) {
        this.log(LogLevel.INFO, values);
    }

    notice(...values: unknown[]) {
        this.log(LogLevel.NOTICE, values);
    }

    warn(...values: unknown[]) {
        this.log(LogLevel.WARN, values);
    }

    error(...values: unknown[]) {
        this.log(LogLevel.ERROR, values);
    }

    fatal(...values: unknown[]) {
        this.log(LogLevel.FATAL, values);
    }

    log(level: LogLevel, values: unknown[]) {
        if (level < Logger.level) {
            return;
        }

        Logger.destination({
            level,
            facility: this.#facility,
            now: new Date(),
            message: values.map(Logger.render).join(" "),
        });
    }

    /**
     * Convert a logged value to text.  Errors render as "Name: message".
     */
    static render(value: unknown): string {
        if (value instanceof Error) {
            return `${value.name}: ${value.message}`;
        }
        return String(value);
    }

    static format({ level, facility, now, message }: Logger.Entry) {
        return `${now.toISOString()} ${LogLevel.nameOf(level).padEnd(6)} ${facility} ${message}`;
    }

    static consoleDestination(entry: Logger.Entry) {
        const line = Logger.format(entry);
        if (entry.level >= LogLevel.ERROR) {
            console.error(line);
        } else if (entry.level >= LogLevel.WARN) {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}

export namespace Logger {
    export interface Entry {
        level: LogLevel;
        facility: string;
        now: Date;
        message: string;
    }

    export type Destination = (entry: Entry) => void;
}
