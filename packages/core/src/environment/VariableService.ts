/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError } from "../HierfsError.js";

/**
 * Access to configuration variables.
 *
 * Variables use dotted names.  Each maps to an environment variable with the {@link VariableService.PREFIX} prefix,
 * upper-cased with dots replaced by underscores, so `log.level` is read from `HIERFS_LOG_LEVEL`.
 *
 * Values passed to the constructor as overrides take precedence over the environment.
 */
export class VariableService {
    static readonly PREFIX = "HIERFS";

    readonly #env: Record<string, string | undefined>;
    readonly #overrides: Map<string, string>;

    constructor(env: Record<string, string | undefined> = process.env, overrides: Record<string, string> = {}) {
        this.#env = env;
        this.#overrides = new Map(Object.entries(overrides));
    }

    static envNameOf(name: string) {
        return `${VariableService.PREFIX}_${name.replace(/\./g, "_").toUpperCase()}`;
    }

    get(name: string): string | undefined {
        return this.#overrides.get(name) ?? this.#env[VariableService.envNameOf(name)];
    }

    set(name: string, value: string) {
        this.#overrides.set(name, value);
    }

    string(name: string): string | undefined;
    string(name: string, fallback: string): string;
    string(name: string, fallback?: string) {
        const value = this.get(name);
        if (value === undefined || value === "") {
            return fallback;
        }
        return value;
    }

    boolean(name: string): boolean | undefined;
    boolean(name: string, fallback: boolean): boolean;
    boolean(name: string, fallback?: boolean) {
        const value = this.string(name);
        if (value === undefined) {
            return fallback;
        }
        switch (value.toLowerCase()) {
            case "1":
            case "true":
            case "yes":
            case "on":
                return true;

            case "0":
            case "false":
            case "no":
            case "off":
                return false;
        }
        throw new ConfigurationError(`Variable ${name} is not a boolean: "${value}"`);
    }

    integer(name: string): number | undefined;
    integer(name: string, fallback: number): number;
    integer(name: string, fallback?: number) {
        const value = this.string(name);
        if (value === undefined) {
            return fallback;
        }
        if (!/^-?\d+$/.test(value)) {
            throw new ConfigurationError(`Variable ${name} is not an integer: "${value}"`);
        }
        return Number.parseInt(value, 10);
    }

    /**
     * Read a variable that must be one of a fixed set of values.
     */
    enum<const T extends string>(name: string, values: readonly T[], fallback: T): T {
        const value = this.string(name);
        if (value === undefined) {
            return fallback;
        }
        const match = values.find(candidate => candidate === value);
        if (match === undefined) {
            throw new ConfigurationError(`Variable ${name} must be one of ${values.join(", ")}, got "${value}"`);
        }
        return match;
    }
}
