/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Base class for all errors raised by this library.
 *
 * The error name is taken from the concrete class so subclasses need not set it.
 */
export class HierfsError extends Error {
    constructor(message?: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Thrown when a configuration value cannot be interpreted.
 */
export class ConfigurationError extends HierfsError {}
