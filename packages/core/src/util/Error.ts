/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Ensure a thrown value is an {@link Error}.
 */
export function asError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(typeof value === "string" ? value : String(value));
}

/**
 * Extract the Node.js-style error code from an arbitrary thrown value.
 */
export function errorCodeOf(value: unknown): string | undefined {
    if (typeof value === "object" && value !== null && "code" in value && typeof value.code === "string") {
        return value.code;
    }
}
