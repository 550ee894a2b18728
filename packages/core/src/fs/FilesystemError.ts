/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { HierfsError } from "../HierfsError.js";
import { asError } from "../util/Error.js";

/**
 * Base error for filesystem operations.
 */
export class FilesystemError extends HierfsError {}

/**
 * Thrown when a path or name is empty or malformed where a non-empty terminal segment is required.
 */
export class InvalidPathError extends FilesystemError {}

/**
 * Backend I/O failure.  Raised synchronously by mutating operations or deferred to iteration for enumeration.
 */
export class IOError extends FilesystemError {
    /**
     * Wrap an arbitrary failure.  Filesystem errors pass through unchanged.
     */
    static of(cause: unknown, message: string): FilesystemError {
        if (cause instanceof FilesystemError) {
            return cause;
        }
        const error = asError(cause);
        return new IOError(`${message}: ${error.message}`, { cause: error });
    }
}

/**
 * Thrown when a file or folder is not found.
 */
export class FileNotFoundError extends IOError {}

/**
 * Thrown when an operation is not valid for the entry type (e.g. reading bytes from a folder).
 */
export class FileTypeError extends IOError {}

/**
 * Thrown when a copy or move target is the source, lies inside the source or contains it.
 */
export class SelfContainmentError extends FilesystemError {}

/**
 * Thrown when a backend does not support an optional capability.
 */
export class UnsupportedOperationError extends FilesystemError {}
