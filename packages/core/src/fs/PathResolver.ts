/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { File } from "./File.js";
import { InvalidPathError } from "./FilesystemError.js";
import type { Folder } from "./Folder.js";

/**
 * Turns "/"-separated paths into chains of {@link Folder.folder} and {@link Folder.file} lookups.
 *
 * Resolution performs no I/O; the returned handle may not exist.  Empty segments and "." are dropped, so leading,
 * trailing and duplicate slashes have no effect and a leading slash does not mean the filesystem root.  ".." steps
 * to the parent folder unless the filesystem treats it as a literal name (see {@link Filesystem.Options}).
 */
export namespace PathResolver {
    export const PARENT = "..";

    export function segmentsOf(path: string) {
        return path.split("/").filter(segment => segment !== "" && segment !== ".");
    }

    export function resolveFolder(start: Folder, path: string): Folder {
        let folder = start;
        for (const segment of segmentsOf(path)) {
            folder = step(folder, segment);
        }
        return folder;
    }

    export function resolveFile(start: Folder, path: string): File {
        const segments = segmentsOf(path);
        const name = segments.pop();
        if (name === undefined) {
            throw new InvalidPathError(`Path "${path}" does not name a file`);
        }
        if (name === PARENT && resolvesParents(start)) {
            throw new InvalidPathError(`Path "${path}" ends in a parent reference and does not name a file`);
        }

        let folder = start;
        for (const segment of segments) {
            folder = step(folder, segment);
        }
        return folder.file(name);
    }

    function step(folder: Folder, segment: string) {
        if (segment !== PARENT || !resolvesParents(folder)) {
            return folder.folder(segment);
        }

        const parent = folder.parent;
        if (parent === undefined) {
            throw new InvalidPathError(`Path leads above the root of the filesystem`);
        }
        return parent;
    }

    function resolvesParents(folder: Folder) {
        return folder.fs.options.parentSegments === "resolve";
    }
}
