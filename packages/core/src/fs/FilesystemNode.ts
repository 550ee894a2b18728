/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Filesystem } from "./Filesystem.js";
import { UnsupportedOperationError } from "./FilesystemError.js";
import type { Folder } from "./Folder.js";

/**
 * Base class for filesystem entries (files and folders).
 *
 * A node is a handle.  The underlying entry need not exist, and a handle stays usable after its entry is deleted.
 *
 * Identity is path-based: backends may hand out fresh handles for the same location, so compare with
 * {@link equals} rather than `===`.
 */
export abstract class FilesystemNode {
    abstract readonly kind: "file" | "folder";
    abstract readonly name: string;

    /**
     * The containing folder, or undefined for a root.
     *
     * Backends construct the parent on demand from the node's location so children never hold their parent.
     */
    abstract readonly parent: Folder | undefined;

    /**
     * The root {@link Filesystem} this node belongs to.
     */
    abstract readonly fs: Filesystem;

    abstract exists(): Promise<boolean>;
    abstract stat(): Promise<FilesystemNode.Stat>;

    /**
     * Delete the entry at this location.  Folders are deleted recursively.  No effect if nothing exists.
     */
    abstract delete(): Promise<void>;

    /**
     * Absolute path within the filesystem, "/" for the root.
     */
    get path(): string {
        const names = Array<string>();
        let node: FilesystemNode = this;
        for (let parent = node.parent; parent !== undefined; parent = parent.parent) {
            names.unshift(node.name);
            node = parent;
        }
        return `/${names.join("/")}`;
    }

    /**
     * True if both handles name the same location in the same storage.  Kind is not compared.
     */
    equals(other: FilesystemNode) {
        return this.fs.sharesStorageWith(other.fs) && other.path === this.path;
    }

    /**
     * Record the creation time of the entry.  Optional capability; throws {@link UnsupportedOperationError} unless
     * the backend overrides it.
     */
    async setCreationTime(instant: Date): Promise<void> {
        throw new UnsupportedOperationError(
            `Setting creation time of ${this} to ${instant.toISOString()} is not supported by this filesystem`,
        );
    }

    toString() {
        return this.path;
    }
}

export namespace FilesystemNode {
    export interface Stat {
        type: "file" | "folder";
        size: number;
        mtime: Date;

        /** Only present where the backend records creation times. */
        created?: Date;
    }
}
