/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Logger } from "../log/Logger.js";
import { Copier } from "./Copier.js";
import type { File } from "./File.js";
import { FileNotFoundError, InvalidPathError } from "./FilesystemError.js";
import { FilesystemNode } from "./FilesystemNode.js";
import { PathResolver } from "./PathResolver.js";

const logger = Logger.get("Folder");

/**
 * Abstract handle to a folder.
 *
 * A Folder is a handle -- the underlying entry need not exist yet.  It holds no child collection; children are
 * listed from the backend each time they are requested.
 *
 * Backends implement {@link children}, {@link file}, {@link folder}, {@link create} and the {@link FilesystemNode}
 * primitives.  Resolution, filtering, copy, move and ancestry derive from those.
 */
export abstract class Folder extends FilesystemNode {
    readonly kind = "folder";

    /**
     * Direct children of this folder.
     *
     * The sequence is lazy.  Backend I/O runs as it is consumed, so failures surface as {@link IOError} from the
     * iteration rather than from this call, after any children already yielded.  Each call queries the backend
     * again; there is no snapshot between calls.
     */
    abstract children(): AsyncIterable<Folder.Child>;

    /**
     * Handle to the child file with the given name.  Performs no I/O and does not check what exists.
     */
    abstract file(name: string): File;

    /**
     * Handle to the child folder with the given name.  Performs no I/O and does not check what exists.
     */
    abstract folder(name: string): Folder;

    /**
     * Create the folder including all missing ancestors.  No effect if it exists.
     */
    abstract create(): Promise<void>;

    async *files(): AsyncGenerator<File> {
        for await (const child of this.children()) {
            if (child.kind === "file") {
                yield child;
            }
        }
    }

    async *folders(): AsyncGenerator<Folder> {
        for await (const child of this.children()) {
            if (child.kind === "folder") {
                yield child;
            }
        }
    }

    /**
     * Resolve a file by a "/"-separated path.  The path is always relative to this folder, with or without a
     * leading slash.
     */
    resolveFile(path: string): File {
        return PathResolver.resolveFile(this, path);
    }

    /**
     * Resolve a folder by a "/"-separated path.  The path is always relative to this folder, with or without a
     * leading slash.  An empty path returns this folder.
     */
    resolveFolder(path: string): Folder {
        return PathResolver.resolveFolder(this, path);
    }

    /**
     * Recursively copy this folder and its contents to (not into) the target, creating missing ancestors.  Whatever
     * exists at the target is deleted first.
     */
    copyTo(target: Folder): Promise<void> {
        return Copier.copyFolder(this, target);
    }

    /**
     * Move this folder and its contents to the target, replacing whatever exists there.
     *
     * Uses a native rename where the backend supports one.  Otherwise copies then deletes, which is not atomic.
     */
    async moveTo(target: Folder): Promise<void> {
        Copier.assertDisjoint(this, target);
        if (!(await this.exists())) {
            throw new FileNotFoundError(`Folder not found: ${this}`);
        }
        if (await this.relocate(target)) {
            return;
        }
        logger.debug(`Moving ${this} to ${target} by copy and delete`);
        await Copier.copyFolder(this, target);
        await this.delete();
    }

    /**
     * True if the node lies somewhere below this folder.  A folder is not its own ancestor.
     */
    isAncestorOf(node: FilesystemNode): boolean {
        for (let parent = node.parent; parent !== undefined; parent = parent.parent) {
            if (parent.equals(this)) {
                return true;
            }
        }
        return false;
    }

    /**
     * Native move.  Returns false if the backend cannot relocate to the target, in which case the caller copies.
     */
    protected relocate(_target: Folder): Promise<boolean> {
        return Promise.resolve(false);
    }

    /**
     * Validate a child name for {@link file} and {@link folder}.
     */
    static assertName(name: string) {
        if (name === "" || name === ".") {
            throw new InvalidPathError(`Invalid name "${name}"`);
        }
        if (name.includes("/")) {
            throw new InvalidPathError(`Name "${name}" contains a path separator`);
        }
        return name;
    }
}

export namespace Folder {
    export type Child = File | Folder;
}
