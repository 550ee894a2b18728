/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Logger } from "../log/Logger.js";
import type { File } from "./File.js";
import { FileNotFoundError, SelfContainmentError } from "./FilesystemError.js";
import type { FilesystemNode } from "./FilesystemNode.js";
import type { Folder } from "./Folder.js";

const logger = Logger.get("Copier");

/**
 * Recursive tree copy.
 *
 * A copy replaces the target: whatever exists there is deleted first, so the result is never a merge.  Failures are
 * not rolled back; entries copied before the failure remain at the target.
 */
export namespace Copier {
    /**
     * Copy a folder and its subtree to (not into) the target.
     */
    export async function copyFolder(source: Folder, target: Folder) {
        assertDisjoint(source, target);
        if (!(await source.exists())) {
            throw new FileNotFoundError(`Folder not found: ${source}`);
        }

        logger.debug(`Copying folder ${source} to ${target}`);
        await replicateFolder(source, target);
    }

    /**
     * Copy file content to the target, replacing whatever exists there.
     */
    export async function copyFile(source: File, target: File) {
        assertDisjoint(source, target);
        if (!(await source.exists())) {
            throw new FileNotFoundError(`File not found: ${source}`);
        }

        logger.debug(`Copying file ${source} to ${target}`);
        await target.parent?.create();
        await replicateFile(source, target);
    }

    /**
     * Ensure copying or moving source to target cannot destroy the source or recurse into the copy.
     */
    export function assertDisjoint(source: Folder.Child, target: Folder.Child) {
        if (target.equals(source)) {
            throw new SelfContainmentError(`Cannot copy ${source} onto itself`);
        }
        if (isWithin(target, source)) {
            throw new SelfContainmentError(`Cannot copy ${source} into its own descendant ${target}`);
        }
        if (isWithin(source, target)) {
            throw new SelfContainmentError(`Cannot replace ${target} because it contains ${source}`);
        }
    }

    async function replicateFolder(source: Folder, target: Folder) {
        await target.delete();
        await target.create();
        for await (const child of source.children()) {
            if (child.kind === "folder") {
                await replicateFolder(child, target.folder(child.name));
            } else {
                await replicateFile(child, target.file(child.name));
            }
        }
    }

    async function replicateFile(source: File, target: File) {
        await target.delete();
        await target.write(source.readBytes());
    }

    function isWithin(node: FilesystemNode, location: Folder.Child) {
        if (location.kind === "folder") {
            return location.isAncestorOf(node);
        }

        // A file handle may alias a folder on storage; its location still encloses anything below that path
        for (let parent = node.parent; parent !== undefined; parent = parent.parent) {
            if (parent.equals(location)) {
                return true;
            }
        }
        return false;
    }
}
