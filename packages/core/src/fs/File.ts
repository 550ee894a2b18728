/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Logger } from "../log/Logger.js";
import { Bytes } from "../util/Bytes.js";
import { Copier } from "./Copier.js";
import { FileNotFoundError } from "./FilesystemError.js";
import { FilesystemNode } from "./FilesystemNode.js";

const logger = Logger.get("File");

/**
 * Abstract handle to a file.
 *
 * A File is a handle -- the underlying entry need not exist yet.
 */
export abstract class File extends FilesystemNode {
    readonly kind = "file";

    /**
     * Stream the file content.  Nothing is read until iteration starts; failures surface during iteration.
     */
    abstract readBytes(): AsyncIterable<Uint8Array>;

    /**
     * Replace the file content, creating missing ancestor folders.
     */
    abstract write(data: File.Data): Promise<void>;

    /**
     * Read all bytes from the file into a single buffer.
     */
    async readAllBytes(): Promise<Uint8Array> {
        return Bytes.collect(this.readBytes());
    }

    /**
     * Read the entire file as a string.
     */
    async readAllText(): Promise<string> {
        return Bytes.toText(await this.readAllBytes());
    }

    /**
     * Copy this file's content to (not into) the target, replacing whatever exists there.
     */
    copyTo(target: File): Promise<void> {
        return Copier.copyFile(this, target);
    }

    /**
     * Move this file to the target, replacing whatever exists there.  Uses a native rename where the backend
     * supports one, otherwise copies and deletes.
     */
    async moveTo(target: File): Promise<void> {
        Copier.assertDisjoint(this, target);
        if (!(await this.exists())) {
            throw new FileNotFoundError(`File not found: ${this}`);
        }
        if (await this.relocate(target)) {
            return;
        }
        logger.debug(`Moving ${this} to ${target} by copy and delete`);
        await Copier.copyFile(this, target);
        await this.delete();
    }

    /**
     * Native move.  Returns false if the backend cannot relocate to the target, in which case the caller copies.
     */
    protected relocate(_target: File): Promise<boolean> {
        return Promise.resolve(false);
    }
}

export namespace File {
    export type Data = string | Uint8Array | AsyncIterable<Uint8Array>;
}
