/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { File } from "../../src/fs/File.js";
import { IOError } from "../../src/fs/FilesystemError.js";
import type { FilesystemNode } from "../../src/fs/FilesystemNode.js";
import { Folder } from "../../src/fs/Folder.js";

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const result = Array<T>();
    for await (const item of iterable) {
        result.push(item);
    }
    return result;
}

export async function namesOf(iterable: AsyncIterable<FilesystemNode>): Promise<string[]> {
    return (await collect(iterable)).map(node => node.name);
}

export async function errorOf(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (e) {
        return e;
    }
    expect.fail("Expected promise to reject");
}

/**
 * Folder whose enumeration fails with {@link IOError} when it reaches the child at a given index.
 */
export class FailingFolder extends Folder {
    readonly #inner: Folder;
    readonly #failAt: number;

    constructor(inner: Folder, failAt: number) {
        super();
        this.#inner = inner;
        this.#failAt = failAt;
    }

    get name() {
        return this.#inner.name;
    }

    get parent() {
        return this.#inner.parent;
    }

    get fs() {
        return this.#inner.fs;
    }

    exists() {
        return this.#inner.exists();
    }

    stat() {
        return this.#inner.stat();
    }

    delete() {
        return this.#inner.delete();
    }

    create() {
        return this.#inner.create();
    }

    file(name: string): File {
        return this.#inner.file(name);
    }

    folder(name: string): Folder {
        return this.#inner.folder(name);
    }

    async *children(): AsyncIterable<Folder.Child> {
        let index = 0;
        for await (const child of this.#inner.children()) {
            if (index === this.#failAt) {
                throw new IOError(`Simulated failure listing ${this}`);
            }
            index++;
            yield child;
        }
    }
}
