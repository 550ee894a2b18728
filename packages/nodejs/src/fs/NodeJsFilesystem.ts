/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import {
    errorCodeOf,
    File,
    FileNotFoundError,
    Filesystem,
    FileTypeError,
    Folder,
    InvalidPathError,
    IOError,
    Logger,
    PathResolver,
    type FilesystemError,
    type FilesystemNode,
} from "@hierfs/core";
import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, opendir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

const logger = Logger.get("NodeJsFilesystem");

/**
 * Filesystem backed by the local OS filesystem via Node.js APIs.
 *
 * Failures from Node.js surface as {@link IOError}.  Creation times cannot be set.  Moves within one instance use
 * `rename` and fall back to copy and delete across devices.
 */
export class NodeJsFilesystem extends Filesystem {
    readonly #rootPath: string;

    constructor(rootPath: string, options?: Partial<Filesystem.Options>) {
        super(options);
        this.#rootPath = rootPath;
    }

    get nativePath() {
        return this.#rootPath;
    }

    /**
     * Instances rooted at the same directory alias one another.
     */
    override sharesStorageWith(other: Filesystem) {
        return other instanceof NodeJsFilesystem && resolve(other.#rootPath) === resolve(this.#rootPath);
    }

    async exists(): Promise<boolean> {
        return nodeExists(this.#rootPath, "folder");
    }

    stat(): Promise<FilesystemNode.Stat> {
        return nodeStat(this.#rootPath);
    }

    async delete(): Promise<void> {
        await nodeDelete(this.#rootPath);
    }

    async *children(): AsyncIterable<Folder.Child> {
        yield* nodeChildren(this, []);
    }

    file(name: string): NodeJsFile {
        return new NodeJsFile(this, [checkName(name)]);
    }

    folder(name: string): NodeJsFolder {
        return new NodeJsFolder(this, [checkName(name)]);
    }

    async create(): Promise<void> {
        await nodeMkdir(this.#rootPath);
    }
}

/**
 * Names must not step outside their folder on disk, so ".." is never taken literally here.
 */
function checkName(name: string) {
    if (name === PathResolver.PARENT) {
        throw new InvalidPathError(`Name "${name}" is not supported by the local filesystem`);
    }
    return Folder.assertName(name);
}

function nativePathOf(fs: NodeJsFilesystem, segments: readonly string[]) {
    return join(fs.nativePath, ...segments);
}

function translate(cause: unknown, path: string): FilesystemError {
    switch (errorCodeOf(cause)) {
        case "ENOENT":
            return new FileNotFoundError(`Not found: ${path}`, { cause });

        case "EISDIR":
        case "ENOTDIR":
        case "EEXIST":
            return new FileTypeError(`Entry type conflict at ${path}`, { cause });
    }
    return IOError.of(cause, `I/O error at ${path}`);
}

async function nodeExists(path: string, type: "file" | "folder"): Promise<boolean> {
    try {
        const s = await stat(path);
        return type === "folder" ? s.isDirectory() : s.isFile();
    } catch (e) {
        const code = errorCodeOf(e);
        if (code === "ENOENT" || code === "ENOTDIR") {
            return false;
        }
        throw translate(e, path);
    }
}

async function nodeStat(path: string): Promise<FilesystemNode.Stat> {
    try {
        const s = await stat(path);
        return {
            type: s.isDirectory() ? "folder" : "file",
            size: s.size,
            mtime: s.mtime,
            created: s.birthtime,
        };
    } catch (e) {
        throw translate(e, path);
    }
}

async function nodeDelete(path: string) {
    try {
        await rm(path, { recursive: true, force: true });
    } catch (e) {
        throw translate(e, path);
    }
}

async function nodeMkdir(path: string) {
    try {
        await mkdir(path, { recursive: true });
    } catch (e) {
        throw translate(e, path);
    }
}

async function* nodeChildren(fs: NodeJsFilesystem, segments: readonly string[]): AsyncGenerator<Folder.Child> {
    const path = nativePathOf(fs, segments);
    try {
        const dir = await opendir(path);
        for await (const dirent of dir) {
            // Links are classified by what they point to; dangling links list as files
            const isFolder =
                dirent.isDirectory() ||
                (dirent.isSymbolicLink() && (await nodeExists(join(path, dirent.name), "folder")));
            if (isFolder) {
                yield new NodeJsFolder(fs, [...segments, dirent.name]);
            } else {
                yield new NodeJsFile(fs, [...segments, dirent.name]);
            }
        }
    } catch (e) {
        throw translate(e, path);
    }
}

/**
 * Rename one entry over another.  Returns false if source and target are on different devices.
 */
async function nodeRename(from: string, to: string): Promise<boolean> {
    try {
        await rm(to, { recursive: true, force: true });
        await mkdir(dirname(to), { recursive: true });
        await rename(from, to);
        return true;
    } catch (e) {
        if (errorCodeOf(e) === "EXDEV") {
            logger.info(`Cannot rename ${from} to ${to} across devices`);
            return false;
        }
        throw translate(e, from);
    }
}

function parentOf(fs: NodeJsFilesystem, segments: readonly string[]): Folder {
    if (segments.length === 1) {
        return fs;
    }
    return new NodeJsFolder(fs, segments.slice(0, -1));
}

/**
 * File on the local disk.
 */
export class NodeJsFile extends File {
    readonly #fs: NodeJsFilesystem;
    readonly #segments: readonly string[];

    constructor(fs: NodeJsFilesystem, segments: readonly string[]) {
        super();
        this.#fs = fs;
        this.#segments = segments;
    }

    get name() {
        return this.#segments[this.#segments.length - 1];
    }

    get parent(): Folder {
        return parentOf(this.#fs, this.#segments);
    }

    get fs(): NodeJsFilesystem {
        return this.#fs;
    }

    get nativePath() {
        return nativePathOf(this.#fs, this.#segments);
    }

    exists(): Promise<boolean> {
        return nodeExists(this.nativePath, "file");
    }

    stat(): Promise<FilesystemNode.Stat> {
        return nodeStat(this.nativePath);
    }

    async *readBytes(): AsyncIterable<Uint8Array> {
        const path = this.nativePath;
        const s = await nodeStat(path);
        if (s.type === "folder") {
            throw new FileTypeError(`Cannot read bytes from folder ${this}`);
        }
        const stream = createReadStream(path);
        try {
            for await (const chunk of stream) {
                if (chunk instanceof Uint8Array) {
                    yield chunk;
                }
            }
        } catch (e) {
            throw translate(e, path);
        } finally {
            stream.destroy();
        }
    }

    async write(data: File.Data): Promise<void> {
        const path = this.nativePath;
        await nodeMkdir(dirname(path));
        try {
            if (typeof data === "string" || data instanceof Uint8Array) {
                await writeFile(path, data);
            } else {
                await pipeline(Readable.from(data), createWriteStream(path));
            }
        } catch (e) {
            throw translate(e, path);
        }
    }

    async delete(): Promise<void> {
        await nodeDelete(this.nativePath);
    }

    protected override async relocate(target: File): Promise<boolean> {
        if (!(target instanceof NodeJsFile) || !this.#fs.sharesStorageWith(target.#fs)) {
            return false;
        }
        return nodeRename(this.nativePath, target.nativePath);
    }
}

/**
 * Folder on the local disk.
 */
export class NodeJsFolder extends Folder {
    readonly #fs: NodeJsFilesystem;
    readonly #segments: readonly string[];

    constructor(fs: NodeJsFilesystem, segments: readonly string[]) {
        super();
        this.#fs = fs;
        this.#segments = segments;
    }

    get name() {
        return this.#segments[this.#segments.length - 1];
    }

    get parent(): Folder {
        return parentOf(this.#fs, this.#segments);
    }

    get fs(): NodeJsFilesystem {
        return this.#fs;
    }

    get nativePath() {
        return nativePathOf(this.#fs, this.#segments);
    }

    exists(): Promise<boolean> {
        return nodeExists(this.nativePath, "folder");
    }

    stat(): Promise<FilesystemNode.Stat> {
        return nodeStat(this.nativePath);
    }

    async delete(): Promise<void> {
        await nodeDelete(this.nativePath);
    }

    async *children(): AsyncIterable<Folder.Child> {
        yield* nodeChildren(this.#fs, this.#segments);
    }

    file(name: string): NodeJsFile {
        return new NodeJsFile(this.#fs, [...this.#segments, checkName(name)]);
    }

    folder(name: string): NodeJsFolder {
        return new NodeJsFolder(this.#fs, [...this.#segments, checkName(name)]);
    }

    async create(): Promise<void> {
        await nodeMkdir(this.nativePath);
    }

    protected override async relocate(target: Folder): Promise<boolean> {
        if (!(target instanceof NodeJsFolder) || !this.#fs.sharesStorageWith(target.#fs)) {
            return false;
        }
        return nodeRename(this.nativePath, target.nativePath);
    }
}
