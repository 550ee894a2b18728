/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Bytes } from "../util/Bytes.js";
import { File } from "./File.js";
import { Filesystem } from "./Filesystem.js";
import { FileNotFoundError, FileTypeError } from "./FilesystemError.js";
import type { FilesystemNode } from "./FilesystemNode.js";
import { Folder } from "./Folder.js";

interface MemoryRecord {
    type: "file" | "folder";
    mtime: Date;
    created: Date;
    content?: Uint8Array;
    children?: Map<string, MemoryRecord>;
}

function createFolderRecord(): MemoryRecord {
    const now = new Date();
    return { type: "folder", mtime: now, created: now, children: new Map() };
}

function createFileRecord(content: Uint8Array, created = new Date()): MemoryRecord {
    return { type: "file", mtime: new Date(), created, content };
}

/**
 * In-memory filesystem.
 *
 * Supports native moves within the same instance and records creation times.  Enumeration walks the live child
 * table, so changes made while iterating may or may not be observed.
 */
export class MemoryFilesystem extends Filesystem {
    readonly #root: MemoryRecord;

    constructor(options?: Partial<Filesystem.Options>) {
        super(options);
        this.#root = createFolderRecord();
    }

    async exists(): Promise<boolean> {
        return true;
    }

    async stat(): Promise<FilesystemNode.Stat> {
        return statOf(this.#root);
    }

    async delete(): Promise<void> {
        this.#root.children?.clear();
    }

    async *children(): AsyncIterable<Folder.Child> {
        yield* childrenOf(this, this.#root, []);
    }

    file(name: string): File {
        return new MemoryFile(this, this.#root, [Folder.assertName(name)]);
    }

    folder(name: string): Folder {
        return new MemoryFolder(this, this.#root, [Folder.assertName(name)]);
    }

    async create(): Promise<void> {
        // Root always exists
    }

    override async setCreationTime(instant: Date): Promise<void> {
        this.#root.created = instant;
    }
}

function statOf(record: MemoryRecord): FilesystemNode.Stat {
    return {
        type: record.type,
        size: record.content?.length ?? 0,
        mtime: record.mtime,
        created: record.created,
    };
}

function displayPath(segments: readonly string[]) {
    return `/${segments.join("/")}`;
}

function lookup(root: MemoryRecord, segments: readonly string[]): MemoryRecord | undefined {
    let current = root;
    for (const segment of segments) {
        const child = current.children?.get(segment);
        if (child === undefined) {
            return undefined;
        }
        current = child;
    }
    return current;
}

function mkdirp(root: MemoryRecord, segments: readonly string[]): Map<string, MemoryRecord> {
    let current = root;
    for (let i = 0; i < segments.length; i++) {
        if (current.children === undefined) {
            current.children = new Map();
        }
        let child = current.children.get(segments[i]);
        if (child === undefined) {
            child = createFolderRecord();
            current.children.set(segments[i], child);
        } else if (child.type !== "folder") {
            throw new FileTypeError(`${displayPath(segments.slice(0, i + 1))} is a file`);
        }
        current = child;
    }
    if (current.children === undefined) {
        current.children = new Map();
    }
    return current.children;
}

function remove(root: MemoryRecord, segments: readonly string[]) {
    const parent = lookup(root, segments.slice(0, -1));
    parent?.children?.delete(segments[segments.length - 1]);
}

/**
 * Move the record at one location to another, replacing whatever is there.
 */
function moveRecord(root: MemoryRecord, from: readonly string[], to: readonly string[]) {
    const record = lookup(root, from);
    if (record === undefined) {
        throw new FileNotFoundError(`Not found: ${displayPath(from)}`);
    }
    const targetSiblings = mkdirp(root, to.slice(0, -1));
    targetSiblings.set(to[to.length - 1], record);
    remove(root, from);
}

async function* childrenOf(
    fs: MemoryFilesystem,
    root: MemoryRecord,
    segments: readonly string[],
): AsyncGenerator<Folder.Child> {
    const record = lookup(root, segments);
    if (record === undefined || record.type !== "folder") {
        throw new FileNotFoundError(`Folder not found: ${displayPath(segments)}`);
    }
    if (record.children === undefined) {
        return;
    }
    for (const [name, child] of record.children) {
        if (child.type === "folder") {
            yield new MemoryFolder(fs, root, [...segments, name]);
        } else {
            yield new MemoryFile(fs, root, [...segments, name]);
        }
    }
}

function parentOf(fs: MemoryFilesystem, root: MemoryRecord, segments: readonly string[]): Folder {
    if (segments.length === 1) {
        return fs;
    }
    return new MemoryFolder(fs, root, segments.slice(0, -1));
}

class MemoryFile extends File {
    readonly #fs: MemoryFilesystem;
    readonly #root: MemoryRecord;
    readonly #segments: readonly string[];

    constructor(fs: MemoryFilesystem, root: MemoryRecord, segments: readonly string[]) {
        super();
        this.#fs = fs;
        this.#root = root;
        this.#segments = segments;
    }

    get name() {
        return this.#segments[this.#segments.length - 1];
    }

    get parent(): Folder {
        return parentOf(this.#fs, this.#root, this.#segments);
    }

    get fs(): MemoryFilesystem {
        return this.#fs;
    }

    async exists(): Promise<boolean> {
        return lookup(this.#root, this.#segments)?.type === "file";
    }

    async stat(): Promise<FilesystemNode.Stat> {
        return statOf(this.#existing());
    }

    async *readBytes(): AsyncIterable<Uint8Array> {
        const record = this.#existing();
        if (record.content !== undefined && record.content.length > 0) {
            yield record.content.slice();
        }
    }

    async write(data: File.Data): Promise<void> {
        let content: Uint8Array;
        if (typeof data === "string") {
            content = Bytes.fromText(data);
        } else if (data instanceof Uint8Array) {
            content = data.slice();
        } else {
            content = await Bytes.collect(data);
        }

        const siblings = mkdirp(this.#root, this.#segments.slice(0, -1));
        const existing = siblings.get(this.name);
        if (existing?.type === "folder") {
            throw new FileTypeError(`Cannot write to folder ${this}`);
        }
        siblings.set(this.name, createFileRecord(content, existing?.created));
    }

    async delete(): Promise<void> {
        remove(this.#root, this.#segments);
    }

    override async setCreationTime(instant: Date): Promise<void> {
        this.#existing().created = instant;
    }

    protected override async relocate(target: File): Promise<boolean> {
        if (!(target instanceof MemoryFile) || target.#fs !== this.#fs) {
            return false;
        }
        moveRecord(this.#root, this.#segments, target.#segments);
        return true;
    }

    #existing() {
        const record = lookup(this.#root, this.#segments);
        if (record === undefined) {
            throw new FileNotFoundError(`File not found: ${this}`);
        }
        if (record.type !== "file") {
            throw new FileTypeError(`${this} is a folder`);
        }
        return record;
    }
}

class MemoryFolder extends Folder {
    readonly #fs: MemoryFilesystem;
    readonly #root: MemoryRecord;
    readonly #segments: readonly string[];

    constructor(fs: MemoryFilesystem, root: MemoryRecord, segments: readonly string[]) {
        super();
        this.#fs = fs;
        this.#root = root;
        this.#segments = segments;
    }

    get name() {
        return this.#segments[this.#segments.length - 1];
    }

    get parent(): Folder {
        return parentOf(this.#fs, this.#root, this.#segments);
    }

    get fs(): MemoryFilesystem {
        return this.#fs;
    }

    async exists(): Promise<boolean> {
        return lookup(this.#root, this.#segments)?.type === "folder";
    }

    async stat(): Promise<FilesystemNode.Stat> {
        return statOf(this.#existing());
    }

    async delete(): Promise<void> {
        remove(this.#root, this.#segments);
    }

    async *children(): AsyncIterable<Folder.Child> {
        yield* childrenOf(this.#fs, this.#root, this.#segments);
    }

    file(name: string): File {
        return new MemoryFile(this.#fs, this.#root, [...this.#segments, Folder.assertName(name)]);
    }

    folder(name: string): Folder {
        return new MemoryFolder(this.#fs, this.#root, [...this.#segments, Folder.assertName(name)]);
    }

    async create(): Promise<void> {
        mkdirp(this.#root, this.#segments);
    }

    override async setCreationTime(instant: Date): Promise<void> {
        this.#existing().created = instant;
    }

    protected override async relocate(target: Folder): Promise<boolean> {
        if (!(target instanceof MemoryFolder) || target.#fs !== this.#fs) {
            return false;
        }
        moveRecord(this.#root, this.#segments, target.#segments);
        return true;
    }

    #existing() {
        const record = lookup(this.#root, this.#segments);
        if (record === undefined) {
            throw new FileNotFoundError(`Folder not found: ${this}`);
        }
        if (record.type !== "folder") {
            throw new FileTypeError(`${this} is a file`);
        }
        return record;
    }
}
