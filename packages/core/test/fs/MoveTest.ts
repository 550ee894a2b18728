/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { FileNotFoundError, SelfContainmentError } from "../../src/fs/FilesystemError.js";
import type { Folder } from "../../src/fs/Folder.js";
import { MemoryFilesystem } from "../../src/fs/MemoryFilesystem.js";
import { LogLevel } from "../../src/log/LogLevel.js";
import { Logger } from "../../src/log/Logger.js";
import { errorOf, namesOf } from "./helpers.js";

describe("move", () => {
    let fs: MemoryFilesystem;
    let source: Folder;

    beforeEach(async () => {
        fs = new MemoryFilesystem();
        source = fs.folder("A");
        await source.file("x").write("hello");
    });

    describe("folder", () => {
        it("preserves content and removes the source", async () => {
            const target = fs.folder("B");
            await source.moveTo(target);

            expect(await target.file("x").readAllText()).equal("hello");
            expect(await source.exists()).equal(false);
        });

        it("replaces the target", async () => {
            const target = fs.folder("B");
            await target.file("y").write("unrelated");

            await source.moveTo(target);

            expect(await namesOf(target.children())).deep.equal(["x"]);
        });

        it("creates missing ancestors of the target", async () => {
            const target = fs.resolveFolder("p/q/B");
            await source.moveTo(target);

            expect(await target.file("x").readAllText()).equal("hello");
            expect(await namesOf(fs.children())).deep.equal(["p"]);
        });

        it("keeps the subtree", async () => {
            await source.resolveFile("sub/y").write("world");
            await source.moveTo(fs.folder("B"));

            expect(await fs.resolveFile("B/sub/y").readAllText()).equal("world");
        });

        it("rejects moving into a descendant", async () => {
            expect(await errorOf(source.moveTo(source.folder("sub")))).instanceOf(SelfContainmentError);
            expect(await source.file("x").readAllText()).equal("hello");
        });

        it("rejects moving onto itself", async () => {
            expect(await errorOf(source.moveTo(fs.folder("A")))).instanceOf(SelfContainmentError);
        });

        it("rejects a missing source without touching the target", async () => {
            const target = fs.folder("B");
            await target.file("keep").write("k");

            expect(await errorOf(fs.folder("missing").moveTo(target))).instanceOf(FileNotFoundError);
            expect(await target.file("keep").exists()).equal(true);
        });
    });

    describe("across filesystems", () => {
        let entries: Logger.Entry[];
        let level: LogLevel;
        let destination: Logger.Destination;

        beforeEach(() => {
            entries = [];
            level = Logger.level;
            destination = Logger.destination;
            Logger.level = LogLevel.DEBUG;
            Logger.destination = entry => entries.push(entry);
        });

        afterEach(() => {
            Logger.level = level;
            Logger.destination = destination;
        });

        it("copies then deletes", async () => {
            const other = new MemoryFilesystem();
            await source.moveTo(other.folder("B"));

            expect(await other.resolveFile("B/x").readAllText()).equal("hello");
            expect(await source.exists()).equal(false);
        });

        it("logs the fallback", async () => {
            const other = new MemoryFilesystem();
            await source.moveTo(other.folder("B"));

            const messages = entries
                .filter(entry => entry.facility === "Folder")
                .map(entry => entry.message);
            expect(messages).deep.equal(["Moving /A to /B by copy and delete"]);
        });

        it("logs the fallback for a file", async () => {
            const other = new MemoryFilesystem();
            await source.file("x").moveTo(other.file("y"));

            const messages = entries
                .filter(entry => entry.facility === "File")
                .map(entry => entry.message);
            expect(messages).deep.equal(["Moving /A/x to /y by copy and delete"]);
        });

        it("does not log a native file move", async () => {
            await source.file("x").moveTo(fs.file("y"));

            expect(entries.filter(entry => entry.facility === "File")).deep.equal([]);
        });
    });

    describe("file", () => {
        it("preserves content and removes the source", async () => {
            const file = source.file("x");
            const target = fs.resolveFile("C/renamed");
            await file.moveTo(target);

            expect(await target.readAllText()).equal("hello");
            expect(await file.exists()).equal(false);
        });

        it("replaces an existing target", async () => {
            const target = fs.file("y");
            await target.write("old");

            await source.file("x").moveTo(target);

            expect(await target.readAllText()).equal("hello");
        });

        it("moves between filesystems", async () => {
            const other = new MemoryFilesystem();
            await source.file("x").moveTo(other.file("x"));

            expect(await other.file("x").readAllText()).equal("hello");
            expect(await source.file("x").exists()).equal(false);
        });

        it("rejects moving onto itself", async () => {
            expect(await errorOf(source.file("x").moveTo(source.file("x")))).instanceOf(SelfContainmentError);
        });

        it("rejects a missing source", async () => {
            expect(await errorOf(source.file("nope").moveTo(fs.file("y")))).instanceOf(FileNotFoundError);
        });
    });
});
