/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { InvalidPathError } from "../../src/fs/FilesystemError.js";
import { MemoryFilesystem } from "../../src/fs/MemoryFilesystem.js";
import { PathResolver } from "../../src/fs/PathResolver.js";
import { namesOf } from "./helpers.js";

describe("PathResolver", () => {
    let fs: MemoryFilesystem;

    beforeEach(() => {
        fs = new MemoryFilesystem();
    });

    describe("segmentsOf", () => {
        it("drops empty and self-reference segments", () => {
            expect(PathResolver.segmentsOf("/a//./b/")).deep.equal(["a", "b"]);
        });

        it("keeps parent references", () => {
            expect(PathResolver.segmentsOf("a/../b")).deep.equal(["a", "..", "b"]);
        });
    });

    describe("resolveFolder", () => {
        it("appends segments to the start path", () => {
            expect(fs.resolveFolder("a/b").path).equal("/a/b");
            expect(fs.folder("x").resolveFolder("y/z").path).equal("/x/y/z");
        });

        it("ignores leading, trailing and duplicate slashes", () => {
            expect(fs.resolveFolder("/a//b/").equals(fs.resolveFolder("a/b"))).equal(true);
        });

        it("treats a leading slash as relative to the start folder", () => {
            const start = fs.folder("x");
            expect(start.resolveFolder("/y").path).equal("/x/y");
        });

        it("returns the start folder for an empty path", () => {
            const start = fs.resolveFolder("x/y");
            expect(start.resolveFolder("").equals(start)).equal(true);
            expect(start.resolveFolder("/").equals(start)).equal(true);
            expect(start.resolveFolder("./.").equals(start)).equal(true);
        });

        it("returns a folder handle with the terminal name", () => {
            const folder = fs.resolveFolder("a/b");
            expect(folder.kind).equal("folder");
            expect(folder.name).equal("b");
        });

        it("steps to the parent for ..", () => {
            expect(fs.resolveFolder("a/b/../c").path).equal("/a/c");
            expect(fs.folder("a").resolveFolder("..").equals(fs)).equal(true);
        });

        it("rejects paths leading above the root", () => {
            expect(() => fs.resolveFolder("..")).throw(InvalidPathError);
            expect(() => fs.resolveFolder("a/../..")).throw(InvalidPathError);
        });

        it("performs no I/O", async () => {
            const folder = fs.resolveFolder("a/b");
            expect(await folder.exists()).equal(false);
            expect(await namesOf(fs.children())).deep.equal([]);
        });
    });

    describe("resolveFile", () => {
        it("resolves the terminal segment as a file", () => {
            const file = fs.resolveFile("/a/b/c.txt");
            expect(file.kind).equal("file");
            expect(file.name).equal("c.txt");
            expect(file.path).equal("/a/b/c.txt");
            expect(file.parent?.path).equal("/a/b");
        });

        it("rejects an empty path", () => {
            expect(() => fs.resolveFile("")).throw(InvalidPathError);
            expect(() => fs.resolveFile("//")).throw(InvalidPathError);
            expect(() => fs.resolveFile(".")).throw(InvalidPathError);
        });

        it("rejects a path ending in ..", () => {
            expect(() => fs.resolveFile("a/..")).throw(InvalidPathError);
        });

        it("resolves .. before the terminal segment", () => {
            expect(fs.resolveFile("a/../b.txt").path).equal("/b.txt");
        });

        it("resolves the same file from different start folders", () => {
            const viaRoot = fs.resolveFile("a/b/c.txt");
            const viaFolder = fs.folder("a").resolveFile("b/c.txt");
            expect(viaRoot.equals(viaFolder)).equal(true);
        });
    });

    describe("with literal parent segments", () => {
        beforeEach(() => {
            fs = new MemoryFilesystem({ parentSegments: "literal" });
        });

        it("looks up .. as a folder name", () => {
            const folder = fs.resolveFolder("a/..");
            expect(folder.name).equal("..");
            expect(folder.path).equal("/a/..");
        });

        it("looks up .. as a file name", () => {
            expect(fs.resolveFile("a/..").name).equal("..");
        });

        it("allows .. at the root", () => {
            expect(fs.resolveFolder("..").path).equal("/..");
        });
    });

    describe("names", () => {
        it("rejects names containing a separator", () => {
            expect(() => fs.folder("a/b")).throw(InvalidPathError);
            expect(() => fs.file("a/b")).throw(InvalidPathError);
        });

        it("rejects empty and self-reference names", () => {
            expect(() => fs.file("")).throw(InvalidPathError);
            expect(() => fs.folder(".")).throw(InvalidPathError);
        });
    });
});
