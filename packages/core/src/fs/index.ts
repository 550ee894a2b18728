/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./Copier.js";
export * from "./File.js";
export * from "./Filesystem.js";
export * from "./FilesystemError.js";
export * from "./FilesystemNode.js";
export * from "./Folder.js";
export * from "./MemoryFilesystem.js";
export * from "./PathResolver.js";
