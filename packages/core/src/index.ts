/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./environment/VariableService.js";
export * from "./fs/index.js";
export * from "./HierfsError.js";
export * from "./log/index.js";
export * from "./util/Bytes.js";
export * from "./util/Error.js";
