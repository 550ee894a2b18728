/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { VariableService } from "../environment/VariableService.js";
import { Folder } from "./Folder.js";

/**
 * Root folder of a backend.
 */
export abstract class Filesystem extends Folder {
    readonly options: Filesystem.Options;

    constructor(options?: Partial<Filesystem.Options>) {
        super();
        this.options = { ...Filesystem.Options.defaults, ...options };
    }

    get name() {
        return "";
    }

    get parent(): undefined {
        return undefined;
    }

    get fs(): Filesystem {
        return this;
    }

    /**
     * True if both filesystems address the same underlying storage, so equal paths name the same entry.
     *
     * Backends whose instances can alias one store override this.
     */
    sharesStorageWith(other: Filesystem) {
        return other === this;
    }
}

export namespace Filesystem {
    export interface Options {
        /**
         * How path resolution treats ".." segments.  "resolve" steps to the parent folder, "literal" looks up a child
         * named "..".
         */
        parentSegments: "resolve" | "literal";
    }

    export namespace Options {
        export const defaults: Options = {
            parentSegments: "resolve",
        };

        /**
         * Read options from configuration variables (`path.parentSegments`).
         */
        export function fromVariables(vars: VariableService): Options {
            return {
                parentSegments: vars.enum("path.parentSegments", ["resolve", "literal"], defaults.parentSegments),
            };
        }
    }
}
