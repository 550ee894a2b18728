/**
 * @license
 * Copyright 2022-2026 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Byte buffer helpers.
 */
export namespace Bytes {
    /**
     * Join chunks into a newly allocated buffer.  The result never aliases an input.
     */
    export function concat(chunks: readonly Uint8Array[]): Uint8Array {
        let totalLength = 0;
        for (const chunk of chunks) {
            totalLength += chunk.length;
        }
        const result = new Uint8Array(totalLength);
        let offset = 0;
        for (const chunk of chunks) {
            result.set(chunk, offset);
            offset += chunk.length;
        }
        return result;
    }

    export function fromText(text: string) {
        return new TextEncoder().encode(text);
    }

    export function toText(bytes: Uint8Array) {
        return new TextDecoder().decode(bytes);
    }

    /**
     * Drain an async iterable of chunks into a single buffer.
     */
    export async function collect(chunks: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
        const collected = Array<Uint8Array>();
        for await (const chunk of chunks) {
            collected.push(chunk);
        }
        if (collected.length === 0) {
            return new Uint8Array(0);
        }
        return concat(collected);
    }
}
