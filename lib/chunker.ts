// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2020 The Board of Trustees of the Leland Stanford Junior University
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './config';

export class InvalidConfigurationError extends Error {
    code : string;

    constructor(message : string) {
        super(message);
        this.name = 'InvalidConfigurationError';
        this.code = 'EINVAL';
    }
}

function checkConfiguration(size : number, overlap : number) : void {
    if (!Number.isInteger(size) || size <= 0)
        throw new InvalidConfigurationError(`Chunk size must be a positive integer, got ${size}`);
    if (!Number.isInteger(overlap) || overlap < 0)
        throw new InvalidConfigurationError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
    if (overlap >= size)
        throw new InvalidConfigurationError(`Chunk overlap (${overlap}) must be smaller than chunk size (${size})`);
}

/**
 * Split text into windows of at most `size` characters (code points),
 * where each window repeats the last `overlap` characters of the previous
 * one.
 *
 * Windows end at the last space before the size limit, when there is one,
 * so words are not cut in half. Chunks are trimmed, and chunks that are
 * empty after trimming are dropped. Text that fits in a single window is
 * returned as is, without trimming.
 *
 * @throws {InvalidConfigurationError} if `size` is not positive, or
 *   `overlap` is negative or not smaller than `size`
 */
export function chunkText(text : string,
                          size = DEFAULT_CHUNK_SIZE,
                          overlap = DEFAULT_CHUNK_OVERLAP) : string[] {
    checkConfiguration(size, overlap);
    if (!text)
        return [];
    // windows are measured in code points, so a surrogate pair is never split
    const chars = Array.from(text);
    if (chars.length <= size)
        return [text];

    const chunks : string[] = [];
    let start = 0;
    while (start < chars.length) {
        let end = Math.min(start + size, chars.length);
        if (end < chars.length) {
            const space = chars.lastIndexOf(' ', end - 1);
            // snap to the space only if the next window still starts after this one
            if (space > start && space - overlap > start)
                end = space;
        }

        const chunk = chars.slice(start, end).join('').trim();
        if (chunk)
            chunks.push(chunk);

        if (end >= chars.length)
            break;
        start = end - overlap;
    }
    return chunks;
}

/**
 * Compute how many windows {@link chunkText} opens on a text of the given
 * length, assuming no window is shortened to a word boundary.
 *
 * The count is exact for text without spaces; word-boundary snapping can
 * only increase it.
 */
export function estimateChunkCount(length : number,
                                   size = DEFAULT_CHUNK_SIZE,
                                   overlap = DEFAULT_CHUNK_OVERLAP) : number {
    checkConfiguration(size, overlap);
    if (length <= 0)
        return 0;
    if (length <= size)
        return 1;
    return Math.ceil((length - size) / (size - overlap)) + 1;
}
