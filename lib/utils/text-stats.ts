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

import { DEFAULT_DISPLAY_LENGTH, DEFAULT_SUMMARY_WORDS } from '../config';

const ELLIPSIS = '...';

function splitWords(text : string) : string[] {
    const trimmed = text.trim();
    if (!trimmed)
        return [];
    return trimmed.split(/\s+/);
}

/**
 * Shorten text to at most `maxLength` code points, replacing the end
 * with "..." if it is cut.
 *
 * A `maxLength` below 3 leaves only the ellipsis.
 */
export function truncateForDisplay(text : string, maxLength = DEFAULT_DISPLAY_LENGTH) : string {
    if (!text)
        return '';
    const chars = Array.from(text);
    if (chars.length <= maxLength)
        return text;
    return chars.slice(0, Math.max(0, maxLength - ELLIPSIS.length)).join('') + ELLIPSIS;
}

export function countWords(text : string) : number {
    if (!text)
        return 0;
    return splitWords(text).length;
}

/**
 * Count the characters (code points) in the text, optionally excluding
 * spaces. Only U+0020 counts as a space; tabs and newlines are always
 * counted.
 */
export function countCharacters(text : string, includeSpaces = true) : number {
    if (!text)
        return 0;
    if (!includeSpaces)
        text = text.replace(/ /g, '');
    return Array.from(text).length;
}

/**
 * Keep the first `maxWords` words of the text.
 *
 * Text within the limit is returned unchanged. Otherwise the kept words
 * are joined by single spaces, so the original line breaks and spacing
 * are lost, and "..." is appended.
 */
export function summarize(text : string, maxWords = DEFAULT_SUMMARY_WORDS) : string {
    if (!text)
        return '';

    const words = splitWords(text);
    if (words.length <= maxWords)
        return text;
    return words.slice(0, maxWords).join(' ') + ELLIPSIS;
}
