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

import * as I18n from './i18n';
import { normalizeText } from './text/normalize';
import { DEFAULT_MIN_KEYWORD_FREQUENCY, DEFAULT_LOCALE } from './config';

export type Keyword = [word : string, count : number];

/**
 * Find the words that occur at least `minFrequency` times in the text,
 * most frequent first.
 *
 * Words are compared in normalized form (see {@link normalizeText}).
 * Stopwords of the given locale and words of one or two characters are
 * never keywords. Words with the same count are listed in order of
 * first occurrence.
 */
export function extractKeywords(text : string,
                                minFrequency = DEFAULT_MIN_KEYWORD_FREQUENCY,
                                locale = DEFAULT_LOCALE) : Keyword[] {
    const normalized = normalizeText(text);
    if (!normalized)
        return [];

    const langPack = I18n.get(locale);
    const counts = new Map<string, number>();
    for (const word of normalized.split(' ')) {
        if (!langPack.isGoodKeyword(word))
            continue;
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    // Array.prototype.sort is stable, so ties keep insertion order
    return Array.from(counts)
        .filter(([, count]) => count >= minFrequency)
        .sort((a, b) => b[1] - a[1]);
}
