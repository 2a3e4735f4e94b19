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

import { normalizeText } from './text/normalize';

function tokenSet(text : string) : Set<string> {
    const normalized = normalizeText(text);
    if (!normalized)
        return new Set;
    return new Set(normalized.split(' '));
}

/**
 * Size of the intersection over size of the union; 0 if both sets are empty.
 */
export function jaccard<T>(one : ReadonlySet<T>, two : ReadonlySet<T>) : number {
    let intersection = 0;
    for (const elem of one) {
        if (two.has(elem))
            intersection++;
    }
    const union = one.size + two.size - intersection;
    return union > 0 ? intersection / union : 0;
}

/**
 * Compute how similar two texts are, as the Jaccard index of their sets of
 * normalized words.
 *
 * Word order and repetitions are ignored. The result is in [0, 1]: 0 if
 * either text has no words, 1 if both have the same words.
 */
export function textSimilarity(one : string, two : string) : number {
    if (!one || !two)
        return 0;

    const oneTokens = tokenSet(one);
    const twoTokens = tokenSet(two);
    if (oneTokens.size === 0 || twoTokens.size === 0)
        return 0;
    return jaccard(oneTokens, twoTokens);
}
