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

/**
 * A named regular expression applied to the whole input.
 *
 * The expression must have the global flag.
 */
export interface Matcher {
    name : string;
    pattern : RegExp;
}

// digit boundaries keep a short shape from matching inside a longer one
// (DD/MM/YY inside DD/MM/YYYY)
export const DATE_MATCHERS : readonly Matcher[] = [
    { name: 'DD/MM/YYYY', pattern: /(?<!\d)\d{2}\/\d{2}\/\d{4}(?!\d)/g },
    { name: 'DD-MM-YYYY', pattern: /(?<!\d)\d{2}-\d{2}-\d{4}(?!\d)/g },
    { name: 'YYYY-MM-DD', pattern: /(?<!\d)\d{4}-\d{2}-\d{2}(?!\d)/g },
    { name: 'DD/MM/YY', pattern: /(?<!\d)\d{2}\/\d{2}\/\d{2}(?!\d)/g },
];

// an amount with at least one thousands group, eg. 1.234 or 1.234,56
const GROUPED_AMOUNT = String.raw`\d{1,3}(?:[.,]\d{3})+(?:[.,]\d{2})?`;
// an amount without thousands groups, eg. 50 or 1234,56
const SIMPLE_AMOUNT = String.raw`\d+(?:[.,]\d{2})?`;
// the amount must not continue with more digits or another separator group
const AMOUNT_END = String.raw`(?!\d|[.,]\d)`;
// a bare amount must not be the tail of a longer number, or follow R$
const BARE_START = String.raw`(?<!R\$\s*)(?<![\d.,])`;
const CURRENCY_WORD = String.raw`\s*(?:reais|real)\b`;

// the four shapes are disjoint, so each written amount is reported by one matcher only
export const MONETARY_MATCHERS : readonly Matcher[] = [
    { name: 'R$ grouped', pattern: new RegExp(String.raw`R\$\s*` + GROUPED_AMOUNT + AMOUNT_END, 'gi') },
    { name: 'R$ simple', pattern: new RegExp(String.raw`R\$\s*` + SIMPLE_AMOUNT + AMOUNT_END, 'gi') },
    { name: 'grouped reais', pattern: new RegExp(BARE_START + GROUPED_AMOUNT + CURRENCY_WORD, 'gi') },
    { name: 'simple reais', pattern: new RegExp(BARE_START + SIMPLE_AMOUNT + CURRENCY_WORD, 'gi') },
];

export const NUMBER_PATTERN = /\d+(?:[.,]\d+)?/g;

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * Return every match of a global regular expression, left to right.
 */
export function scan(text : string, pattern : RegExp) : string[] {
    return text.match(pattern) ?? [];
}

/**
 * Apply each matcher in turn and concatenate the results in matcher order.
 *
 * Matches are neither sorted by position nor deduplicated.
 */
export function runMatchers(text : string, matchers : readonly Matcher[]) : string[] {
    const matches : string[] = [];
    // push one at a time: spreading a large match list overflows the call stack
    for (const matcher of matchers) {
        for (const match of scan(text, matcher.pattern))
            matches.push(match);
    }
    return matches;
}

/**
 * Return every substring of `length` consecutive digits, at every offset.
 *
 * A run longer than `length` yields one match per starting position, so
 * `scanDigitRuns('1234', 3)` is `['123', '234']`.
 */
export function scanDigitRuns(digits : string, length : number) : string[] {
    const matches : string[] = [];
    for (const match of digits.matchAll(new RegExp(`(?=(\\d{${length}}))`, 'g')))
        matches.push(match[1]);
    return matches;
}
