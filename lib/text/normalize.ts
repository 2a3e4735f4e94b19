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

// every combining mark (Unicode category Mn), which NFD splits off the base letter
const COMBINING_MARKS = /\p{Mn}/gu;

/**
 * Reduce text to its canonical token form: lowercase ASCII letters,
 * digits and single spaces.
 *
 * Accents are removed (`ação` becomes `acao`), every other character
 * outside `[a-z0-9]` becomes a word separator. The function is idempotent.
 */
export function normalizeText(text : string) : string {
    if (!text)
        return '';

    return text.normalize('NFD')
        .replace(COMBINING_MARKS, '')
        .toLowerCase()
        .replace(/[^a-z0-9\s]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Remove HTML markup from text.
 *
 * Tags are matched up to the first `>`, so a `>` inside an attribute value
 * ends the tag early. Entities are deleted, not decoded.
 */
export function stripHtml(text : string) : string {
    if (!text)
        return '';

    return text.replace(/<[^>]+>/g, '')
        .replace(/&[a-zA-Z]+;/g, '')
        .replace(/&#\d+;/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}
