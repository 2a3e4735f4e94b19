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

const NO_STOPWORDS : ReadonlySet<string> = new Set;

/**
 * Base class for all code that is specific to a certain natural language.
 *
 * The default implementation is used for languages without a dedicated
 * pack: it knows no stopwords, so every word can be a keyword.
 */
export default class LanguagePack {
    readonly locale : string;

    constructor(locale : string) {
        this.locale = locale;
    }

    /**
     * The words that carry no meaning of their own, in normalized form.
     */
    get stopwords() : ReadonlySet<string> {
        return NO_STOPWORDS;
    }

    /**
     * Check if a normalized word is a stopword in this language.
     */
    isStopword(word : string) : boolean {
        return this.stopwords.has(word);
    }

    /**
     * Check if a normalized word is worth reporting as a keyword.
     */
    isGoodKeyword(word : string) : boolean {
        return word.length > 2 && !this.isStopword(word);
    }
}
