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

export type JsonValue =
    string |
    number |
    boolean |
    null |
    JsonValue[] |
    { [key : string] : JsonValue };

/**
 * Parse a JSON document, returning `undefined` instead of throwing if the
 * input is not a string or not valid JSON.
 *
 * Note that the document `null` parses to `null`, not `undefined`.
 */
export function parseJson(text : unknown) : JsonValue|undefined {
    if (typeof text !== 'string')
        return undefined;

    try {
        return JSON.parse(text);
    } catch(e) {
        if (e instanceof SyntaxError)
            return undefined;
        throw e;
    }
}

export function isValidJson(text : unknown) : boolean {
    return parseJson(text) !== undefined;
}
