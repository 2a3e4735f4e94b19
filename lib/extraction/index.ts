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

import {
    DATE_MATCHERS,
    MONETARY_MATCHERS,
    NUMBER_PATTERN,
    EMAIL_PATTERN,
    scan,
    runMatchers,
    scanDigitRuns,
} from './matchers';

export type { Matcher } from './matchers';
export { DATE_MATCHERS, MONETARY_MATCHERS } from './matchers';

const CNPJ_LENGTH = 14;
const CPF_LENGTH = 11;
const LANDLINE_LENGTH = 10;
const MOBILE_LENGTH = 11;
const CEP_LENGTH = 8;

export type EntityKind =
    'numbers' |
    'dates' |
    'monetaryValues' |
    'taxIds' |
    'phoneNumbers' |
    'postalCodes' |
    'emails';

export type EntityMap = Record<EntityKind, string[]>;

/**
 * Remove every character that is not an ASCII digit.
 *
 * This is the first stage of tax ID, phone number and postal code
 * extraction: digits from separate fields of the document end up in
 * the same run.
 */
export function digitsOnly(text : string) : string {
    if (!text)
        return '';
    return text.replace(/[^0-9]/g, '');
}

export function extractNumbers(text : string) : string[] {
    if (!text)
        return [];
    return scan(text, NUMBER_PATTERN);
}

/**
 * Extract dates written as DD/MM/YYYY, DD-MM-YYYY, YYYY-MM-DD or DD/MM/YY.
 *
 * All matches of the first shape come first, then all of the second,
 * and so on. `99/99/9999` is a date as far as this function is concerned.
 */
export function extractDates(text : string) : string[] {
    if (!text)
        return [];
    return runMatchers(text, DATE_MATCHERS);
}

/**
 * Extract amounts in Brazilian reais, either prefixed with `R$` or
 * followed by the word "real" or "reais".
 *
 * The matched text is returned as written; it is not converted to a number.
 */
export function extractMonetaryValues(text : string) : string[] {
    if (!text)
        return [];
    return runMatchers(text, MONETARY_MATCHERS);
}

/**
 * Extract CNPJ (14 digits) and CPF (11 digits) candidates.
 *
 * The scan runs over {@link digitsOnly}, and reports every offset, so a
 * single CNPJ also yields four CPF candidates. Check digits are not
 * verified; see {@link isValidCnpj} and {@link isValidCpf}.
 */
export function extractTaxIds(text : string) : string[] {
    const digits = digitsOnly(text);
    if (!digits)
        return [];
    return [...scanDigitRuns(digits, CNPJ_LENGTH), ...scanDigitRuns(digits, CPF_LENGTH)];
}

/**
 * Extract phone number candidates: 10-digit runs (area code and landline),
 * then 11-digit runs (area code and mobile).
 */
export function extractPhoneNumbers(text : string) : string[] {
    const digits = digitsOnly(text);
    if (!digits)
        return [];
    return [...scanDigitRuns(digits, LANDLINE_LENGTH), ...scanDigitRuns(digits, MOBILE_LENGTH)];
}

export function extractPostalCodes(text : string) : string[] {
    const digits = digitsOnly(text);
    if (!digits)
        return [];
    return scanDigitRuns(digits, CEP_LENGTH);
}

export function extractEmails(text : string) : string[] {
    if (!text)
        return [];
    return scan(text, EMAIL_PATTERN);
}

const EXTRACTORS : Record<EntityKind, (text : string) => string[]> = {
    numbers: extractNumbers,
    dates: extractDates,
    monetaryValues: extractMonetaryValues,
    taxIds: extractTaxIds,
    phoneNumbers: extractPhoneNumbers,
    postalCodes: extractPostalCodes,
    emails: extractEmails,
};

export const ENTITY_KINDS : readonly EntityKind[] = [
    'numbers',
    'dates',
    'monetaryValues',
    'taxIds',
    'phoneNumbers',
    'postalCodes',
    'emails',
];

export function isEntityKind(kind : string) : kind is EntityKind {
    const kinds : readonly string[] = ENTITY_KINDS;
    return kinds.includes(kind);
}

/**
 * Run the extractors of the given kinds (all of them by default) over
 * the same text.
 */
export function extractEntities(text : string) : EntityMap;
export function extractEntities(text : string, kinds : readonly EntityKind[]) : Partial<EntityMap>;
export function extractEntities(text : string, kinds : readonly EntityKind[] = ENTITY_KINDS) : Partial<EntityMap> {
    const entities : Partial<EntityMap> = {};
    for (const kind of kinds)
        entities[kind] = EXTRACTORS[kind](text);
    return entities;
}
