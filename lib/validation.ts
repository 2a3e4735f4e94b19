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

import { digitsOnly } from './extraction';
import { MONETARY_MATCHERS } from './extraction/matchers';

// Validators for single values, typically the output of one of the extractors.
// The extractors never call these: filtering is left to the caller.

const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const CNPJ_WEIGHTS_1 = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_WEIGHTS_2 = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const CPF_WEIGHTS_1 = [10, 9, 8, 7, 6, 5, 4, 3, 2];
const CPF_WEIGHTS_2 = [11, 10, 9, 8, 7, 6, 5, 4, 3, 2];

export type DateFormat = 'DD/MM/YYYY' | 'DD-MM-YYYY' | 'YYYY-MM-DD' | 'DD/MM/YY';

interface DateParser {
    regex : RegExp;
    parse(match : RegExpExecArray) : { year : number; month : number; day : number };
}

// two-digit years follow the POSIX strptime convention
function expandYear(yy : number) : number {
    return yy < 69 ? 2000 + yy : 1900 + yy;
}

const DATE_PARSERS : Record<DateFormat, DateParser> = {
    'DD/MM/YYYY': {
        regex: /^(\d{2})\/(\d{2})\/(\d{4})$/,
        parse: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: Number(m[3]) })
    },
    'DD-MM-YYYY': {
        regex: /^(\d{2})-(\d{2})-(\d{4})$/,
        parse: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: Number(m[3]) })
    },
    'YYYY-MM-DD': {
        regex: /^(\d{4})-(\d{2})-(\d{2})$/,
        parse: (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) })
    },
    'DD/MM/YY': {
        regex: /^(\d{2})\/(\d{2})\/(\d{2})$/,
        parse: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: expandYear(Number(m[3])) })
    },
};

function isLeapYear(year : number) : boolean {
    return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

function daysInMonth(year : number, month : number) : number {
    if (month === 2)
        return isLeapYear(year) ? 29 : 28;
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

// mod-11 check digit, as used by both CPF and CNPJ
function checkDigit(digits : string, weights : number[]) : number {
    let sum = 0;
    for (let i = 0; i < weights.length; i++)
        sum += Number(digits[i]) * weights[i];
    const remainder = sum % 11;
    return remainder < 2 ? 0 : 11 - remainder;
}

function hasValidCheckDigits(value : string, length : number, weights1 : number[], weights2 : number[]) : boolean {
    const digits = digitsOnly(value);
    if (digits.length !== length)
        return false;
    // 000.000.000-00, 111.111.111-11 and so on pass the checksum but are not issued
    if (/^(\d)\1*$/.test(digits))
        return false;

    if (Number(digits[weights1.length]) !== checkDigit(digits, weights1))
        return false;
    return Number(digits[weights2.length]) === checkDigit(digits, weights2);
}

export function isValidEmail(email : string) : boolean {
    if (!email)
        return false;
    return EMAIL_REGEX.test(email);
}

/**
 * Check that the value is a CNPJ with correct check digits. Punctuation is
 * ignored, so both `11.222.333/0001-81` and `11222333000181` are accepted.
 */
export function isValidCnpj(cnpj : string) : boolean {
    if (!cnpj)
        return false;
    return hasValidCheckDigits(cnpj, 14, CNPJ_WEIGHTS_1, CNPJ_WEIGHTS_2);
}

/**
 * Check that the value is a CPF with correct check digits. Punctuation is
 * ignored.
 */
export function isValidCpf(cpf : string) : boolean {
    if (!cpf)
        return false;
    return hasValidCheckDigits(cpf, 11, CPF_WEIGHTS_1, CPF_WEIGHTS_2);
}

export function isValidPostalCode(cep : string) : boolean {
    if (!cep)
        return false;
    return digitsOnly(cep).length === 8;
}

export function isValidPhoneNumber(phone : string) : boolean {
    if (!phone)
        return false;
    const length = digitsOnly(phone).length;
    return length === 10 || length === 11;
}

/**
 * Check that the value is written in the given format and names a real
 * day of the (proleptic Gregorian) calendar.
 */
export function isValidDate(date : string, format : DateFormat = 'DD/MM/YYYY') : boolean {
    if (!date)
        return false;

    const parser = DATE_PARSERS[format];
    const match = parser.regex.exec(date);
    if (match === null)
        return false;

    const { year, month, day } = parser.parse(match);
    if (year < 1 || month < 1 || month > 12 || day < 1)
        return false;
    return day <= daysInMonth(year, month);
}

export function isDateFormat(format : string) : format is DateFormat {
    return Object.prototype.hasOwnProperty.call(DATE_PARSERS, format);
}

/**
 * Check that the whole value is one monetary amount, in one of the shapes
 * recognized by {@link extractMonetaryValues}.
 */
export function isValidMonetaryValue(value : string) : boolean {
    if (!value)
        return false;

    const trimmed = value.trim();
    return MONETARY_MATCHERS.some((matcher) => {
        const whole = new RegExp('^(?:' + matcher.pattern.source + ')$', 'i');
        return whole.test(trimmed);
    });
}
