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

import * as argparse from 'argparse';
import * as stream from 'stream';

import * as Validation from '../lib/validation';
import { addOutputArgument, CommandArgs, writeRows } from './lib/argutils';

type ValueKind = 'cpf'|'cnpj'|'email'|'cep'|'phone'|'date'|'money';

const VALIDATORS : Record<ValueKind, (value : string, format : Validation.DateFormat) => boolean> = {
    cpf: Validation.isValidCpf,
    cnpj: Validation.isValidCnpj,
    email: Validation.isValidEmail,
    cep: Validation.isValidPostalCode,
    phone: Validation.isValidPhoneNumber,
    date: Validation.isValidDate,
    money: Validation.isValidMonetaryValue,
};

interface ValidateArgs extends CommandArgs {
    kind : ValueKind;
    date_format : string;
    values : string[];
    output ?: stream.Writable;
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('validate', {
        add_help: true,
        description: "Check values one by one, printing \"value<TAB>true|false\" lines."
    });
    parser.add_argument('--kind', {
        required: true,
        choices: Object.keys(VALIDATORS),
        help: 'The kind of value to check.'
    });
    parser.add_argument('--date-format', {
        required: false,
        default: 'DD/MM/YYYY',
        choices: ['DD/MM/YYYY', 'DD-MM-YYYY', 'YYYY-MM-DD', 'DD/MM/YY'],
        help: 'The expected format of dates (defaults to DD/MM/YYYY).'
    });
    parser.add_argument('values', {
        nargs: '+',
        help: 'The values to check.'
    });
    addOutputArgument(parser);
}

export async function execute(args : ValidateArgs) {
    const format = Validation.isDateFormat(args.date_format) ? args.date_format : 'DD/MM/YYYY';
    const validator = VALIDATORS[args.kind];
    await writeRows(args.values.map((value) => [value, String(validator(value, format))]), args.output);
}
