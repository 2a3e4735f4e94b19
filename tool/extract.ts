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
import { getLogger } from 'log4js';

import { extractEntities, isEntityKind, ENTITY_KINDS, EntityKind } from '../lib/extraction';
import { stripHtml } from '../lib/text/normalize';
import * as Validation from '../lib/validation';
import {
    CommandArgs,
    readInputText,
    writeOutput,
    writeRows,
    addInputArgument,
    addOutputArgument,
} from './lib/argutils';

const logger = getLogger('doctext.extract');

interface ExtractArgs extends CommandArgs {
    input : string;
    output ?: stream.Writable;
    kind ?: string[];
    format : 'json'|'tsv';
    strip_html : boolean;
    validate : boolean;
}

// kinds whose candidates can be checked one by one
const VALIDATORS : Partial<Record<EntityKind, (value : string) => boolean>> = {
    taxIds: (value) => Validation.isValidCnpj(value) || Validation.isValidCpf(value),
    emails: Validation.isValidEmail,
    dates: (value) => (['DD/MM/YYYY', 'DD-MM-YYYY', 'YYYY-MM-DD', 'DD/MM/YY'] as const)
        .some((format) => Validation.isValidDate(value, format)),
};

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('extract', {
        add_help: true,
        description: "Extract dates, amounts, tax IDs, phone numbers, postal codes and emails from a document."
    });
    addOutputArgument(parser);
    parser.add_argument('--kind', {
        required: false,
        nargs: '+',
        choices: [...ENTITY_KINDS],
        help: 'The kinds of entity to extract (defaults to all).'
    });
    parser.add_argument('--format', {
        required: false,
        default: 'json',
        choices: ['json', 'tsv'],
        help: 'Output a JSON object keyed by kind, or one "kind<TAB>value" line per entity.'
    });
    parser.add_argument('--strip-html', {
        action: 'store_true',
        default: false,
        help: 'Remove HTML markup before extracting.'
    });
    parser.add_argument('--validate', {
        action: 'store_true',
        default: false,
        help: 'Drop tax IDs with wrong check digits, malformed emails and impossible dates.'
    });
    addInputArgument(parser);
}

export async function execute(args : ExtractArgs) {
    const requested : readonly string[] = args.kind ?? ENTITY_KINDS;
    const kinds = requested.filter(isEntityKind);
    let text = await readInputText(args.input);
    if (args.strip_html)
        text = stripHtml(text);

    const entities = extractEntities(text, kinds);
    if (args.validate) {
        for (const kind of kinds) {
            const validator = VALIDATORS[kind];
            const values = entities[kind];
            if (validator && values)
                entities[kind] = values.filter(validator);
        }
    }
    for (const kind of kinds)
        logger.debug(`Found ${entities[kind]?.length ?? 0} ${kind}`);

    if (args.format === 'tsv') {
        const rows : string[][] = [];
        for (const kind of kinds) {
            for (const value of entities[kind] ?? [])
                rows.push([kind, value]);
        }
        await writeRows(rows, args.output);
    } else {
        await writeOutput(JSON.stringify(entities, undefined, 2) + '\n', args.output);
    }
}
