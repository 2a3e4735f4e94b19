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

import { extractKeywords } from '../lib/keywords';
import { DEFAULT_MIN_KEYWORD_FREQUENCY, DEFAULT_LOCALE } from '../lib/config';
import {
    CommandArgs,
    readInputText,
    writeRows,
    parseNonNegativeInteger,
    addInputArgument,
    addOutputArgument,
} from './lib/argutils';

interface KeywordsArgs extends CommandArgs {
    input : string;
    output ?: stream.Writable;
    locale : string;
    min_frequency : number;
    limit ?: number;
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('keywords', {
        add_help: true,
        description: "List the most frequent words of a document, as \"word<TAB>count\" lines."
    });
    addOutputArgument(parser);
    parser.add_argument('-l', '--locale', {
        required: false,
        default: DEFAULT_LOCALE,
        help: `BCP 47 locale tag of the document language, used to pick stopwords (defaults to '${DEFAULT_LOCALE}')`
    });
    parser.add_argument('--min-frequency', {
        required: false,
        type: parseNonNegativeInteger,
        default: DEFAULT_MIN_KEYWORD_FREQUENCY,
        help: `Only list words occurring at least this many times (defaults to ${DEFAULT_MIN_KEYWORD_FREQUENCY})`
    });
    parser.add_argument('--limit', {
        required: false,
        type: parseNonNegativeInteger,
        help: 'Only list this many words.'
    });
    addInputArgument(parser);
}

export async function execute(args : KeywordsArgs) {
    const text = await readInputText(args.input);
    let keywords = extractKeywords(text, args.min_frequency, args.locale);
    if (args.limit !== undefined)
        keywords = keywords.slice(0, args.limit);
    await writeRows(keywords, args.output);
}
