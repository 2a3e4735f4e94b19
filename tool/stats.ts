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

import { countWords, countCharacters, summarize, truncateForDisplay } from '../lib/utils/text-stats';
import { DEFAULT_SUMMARY_WORDS, DEFAULT_DISPLAY_LENGTH } from '../lib/config';
import {
    CommandArgs,
    readInputText,
    writeOutput,
    parseNonNegativeInteger,
    addInputArgument,
    addOutputArgument,
} from './lib/argutils';

interface StatsArgs extends CommandArgs {
    input : string;
    output ?: stream.Writable;
    max_words : number;
    max_length : number;
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('stats', {
        add_help: true,
        description: "Count the words and characters of a document, and show a short summary."
    });
    addOutputArgument(parser);
    parser.add_argument('--max-words', {
        required: false,
        type: parseNonNegativeInteger,
        default: DEFAULT_SUMMARY_WORDS,
        help: `Number of words in the summary (defaults to ${DEFAULT_SUMMARY_WORDS})`
    });
    parser.add_argument('--max-length', {
        required: false,
        type: parseNonNegativeInteger,
        default: DEFAULT_DISPLAY_LENGTH,
        help: `Length of the preview (defaults to ${DEFAULT_DISPLAY_LENGTH})`
    });
    addInputArgument(parser);
}

export async function execute(args : StatsArgs) {
    const text = await readInputText(args.input);
    const stats = {
        words: countWords(text),
        characters: countCharacters(text),
        charactersWithoutSpaces: countCharacters(text, false),
        preview: truncateForDisplay(text, args.max_length),
        summary: summarize(text, args.max_words),
    };
    await writeOutput(JSON.stringify(stats, undefined, 2) + '\n', args.output);
}
