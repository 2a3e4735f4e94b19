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

import { textSimilarity } from '../lib/similarity';
import { addOutputArgument, CommandArgs, readInputText, writeOutput } from './lib/argutils';

interface SimilarityArgs extends CommandArgs {
    first : string;
    second : string;
    output ?: stream.Writable;
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('similarity', {
        add_help: true,
        description: "Compute the Jaccard similarity of the words of two documents."
    });
    parser.add_argument('first', {
        help: 'Path to the first document, or - for standard input'
    });
    parser.add_argument('second', {
        help: 'Path to the second document'
    });
    addOutputArgument(parser);
}

export async function execute(args : SimilarityArgs) {
    const [first, second] = await Promise.all([readInputText(args.first), readInputText(args.second)]);
    await writeOutput(textSimilarity(first, second).toFixed(4) + '\n', args.output);
}
