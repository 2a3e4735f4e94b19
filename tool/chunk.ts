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

import { chunkText, estimateChunkCount } from '../lib/chunker';
import { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from '../lib/config';
import { countCharacters } from '../lib/utils/text-stats';
import {
    CommandArgs,
    readInputText,
    writeOutput,
    parseNonNegativeInteger,
    addInputArgument,
    addOutputArgument,
} from './lib/argutils';

const logger = getLogger('doctext.chunk');

interface ChunkArgs extends CommandArgs {
    input : string;
    output ?: stream.Writable;
    size : number;
    overlap : number;
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('chunk', {
        add_help: true,
        description: "Split a document into overlapping chunks, one JSON object per line."
    });
    addOutputArgument(parser);
    parser.add_argument('--size', {
        required: false,
        type: parseNonNegativeInteger,
        default: DEFAULT_CHUNK_SIZE,
        help: `Maximum chunk length in characters (defaults to ${DEFAULT_CHUNK_SIZE})`
    });
    parser.add_argument('--overlap', {
        required: false,
        type: parseNonNegativeInteger,
        default: DEFAULT_CHUNK_OVERLAP,
        help: `Number of characters repeated between consecutive chunks (defaults to ${DEFAULT_CHUNK_OVERLAP})`
    });
    addInputArgument(parser);
}

export async function execute(args : ChunkArgs) {
    const text = await readInputText(args.input);
    const length = countCharacters(text);
    logger.debug(`Splitting ${length} characters into at least ${estimateChunkCount(length, args.size, args.overlap)} chunks`);

    const chunks = chunkText(text, args.size, args.overlap);
    logger.info(`Produced ${chunks.length} chunks`);

    let buffer = '';
    chunks.forEach((chunk, index) => {
        buffer += JSON.stringify({ index, length: countCharacters(chunk), text: chunk }) + '\n';
    });
    await writeOutput(buffer, args.output);
}
