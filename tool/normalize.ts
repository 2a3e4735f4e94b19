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

import { normalizeText, stripHtml } from '../lib/text/normalize';
import * as StreamUtils from '../lib/utils/stream-utils';
import { CommandArgs, readAllLines, addInputArgument, addOutputArgument } from './lib/argutils';

const logger = getLogger('doctext.normalize');

interface NormalizeArgs extends CommandArgs {
    input : string;
    output ?: stream.Writable;
    mode : 'normalize'|'strip-html'|'both';
}

const MODES = {
    'normalize': normalizeText,
    'strip-html': stripHtml,
    'both': (line : string) => normalizeText(stripHtml(line)),
};

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('normalize', {
        add_help: true,
        description: "Normalize text line by line: remove accents and punctuation, lowercase, collapse spaces."
    });
    addOutputArgument(parser);
    parser.add_argument('--mode', {
        required: false,
        default: 'normalize',
        choices: Object.keys(MODES),
        help: 'Normalize the text, remove HTML tags and entities, or remove the markup then normalize.'
    });
    addInputArgument(parser);
}

export async function execute(args : NormalizeArgs) {
    const fn = MODES[args.mode];

    logger.debug(`Processing ${args.input} (mode: ${args.mode})`);
    const output = args.output ?? process.stdout;
    const mapped = readAllLines(args.input).pipe(new StreamUtils.LineMapper(fn));
    const done = args.output ? StreamUtils.waitFinish(output) : StreamUtils.waitEnd(mapped);
    mapped.pipe(output);
    await done;
}
