#!/usr/bin/env node
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

process.on('unhandledRejection', (up) => {
    throw up;
});

import * as argparse from 'argparse';
import * as log4js from 'log4js';

import { LOG_LEVEL } from '../lib/config';
import { CommandArgs, SubCommand } from './lib/argutils';

import * as Normalize from './normalize';
import * as Extract from './extract';
import * as Chunk from './chunk';
import * as Keywords from './keywords';
import * as Similarity from './similarity';
import * as Stats from './stats';
import * as Validate from './validate';

const subcommands : { [key : string] : SubCommand } = {
    'normalize': Normalize,
    'extract': Extract,
    'chunk': Chunk,
    'keywords': Keywords,
    'similarity': Similarity,
    'stats': Stats,
    'validate': Validate,
};

function configureLogging(debug : boolean) {
    // stdout carries the command output, so all logs go to stderr
    log4js.configure({
        appenders: {
            stderr: { type: 'stderr' },
        },
        categories: {
            default: { appenders: ['stderr'], level: debug ? 'debug' : LOG_LEVEL },
        },
    });
}

async function main() {
    const parser = new argparse.ArgumentParser({
        add_help: true,
        description: "Normalize OCR'd document text and extract structured entities from it."
    });
    parser.add_argument('--debug', {
        action: 'store_true',
        default: false,
        help: 'Enable debug logging.'
    });

    const subparsers = parser.add_subparsers({
        title: 'Available sub-commands',
        dest: 'subcommand',
        required: true
    } as argparse.SubparserOptions);
    for (const subcommand in subcommands)
        subcommands[subcommand].initArgparse(subparsers);

    const args : CommandArgs = parser.parse_args();
    configureLogging(args.debug);

    const logger = log4js.getLogger('doctext');
    try {
        await subcommands[args.subcommand].execute(args);
    } catch(e) {
        logger.error(`${args.subcommand} failed: ${e instanceof Error ? e.message : String(e)}`);
        if (e instanceof Error && e.stack)
            logger.debug(e.stack);
        process.exitCode = 1;
    } finally {
        await new Promise<void>((resolve) => log4js.shutdown(() => resolve()));
    }
}
main().catch((e) => {
    console.error(e);
    process.exit(1);
});
