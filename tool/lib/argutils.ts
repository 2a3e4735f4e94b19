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

import * as fs from 'fs';
import * as stream from 'stream';
import byline from 'byline';
import * as argparse from 'argparse';
import csvstringify from 'csv-stringify';

import * as StreamUtils from '../../lib/utils/stream-utils';

/**
 * The options common to all sub-commands.
 */
export interface CommandArgs {
    subcommand : string;
    debug : boolean;
}

export interface SubCommand {
    initArgparse(subparsers : argparse.SubParser) : void;
    execute(args : CommandArgs) : Promise<void>;
}

export function maybeCreateReadStream(filename : string) : stream.Readable {
    if (filename === '-')
        return process.stdin;
    else
        return fs.createReadStream(filename);
}

export function readAllLines(filename : string) : stream.Readable {
    return maybeCreateReadStream(filename).setEncoding('utf8').pipe(byline());
}

export function readInputText(filename : string) : Promise<string> {
    return StreamUtils.readAll(maybeCreateReadStream(filename));
}

export function parseNonNegativeInteger(value : string) : number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0)
        throw new TypeError(`Expected a non-negative integer, got ${value}`);
    return parsed;
}

/**
 * Write all data to the given output, or to standard output if none
 * was given, and wait until it is flushed.
 */
export async function writeOutput(data : string, output ?: stream.Writable) : Promise<void> {
    if (!output) {
        process.stdout.write(data);
        return;
    }
    output.end(data);
    await StreamUtils.waitFinish(output);
}

/**
 * Write rows as tab-separated values.
 */
export async function writeRows(rows : Array<Array<string|number>>, output ?: stream.Writable) : Promise<void> {
    const stringifier = csvstringify({ delimiter: '\t', header: false });
    const done = output ? StreamUtils.waitFinish(output) : StreamUtils.waitEnd(stringifier);
    stringifier.pipe(output ?? process.stdout);
    for (const row of rows)
        stringifier.write(row);
    stringifier.end();
    await done;
}

export function addOutputArgument(parser : argparse.ArgumentParser) : void {
    parser.add_argument('-o', '--output', {
        required: false,
        type: fs.createWriteStream,
        help: 'Path to the output file (defaults to standard output)'
    });
}

export function addInputArgument(parser : argparse.ArgumentParser) : void {
    parser.add_argument('input', {
        help: 'Path to the input text file, or - to read from standard input'
    });
}
