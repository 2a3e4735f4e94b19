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

import * as Stream from 'stream';

/**
 * Read a byte or text stream to the end and decode it as UTF-8.
 */
export function readAll(stream : NodeJS.ReadableStream) : Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks : Buffer[] = [];
        stream.on('data', (chunk : Buffer|string) => {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
        });
        stream.once('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
        stream.on('error', reject);
    });
}

/**
 * A transform stream applying a synchronous function to each line of text,
 * and emitting the result followed by a newline.
 */
export class LineMapper extends Stream.Transform {
    private _fn : (line : string) => string;

    constructor(fn : (line : string) => string) {
        super({
            readableObjectMode: false,
            writableObjectMode: true
        });
        this._fn = fn;
    }

    _transform(line : string|Buffer, encoding : BufferEncoding, callback : Stream.TransformCallback) : void {
        this.push(this._fn(String(line)) + '\n');
        callback();
    }

    _flush(callback : Stream.TransformCallback) : void {
        process.nextTick(callback);
    }
}

export function waitFinish(stream : NodeJS.WritableStream) : Promise<void> {
    return new Promise((resolve, reject) => {
        stream.once('finish', resolve);
        stream.on('error', reject);
    });
}

export function waitEnd(stream : NodeJS.ReadableStream) : Promise<void> {
    return new Promise((resolve, reject) => {
        stream.once('end', resolve);
        stream.on('error', reject);
    });
}
