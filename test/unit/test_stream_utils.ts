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

import assert from 'assert';
import * as Stream from 'stream';

import * as StreamUtils from '../../lib/utils/stream-utils';
import { normalizeText } from '../../lib/text/normalize';

async function testReadAll() {
    const input = Stream.Readable.from([Buffer.from('Nota '), Buffer.from('fiscal ação')]);
    assert.strictEqual(await StreamUtils.readAll(input), 'Nota fiscal ação');

    assert.strictEqual(await StreamUtils.readAll(Stream.Readable.from([])), '');
}

async function testReadAllSplitCharacter() {
    // "ç" is two bytes in UTF-8, split across two chunks
    const bytes = Buffer.from('aço', 'utf8');
    const input = Stream.Readable.from([bytes.subarray(0, 2), bytes.subarray(2)]);
    assert.strictEqual(await StreamUtils.readAll(input), 'aço');
}

async function testLineMapper() {
    const mapper = new StreamUtils.LineMapper(normalizeText);
    const output = StreamUtils.readAll(mapper);
    mapper.write('Ação Fiscal');
    mapper.write('Nº 1');
    mapper.end();
    assert.strictEqual(await output, 'acao fiscal\nn 1\n');
}

export default async function main() {
    await testReadAll();
    await testReadAllSplitCharacter();
    await testLineMapper();
}
if (!module.parent)
    main();
