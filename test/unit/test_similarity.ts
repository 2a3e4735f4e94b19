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

import { textSimilarity, jaccard } from '../../lib/similarity';

const TEST_CASES : Array<[string, string, number]> = [
    ['', 'qualquer coisa', 0],
    ['qualquer coisa', '', 0],
    ['abc', 'abc', 1],
    ['!!!', 'abc', 0],
    ['nota fiscal eletrônica', 'Nota Fiscal de serviço', 0.4],
    ['casa casa casa', 'casa', 1],
    ['Ação judicial', 'acao JUDICIAL', 1],
    ['um dois', 'três quatro', 0],
];

export default async function main() {
    for (let i = 0; i < TEST_CASES.length; i++) {
        const [one, two, expected] = TEST_CASES[i];
        console.log(`Similarity test case #${i+1}`);
        assert.strictEqual(textSimilarity(one, two), expected);
        assert.strictEqual(textSimilarity(two, one), expected);
    }

    assert.strictEqual(jaccard(new Set<number>(), new Set<number>()), 0);
    assert.strictEqual(jaccard(new Set([1, 2, 3]), new Set([2, 3, 4, 5])), 2/5);
}
if (!module.parent)
    main();
