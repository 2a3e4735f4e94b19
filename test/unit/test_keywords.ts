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

import { extractKeywords, Keyword } from '../../lib/keywords';
import * as I18n from '../../lib/i18n';
import PortugueseLanguagePack from '../../lib/i18n/portuguese';

const TEST_CASES : Array<[string, number, string, Keyword[]]> = [
    ['', 2, 'pt-BR', []],
    ['casa casa carro casa carro avião', 2, 'pt-BR', [['casa', 3], ['carro', 2]]],
    ['casa casa carro casa carro avião', 1, 'pt-BR', [['casa', 3], ['carro', 2], ['aviao', 1]]],
    // accented stopwords match their normalized form
    ['Não está, não está: documento documento', 2, 'pt-BR', [['documento', 2]]],
    // words of one or two letters are dropped
    ['aa aa aa bb bb xyz xyz', 2, 'pt-BR', [['xyz', 2]]],
    // ties keep the order of first occurrence
    ['zebra alpha zebra alpha beta', 2, 'pt-BR', [['zebra', 2], ['alpha', 2]]],
    ['para para casa casa', 2, 'pt-PT', [['casa', 2]]],
    // no stopwords for languages without a pack
    ['para para casa casa', 2, 'en-US', [['para', 2], ['casa', 2]]],
];

function testKeywords() {
    for (let i = 0; i < TEST_CASES.length; i++) {
        const [text, minFrequency, locale, expected] = TEST_CASES[i];
        console.log(`Keyword test case #${i+1}`);
        assert.deepStrictEqual(extractKeywords(text, minFrequency, locale), expected);
    }
}

function testDefaults() {
    assert.deepStrictEqual(extractKeywords('Contrato de locação. O contrato vence em maio; contrato renovável.'),
        [['contrato', 3]]);
}

function testLanguagePacks() {
    const pt = I18n.get('pt-BR');
    assert(pt instanceof PortugueseLanguagePack);
    assert.strictEqual(I18n.get('PT-br'), pt);
    assert(I18n.get('pt') instanceof PortugueseLanguagePack);
    assert(!(I18n.get('es-ES') instanceof PortugueseLanguagePack));

    assert.strictEqual(pt.stopwords.size, 184);
    assert(pt.isStopword('nao'));
    assert(pt.isStopword('voce'));
    assert(!pt.isStopword('não'));
    assert(!pt.isStopword('documento'));

    assert(pt.isGoodKeyword('documento'));
    assert(!pt.isGoodKeyword('de'));
    assert(!pt.isGoodKeyword('para'));

    assert.strictEqual(I18n.get('es-ES').stopwords.size, 0);
}

export default async function main() {
    testKeywords();
    testDefaults();
    testLanguagePacks();
}
if (!module.parent)
    main();
