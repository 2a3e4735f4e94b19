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

import { normalizeText, stripHtml } from '../../lib/text/normalize';

const NORMALIZE_TEST_CASES : Array<[string, string]> = [
    ['', ''],
    ['Ação É Válida!', 'acao e valida'],
    ['  Nota   Fiscal\n\tNº 123/2024 ', 'nota fiscal n 123 2024'],
    ['São Paulo-SP, 1º andar', 'sao paulo sp 1 andar'],
    ['Straße', 'stra e'],
    ['R$ 1.234,56', 'r 1 234 56'],
    ['already normalized text', 'already normalized text'],
];

const STRIP_HTML_TEST_CASES : Array<[string, string]> = [
    ['', ''],
    ['<p>Olá&nbsp;mundo &#169; <b>2024</b></p>', 'Olámundo 2024'],
    ['<div>\n  linha 1\n  <br/>linha 2\n</div>', 'linha 1 linha 2'],
    // the tag ends at the first >, even inside an attribute
    ['<a title="x>y">link</a>', 'y">link'],
    ['sem marcação', 'sem marcação'],
];

function testNormalize() {
    for (let i = 0; i < NORMALIZE_TEST_CASES.length; i++) {
        const [input, expected] = NORMALIZE_TEST_CASES[i];
        console.log(`Normalize test case #${i+1}`);
        const normalized = normalizeText(input);
        assert.strictEqual(normalized, expected);
        assert.strictEqual(normalizeText(normalized), normalized);
    }
}

function testNormalizeOutputAlphabet() {
    const normalized = normalizeText('Çà ü—​ «ÅNGSTRÖM» 42°C\r\n');
    assert.match(normalized, /^[a-z0-9]+( [a-z0-9]+)*$/);
    assert.strictEqual(normalized, 'ca u angstrom 42 c');
}

function testStripHtml() {
    for (let i = 0; i < STRIP_HTML_TEST_CASES.length; i++) {
        const [input, expected] = STRIP_HTML_TEST_CASES[i];
        console.log(`Strip HTML test case #${i+1}`);
        assert.strictEqual(stripHtml(input), expected);
    }
}

export default async function main() {
    testNormalize();
    testNormalizeOutputAlphabet();
    testStripHtml();
}
if (!module.parent)
    main();
