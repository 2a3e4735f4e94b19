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

import {
    digitsOnly,
    extractNumbers,
    extractDates,
    extractMonetaryValues,
    extractTaxIds,
    extractPhoneNumbers,
    extractPostalCodes,
    extractEmails,
    extractEntities,
    ENTITY_KINDS,
} from '../../lib/extraction';

type Extractor = (text : string) => string[];

const TEST_CASES : Array<[Extractor, string, string[]]> = [
    [extractNumbers, 'Itens: 123, 45,6 e 7.89', ['123', '45,6', '7.89']],
    [extractNumbers, 'sem números', []],

    [extractDates, 'Pagamento em 15/01/2024 e 2024-01-20', ['15/01/2024', '2024-01-20']],
    // pattern order, not position order
    [extractDates, 'De 2024-01-20 até 15/01/2024', ['15/01/2024', '2024-01-20']],
    [extractDates, 'Vence 05-03-2025 ou 05/03/25', ['05-03-2025', '05/03/25']],
    // no calendar validation
    [extractDates, 'Data: 99/99/9999', ['99/99/9999']],
    [extractDates, 'Protocolo 123/45/678901', []],

    [extractMonetaryValues, 'Valor: R$ 1.234,56 ou 50 reais', ['R$ 1.234,56', '50 reais']],
    [extractMonetaryValues, 'Total R$1.500,00 e R$ 250,90; multa de 1.000 reais e 3 real',
     ['R$1.500,00', 'R$ 250,90', '1.000 reais', '3 real']],
    [extractMonetaryValues, 'r$ 10,00 ou 10 REAIS', ['r$ 10,00', '10 REAIS']],
    [extractMonetaryValues, 'Pagos 2 de 3 realizados', []],
    // repeated amounts are not deduplicated
    [extractMonetaryValues, 'R$ 5,00 + R$ 5,00', ['R$ 5,00', 'R$ 5,00']],

    [extractTaxIds, 'CNPJ: 12.345.678/9012-34', [
        '12345678901234',
        '12345678901', '23456789012', '34567890123', '45678901234'
    ]],
    [extractTaxIds, 'CPF 123.456.789-09', ['12345678909']],
    [extractTaxIds, 'Nenhum documento', []],

    [extractPhoneNumbers, 'Tel: (11) 3456-7890', ['1134567890']],
    [extractPhoneNumbers, 'Cel: (11) 98765-4321', ['1198765432', '1987654321', '11987654321']],

    [extractPostalCodes, 'CEP 01310-100', ['01310100']],
    // digits of the next field merge into the same run
    [extractPostalCodes, 'CEP 01310-100, nº 5', ['01310100', '13101005']],

    [extractEmails, 'Contato: joao.silva@example.com.br ou FINANCEIRO@Empresa.COM.',
     ['joao.silva@example.com.br', 'FINANCEIRO@Empresa.COM']],
    [extractEmails, 'usuario@localhost', []],
];

function testExtractors() {
    for (let i = 0; i < TEST_CASES.length; i++) {
        const [extractor, input, expected] = TEST_CASES[i];
        console.log(`Extraction test case #${i+1} (${extractor.name})`);
        assert.deepStrictEqual(extractor(input), expected);
    }
}

function testEmptyInput() {
    for (const extractor of [extractNumbers, extractDates, extractMonetaryValues, extractTaxIds,
                             extractPhoneNumbers, extractPostalCodes, extractEmails])
        assert.deepStrictEqual(extractor(''), []);
}

function testDigitsOnly() {
    assert.strictEqual(digitsOnly('(11) 3456-7890'), '1134567890');
    assert.strictEqual(digitsOnly('sem dígitos'), '');
    assert.strictEqual(digitsOnly(''), '');
}

function testExtractEntities() {
    const text = 'Recebemos R$ 300,00 em 10/02/2024 de contato@example.com, CEP 01310-100.';

    const all = extractEntities(text);
    assert.deepStrictEqual(Object.keys(all), [...ENTITY_KINDS]);
    assert.deepStrictEqual(all.dates, ['10/02/2024']);
    assert.deepStrictEqual(all.monetaryValues, ['R$ 300,00']);
    assert.deepStrictEqual(all.emails, ['contato@example.com']);
    assert.deepStrictEqual(all.numbers, ['300,00', '10', '02', '2024', '01310', '100']);

    assert.deepStrictEqual(extractEntities(text, ['dates', 'emails']), {
        dates: ['10/02/2024'],
        emails: ['contato@example.com'],
    });

    const empty = extractEntities('');
    for (const kind of ENTITY_KINDS)
        assert.deepStrictEqual(empty[kind], []);
    // without a kind list every kind is present
    assert.strictEqual(empty.taxIds.length, 0);
}

function testManyMatches() {
    const dates = extractDates('01/01/2024 '.repeat(250000));
    assert.strictEqual(dates.length, 250000);
    assert.strictEqual(dates[249999], '01/01/2024');

    const amounts = extractMonetaryValues('R$ 1,00 '.repeat(250000));
    assert.strictEqual(amounts.length, 250000);
    assert.strictEqual(amounts[0], 'R$ 1,00');
}

export default async function main() {
    testExtractors();
    testEmptyInput();
    testDigitsOnly();
    testExtractEntities();
    testManyMatches();
}
if (!module.parent)
    main();
