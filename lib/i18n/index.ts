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

import { getLogger } from 'log4js';

import DefaultLanguagePack from './default';
import Portuguese from './portuguese';

export type LanguagePack = DefaultLanguagePack;

interface LPClass {
    new(locale : string) : LanguagePack;
}

const logger = getLogger('doctext.i18n');

const _classes : { [locale : string] : LPClass } = {
    'pt': Portuguese,
};

const _instances = new Map<string, LanguagePack>();

/**
 * Return the language pack for a BCP 47 locale tag.
 *
 * Tags are matched by longest prefix, so `pt-BR` and `pt-PT` both get
 * the Portuguese pack. Packs are created once per tag.
 */
export function get(locale : string) : LanguagePack {
    locale = locale.toLowerCase();
    const cached = _instances.get(locale);
    if (cached)
        return cached;

    const chunks = locale.split('-');
    for (let i = chunks.length; i >= 1; i--) {
        const candidate = chunks.slice(0, i).join('-');
        if (Object.prototype.hasOwnProperty.call(_classes, candidate)) {
            const instance = new (_classes[candidate])(locale);
            _instances.set(locale, instance);
            return instance;
        }
    }
    logger.warn(`Locale ${locale} is not fully supported, keywords will include stopwords.`);
    const instance = new DefaultLanguagePack(locale);
    _instances.set(locale, instance);
    return instance;
}
