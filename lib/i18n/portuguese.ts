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

import DefaultLanguagePack from './default';
import { normalizeText } from '../text/normalize';

import STOPWORD_LIST from '../../data/stopwords/pt.json';

// the list is written with accents; tokens are compared after normalization,
// so "não" and "está" must be stored as "nao" and "esta"
const STOPWORDS : ReadonlySet<string> = new Set(STOPWORD_LIST.map(normalizeText));

/**
 * Portuguese (Brazilian and European).
 */
export default class PortugueseLanguagePack extends DefaultLanguagePack {
    get stopwords() : ReadonlySet<string> {
        return STOPWORDS;
    }
}
