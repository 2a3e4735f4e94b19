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

import { normalizeText, stripHtml } from './text/normalize';
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
    isEntityKind,
    ENTITY_KINDS,
} from './extraction';
import { textSimilarity, jaccard } from './similarity';
import { chunkText, estimateChunkCount, InvalidConfigurationError } from './chunker';
import { extractKeywords } from './keywords';
import { parseJson, isValidJson } from './utils/json';
import {
    truncateForDisplay,
    countWords,
    countCharacters,
    summarize,
} from './utils/text-stats';

import * as I18n from './i18n';
import * as Validation from './validation';
import * as Config from './config';
import * as StreamUtils from './utils/stream-utils';

export type { EntityKind, EntityMap, Matcher } from './extraction';
export type { Keyword } from './keywords';
export type { JsonValue } from './utils/json';
export type { DateFormat } from './validation';

export {
    // normalization
    normalizeText,
    stripHtml,

    // entity extraction
    digitsOnly,
    extractNumbers,
    extractDates,
    extractMonetaryValues,
    extractTaxIds,
    extractPhoneNumbers,
    extractPostalCodes,
    extractEmails,
    extractEntities,
    isEntityKind,
    ENTITY_KINDS,

    // comparison and segmentation
    textSimilarity,
    jaccard,
    chunkText,
    estimateChunkCount,
    InvalidConfigurationError,
    extractKeywords,

    // display
    truncateForDisplay,
    countWords,
    countCharacters,
    summarize,

    parseJson,
    isValidJson,

    I18n,
    Validation,
    Config,
    StreamUtils,
};
