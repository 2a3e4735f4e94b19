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

/**
 * The default window size of {@link chunkText}, in characters.
 */
export const DEFAULT_CHUNK_SIZE = 1000;

/**
 * The default number of characters shared by two consecutive chunks.
 */
export const DEFAULT_CHUNK_OVERLAP = 100;

/**
 * The default minimum number of occurrences for a word to be reported
 * as a keyword.
 */
export const DEFAULT_MIN_KEYWORD_FREQUENCY = 2;

/**
 * The default maximum length of text shown by {@link truncateForDisplay}.
 */
export const DEFAULT_DISPLAY_LENGTH = 100;

/**
 * The default number of words kept by {@link summarize}.
 */
export const DEFAULT_SUMMARY_WORDS = 50;

/**
 * The locale used to pick stopwords when the caller does not specify one.
 */
export const DEFAULT_LOCALE = 'pt-BR';

/**
 * The log level used by the command-line tool, unless overridden
 * with `--debug`.
 */
export const LOG_LEVEL = process.env.DOCTEXT_LOG_LEVEL || 'info';
