// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates for version text. Range comparisons keep the checks
 * ASCII-only: `isDigit("٣")` is false even though it is a Unicode digit.
 */

/** Predicate over a single character. */
export type CharPred = (c: string) => boolean;

export const isDigit: CharPred = (c) => c >= "0" && c <= "9";

export const isAlpha: CharPred = (c) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");

export const isAlphaNum: CharPred = (c) => isAlpha(c) || isDigit(c);

/** Characters allowed inside one label segment. */
export const isLabelChar: CharPred = (c) => isAlphaNum(c) || c === "-";
