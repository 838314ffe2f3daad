// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the character level. Uses `Array.from()` throughout
 * for correct Unicode surrogate pair handling (string indexing does not).
 * All multi argument functions are curried data-last for `pipe()` composition.
 */

import { Option } from "effect";
import type { CharPred } from "./char";

export const chars = (s: string): readonly string[] => Array.from(s);

/** Lift a `CharPred` to operate on an entire string (every character must satisfy). */
export const all =
  (pred: CharPred) =>
  (s: string): boolean =>
    chars(s).every(pred);

/** First character failing `pred`, if any. */
export const findInvalid =
  (pred: CharPred) =>
  (s: string): Option.Option<string> =>
    Option.fromNullable(chars(s).find((c) => !pred(c)));

/**
 * Split at the first occurrence of `sep` into `[before, after]`.
 * `None` when `sep` does not occur.
 */
export const splitOnce =
  (sep: string) =>
  (s: string): Option.Option<readonly [string, string]> => {
    const at = s.indexOf(sep);
    return at < 0
      ? Option.none()
      : Option.some([s.slice(0, at), s.slice(at + sep.length)] as const);
  };

/** Left-pad with zeros up to `width`. Longer strings pass through. */
export const zeroPad =
  (width: number) =>
  (s: string): string =>
    s.padStart(width, "0");

/** Drop leading zeros, keeping a single `"0"` for all-zero input. */
export const trimLeadingZeros = (digits: string): string => {
  const trimmed = digits.replace(/^0+/, "");
  return trimmed.length === 0 && digits.length > 0 ? "0" : trimmed;
};
