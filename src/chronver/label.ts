// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Labels: validation and precedence.
 *
 * Each segment is classified once into a `LabelSegment` so the parser and the
 * comparator agree on what counts as numeric.
 */

import { Array as Arr, Brand, Data, Either, Option, Order, pipe } from "effect";
import { isDigit, isLabelChar } from "../lib/char";
import { type LabelValidationError, labelError } from "../lib/errors";
import { all, findInvalid, trimLeadingZeros } from "../lib/str";
import type { Label } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Segment Classification
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A label segment as the comparator sees it. `Numeric` keeps the digit text so
 * arbitrarily long numbers compare without loss.
 */
export type LabelSegment = Data.TaggedEnum<{
  Numeric: { readonly digits: string };
  Text: { readonly text: string };
}>;

export const { Numeric, Text } = Data.taggedEnum<LabelSegment>();

export const isAllDigits: (s: string) => boolean = (s) => s.length > 0 && all(isDigit)(s);

export const classifySegment = (segment: string): LabelSegment =>
  isAllDigits(segment) ? Numeric({ digits: segment }) : Text({ text: segment });

/** Split a validated label into its segments. */
export const labelSegments = (label: Label): Arr.NonEmptyReadonlyArray<string> => {
  const [head, ...tail] = label.split(".");
  return [head ?? "", ...tail];
};

// ─────────────────────────────────────────────────────────────────────────────
// Validation (Boundary: string -> Either<Label, LabelValidationError>)
// ─────────────────────────────────────────────────────────────────────────────

const brandLabel = Brand.nominal<Label>();

const validateSegment = (
  label: string,
  segment: string,
  index: number
): Option.Option<LabelValidationError> =>
  segment.length === 0
    ? Option.some(labelError("emptySegment", label, index, segment))
    : pipe(
        findInvalid(isLabelChar)(segment),
        Option.map(() => labelError("invalidCharacter", label, index, segment))
      );

/**
 * Validate raw label text (without the leading `-`).
 * This is the ONLY place where label validation logic lives.
 */
export const validateLabel = (raw: string): Either.Either<Label, LabelValidationError> =>
  raw.length === 0
    ? Either.left(labelError("empty", raw, 0, ""))
    : pipe(
        raw.split("."),
        Arr.findFirst((segment: string, index: number) => validateSegment(raw, segment, index)),
        Option.match({
          onNone: (): Either.Either<Label, LabelValidationError> =>
            Either.right(brandLabel(raw)),
          onSome: (error): Either.Either<Label, LabelValidationError> => Either.left(error),
        })
      );

/** Validate a label that may be absent; absence is not an error. */
export const validateOptionalLabel = (
  raw: Option.Option<string>
): Either.Either<Option.Option<Label>, LabelValidationError> =>
  Option.match(raw, {
    onNone: (): Either.Either<Option.Option<Label>, LabelValidationError> =>
      Either.right(Option.none()),
    onSome: (text): Either.Either<Option.Option<Label>, LabelValidationError> =>
      Either.map(validateLabel(text), Option.some),
  });

// ─────────────────────────────────────────────────────────────────────────────
// Precedence (Total functions over validated labels)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compare digit strings by value: fewer significant digits is smaller, then
 * digit order. Equal values fall back to the raw text (`"01"` < `"1"`) so the
 * order never calls two distinct labels equal.
 */
const compareDigits: Order.Order<string> = Order.make((a, b) => {
  const sa = trimLeadingZeros(a);
  const sb = trimLeadingZeros(b);
  return pipe(
    Order.number(sa.length, sb.length),
    (byLength) => (byLength !== 0 ? byLength : Order.string(sa, sb)),
    (byValue) => (byValue !== 0 ? byValue : Order.string(a, b))
  );
});

/** Numeric segments sort before text segments. */
export const LabelSegmentOrder: Order.Order<LabelSegment> = Order.make((a, b) =>
  a._tag === "Numeric"
    ? b._tag === "Numeric"
      ? compareDigits(a.digits, b.digits)
      : -1
    : b._tag === "Text"
      ? Order.string(a.text, b.text)
      : 1
);

/**
 * Segment-wise comparison; when one label is a prefix of the other the
 * shorter one is smaller (`Order.array` compares lengths last).
 */
export const LabelOrder: Order.Order<Label> = Order.mapInput(
  Order.array(LabelSegmentOrder),
  (label: Label) => labelSegments(label).map(classifySegment)
);
