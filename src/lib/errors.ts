// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Parse error taxonomy. Four tagged classes, one per failure kind, so callers
 * can tell "malformed text" from "well-formed but impossible date" by `_tag`.
 * Messages are built once at construction; the payload keeps the raw parts.
 */

import { Data, Match, pipe } from "effect";

// ─────────────────────────────────────────────────────────────────────────────
// Reasons
// ─────────────────────────────────────────────────────────────────────────────

export type StructuralReason = "empty" | "tooFewComponents" | "trailingData";

export type NumericComponent = "year" | "month" | "day" | "changeset";

export type NumericReason =
  | "empty"
  | "nonDigit"
  | "tooFewDigits"
  | "tooManyDigits"
  | "overflow"
  | "negative"
  | "notInteger";

export type CalendarField = "year" | "month" | "day";

export type LabelReason = "empty" | "emptySegment" | "invalidCharacter";

// ─────────────────────────────────────────────────────────────────────────────
// Error classes
// ─────────────────────────────────────────────────────────────────────────────

/** Wrong number of components, trailing content or empty input. */
export class StructuralError extends Data.TaggedError("StructuralError")<{
  readonly reason: StructuralReason;
  readonly input: string;
  /** Dot-separated numeric components found before the label. */
  readonly found: number;
  readonly message: string;
}> {}

export class NumericConversionError extends Data.TaggedError("NumericConversionError")<{
  readonly component: NumericComponent;
  readonly value: string;
  readonly reason: NumericReason;
  readonly message: string;
}> {}

/** Numbers that parsed but do not name a real calendar day. */
export class CalendarValidationError extends Data.TaggedError("CalendarValidationError")<{
  readonly field: CalendarField;
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly message: string;
}> {}

export class LabelValidationError extends Data.TaggedError("LabelValidationError")<{
  readonly reason: LabelReason;
  readonly label: string;
  /** Zero-based segment position; 0 for an empty label. */
  readonly index: number;
  readonly segment: string;
  readonly message: string;
}> {}

export type ParseError =
  | StructuralError
  | NumericConversionError
  | CalendarValidationError
  | LabelValidationError;

export type ParseErrorTag = ParseError["_tag"];

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

const structuralMessage = (reason: StructuralReason, found: number): string =>
  pipe(
    Match.value(reason),
    Match.when("empty", () => "version string is empty"),
    Match.when(
      "tooFewComponents",
      () => `expected 4 numeric components (year.month.day.changeset), found ${found}`
    ),
    Match.when(
      "trailingData",
      () => `unexpected content after the changeset: found ${found} numeric components`
    ),
    Match.exhaustive
  );

export const structuralError = (
  reason: StructuralReason,
  input: string,
  found: number
): StructuralError =>
  new StructuralError({ reason, input, found, message: structuralMessage(reason, found) });

const numericReasonText = (reason: NumericReason): string =>
  pipe(
    Match.value(reason),
    Match.when("empty", () => "component is empty"),
    Match.when("nonDigit", () => "contains a non-digit character"),
    Match.when("tooFewDigits", () => "needs at least 4 digits"),
    Match.when("tooManyDigits", () => "allows at most 2 digits"),
    Match.when("overflow", () => "value is too large"),
    Match.when("negative", () => "value is negative"),
    Match.when("notInteger", () => "value is not an integer"),
    Match.exhaustive
  );

export const numericError = (
  component: NumericComponent,
  value: string,
  reason: NumericReason
): NumericConversionError =>
  new NumericConversionError({
    component,
    value,
    reason,
    message: `invalid ${component} "${value}": ${numericReasonText(reason)}`,
  });

export const calendarError = (
  field: CalendarField,
  date: { readonly year: number; readonly month: number; readonly day: number }
): CalendarValidationError => {
  const { year, month, day } = date;
  const message = pipe(
    Match.value(field),
    Match.when("year", () => `year ${year} is outside 0-9999`),
    Match.when("month", () => `month ${month} is outside 1-12`),
    Match.when("day", () => `day ${day} does not exist in ${year}.${month}`),
    Match.exhaustive
  );
  return new CalendarValidationError({ field, year, month, day, message });
};

export const labelError = (
  reason: LabelReason,
  label: string,
  index: number,
  segment: string
): LabelValidationError => {
  const message = pipe(
    Match.value(reason),
    Match.when("empty", () => "label is empty"),
    Match.when("emptySegment", () => `label "${label}" has an empty segment at position ${index}`),
    Match.when(
      "invalidCharacter",
      () => `label segment "${segment}" contains a character outside [A-Za-z0-9-]`
    ),
    Match.exhaustive
  );
  return new LabelValidationError({ reason, label, index, segment, message });
};

// ─────────────────────────────────────────────────────────────────────────────
// Inspection
// ─────────────────────────────────────────────────────────────────────────────

export const isParseError = (u: unknown): u is ParseError =>
  u instanceof StructuralError ||
  u instanceof NumericConversionError ||
  u instanceof CalendarValidationError ||
  u instanceof LabelValidationError;

/** One diagnostic line naming the failure kind, e.g. `calendar: month 13 is outside 1-12`. */
export const describeParseError = (error: ParseError): string => {
  const kind = pipe(
    Match.value(error),
    Match.tag("StructuralError", () => "structure"),
    Match.tag("NumericConversionError", () => "number"),
    Match.tag("CalendarValidationError", () => "calendar"),
    Match.tag("LabelValidationError", () => "label"),
    Match.exhaustive
  );
  return `${kind}: ${error.message}`;
};
