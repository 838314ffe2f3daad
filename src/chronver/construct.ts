// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Smart constructors and pure transformations.
 *
 * Direct construction re-checks every rule the parser applies, so a `Version`
 * built from numbers is indistinguishable from one parsed from text.
 */

import { Either, Option, pipe } from "effect";
import { BREAK_LABEL_DEFAULT, type TimeZone } from "../config/field-values";
import {
  type NumericComponent,
  type NumericConversionError,
  type ParseError,
  numericError,
} from "../lib/errors";
import { calendarDateOf, validateCalendarDate } from "./calendar";
import { validateOptionalLabel } from "./label";
import { parse } from "./parse";
import { type Label, type Version, type VersionFields, fromValidated } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Smart Constructors (Runtime validation: input -> Either<Version, ParseError>)
// ─────────────────────────────────────────────────────────────────────────────

export interface VersionInput {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  /** Defaults to 0. */
  readonly changeset?: number;
  readonly label?: string;
}

const checkComponent = (
  component: NumericComponent,
  value: number
): Either.Either<number, NumericConversionError> =>
  pipe(
    Either.right(value),
    Either.filterOrLeft(Number.isInteger, () =>
      numericError(component, String(value), "notInteger")
    ),
    Either.filterOrLeft(
      (n: number) => n >= 0,
      () => numericError(component, String(value), "negative")
    ),
    Either.filterOrLeft(Number.isSafeInteger, () =>
      numericError(component, String(value), "overflow")
    ),
    // -0 passes the range checks; store it as 0
    Either.map(Math.abs)
  );

/**
 * Build a version from components, applying the same rules as `parse`.
 *
 * @example
 * make({ year: 2024, month: 2, day: 29, changeset: 1 }) // Right(2024.2.29.1)
 * make({ year: 2023, month: 2, day: 29 })               // Left(CalendarValidationError)
 */
export const make = (input: VersionInput): Either.Either<Version, ParseError> =>
  Either.gen(function* () {
    const numbers = yield* Either.all({
      year: checkComponent("year", input.year),
      month: checkComponent("month", input.month),
      day: checkComponent("day", input.day),
      changeset: checkComponent("changeset", input.changeset ?? 0),
    });
    const date = yield* validateCalendarDate(numbers);
    const label = yield* validateOptionalLabel(Option.fromNullable(input.label));
    return fromValidated({ ...date, label });
  });

/**
 * Version for a JS `Date` with changeset 0 and no label. Invalid dates fail
 * as `notInteger` components.
 */
export const fromDate = (
  date: Date,
  timeZone: TimeZone = "local"
): Either.Either<Version, ParseError> => make(calendarDateOf(date, timeZone));

// ─────────────────────────────────────────────────────────────────────────────
// Literal Constructor (Compile-time shaped)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Template literal type for `YYYY.MM.DD.CHANGESET[-LABEL]`. It only checks the
 * shape; calendar and label rules are still checked when the value is built.
 */
export type ChronVerLiteral =
  | `${number}.${number}.${number}.${number}`
  | `${number}.${number}.${number}.${number}-${string}`;

/**
 * Construct a version from a string literal.
 *
 * USAGE: chronVer("2024.1.9.0-rc.1") - literal only, no variables.
 * Throws the ParseError for a literal that is not a valid version.
 */
export const chronVer = <const S extends ChronVerLiteral>(literal: S): Version =>
  pipe(
    parse(literal),
    Either.getOrThrowWith((error): ParseError => error)
  );

// ─────────────────────────────────────────────────────────────────────────────
// Transformations (never mutate; every result is a new Version)
// ─────────────────────────────────────────────────────────────────────────────

const inputOf = (v: VersionFields): VersionInput => ({
  year: v.year,
  month: v.month,
  day: v.day,
  changeset: v.changeset,
  ...pipe(
    v.label,
    Option.match({
      onNone: (): Record<string, never> => ({}),
      onSome: (label): { readonly label: string } => ({ label }),
    })
  ),
});

export const withLabel = (v: Version, label: string): Either.Either<Version, ParseError> =>
  make({ ...inputOf(v), label });

export const withChangeset = (v: Version, changeset: number): Either.Either<Version, ParseError> =>
  make({ ...inputOf(v), changeset });

export const withoutLabel = (v: Version): Version =>
  fromValidated({
    year: v.year,
    month: v.month,
    day: v.day,
    changeset: v.changeset,
    label: Option.none(),
  });

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export const labelOf = (v: Version): Option.Option<Label> => v.label;

/**
 * Whether the version's label marks a breaking release.
 *
 * @example
 * isBreaking(chronVer("2024.4.3.1-break")) // true
 * isBreaking(chronVer("2024.4.3.1"))       // false
 */
export const isBreaking = (v: Version, breakLabel: string = BREAK_LABEL_DEFAULT): boolean =>
  Option.exists(v.label, (label) => label === breakLabel);
