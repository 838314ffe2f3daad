// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Text to `Version`.
 *
 * Left to right: split off the label at the first `-`, split the rest into
 * exactly four numeric components, convert each, check the calendar, then
 * check the label. The first failure wins.
 */

import { Either, Option, pipe } from "effect";
import {
  type NumericComponent,
  type NumericConversionError,
  type ParseError,
  type StructuralError,
  numericError,
  structuralError,
} from "../lib/errors";
import { splitOnce } from "../lib/str";
import { validateCalendarDate } from "./calendar";
import { isAllDigits, validateOptionalLabel } from "./label";
import { type Version, fromValidated } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Parsing Primitives (Internal)
// ─────────────────────────────────────────────────────────────────────────────

const COMPONENT_COUNT = 4;

interface DigitRule {
  readonly minDigits: number;
  readonly maxDigits: number;
}

const DIGIT_RULES: Readonly<Record<NumericComponent, DigitRule>> = {
  year: { minDigits: 4, maxDigits: Number.POSITIVE_INFINITY },
  month: { minDigits: 1, maxDigits: 2 },
  day: { minDigits: 1, maxDigits: 2 },
  changeset: { minDigits: 1, maxDigits: Number.POSITIVE_INFINITY },
};

type Components = readonly [year: string, month: string, day: string, changeset: string];

/** Uses a type guard for noUncheckedIndexedAccess compatibility. */
const isComponents = (parts: readonly string[]): parts is Components =>
  parts.length === COMPONENT_COUNT;

const splitComponents = (
  input: string,
  numeric: string
): Either.Either<Components, StructuralError> => {
  const parts = numeric.split(".");
  return isComponents(parts)
    ? Either.right(parts)
    : Either.left(
        structuralError(
          parts.length < COMPONENT_COUNT ? "tooFewComponents" : "trailingData",
          input,
          parts.length
        )
      );
};

/**
 * Convert one numeric component. Leading zeros are fine; only the digit count
 * rules and the safe-integer range apply.
 */
export const parseNumericComponent = (
  component: NumericComponent,
  text: string
): Either.Either<number, NumericConversionError> => {
  const rule = DIGIT_RULES[component];
  return pipe(
    Either.right(text),
    Either.filterOrLeft(
      (t: string) => t.length > 0,
      () => numericError(component, text, "empty")
    ),
    Either.filterOrLeft(isAllDigits, () => numericError(component, text, "nonDigit")),
    Either.filterOrLeft(
      (t: string) => t.length >= rule.minDigits,
      () => numericError(component, text, "tooFewDigits")
    ),
    Either.filterOrLeft(
      (t: string) => t.length <= rule.maxDigits,
      () => numericError(component, text, "tooManyDigits")
    ),
    Either.map((t: string) => Number.parseInt(t, 10)),
    Either.filterOrLeft(Number.isSafeInteger, () => numericError(component, text, "overflow"))
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Parsing (Boundary: string -> Either<Version, ParseError>)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse `YYYY.MM.DD.CHANGESET[-LABEL]`.
 *
 * @example
 * parse("2023.5.17.3-beta.2") // Right(Version 2023.5.17.3-beta.2)
 * parse("2024.1.9")           // Left(StructuralError tooFewComponents)
 * parse("2023.02.29.0")       // Left(CalendarValidationError day)
 */
export const parse = (input: string): Either.Either<Version, ParseError> =>
  Either.gen(function* () {
    if (input.length === 0) {
      return yield* Either.left(structuralError("empty", input, 0));
    }

    const [numeric, rawLabel] = pipe(
      splitOnce("-")(input),
      Option.match({
        onNone: (): readonly [string, Option.Option<string>] => [input, Option.none()],
        onSome: ([head, rest]): readonly [string, Option.Option<string>] => [
          head,
          Option.some(rest),
        ],
      })
    );

    const [yearText, monthText, dayText, changesetText] = yield* splitComponents(input, numeric);

    const numbers = yield* Either.all({
      year: parseNumericComponent("year", yearText),
      month: parseNumericComponent("month", monthText),
      day: parseNumericComponent("day", dayText),
      changeset: parseNumericComponent("changeset", changesetText),
    });

    const date = yield* validateCalendarDate(numbers);
    const label = yield* validateOptionalLabel(rawLabel);

    return fromValidated({ ...date, label });
  });

/** `Some(version)` for valid input, `None` otherwise. */
export const parseOption = (input: string): Option.Option<Version> => Either.getRight(parse(input));

export const isValid = (input: string): boolean => Either.isRight(parse(input));
