// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Proleptic Gregorian calendar rules for the date part of a version.
 */

import { Either, Order } from "effect";
import { type CalendarValidationError, calendarError } from "../lib/errors";
import type { CalendarDate } from "./types";

export const MAX_YEAR = 9999;

const THIRTY_DAY_MONTHS: ReadonlySet<number> = new Set([4, 6, 9, 11]);

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

/** Days in `month` of `year`. `month` must already be within 1-12. */
export const daysInMonth = (year: number, month: number): number =>
  month === 2 ? (isLeapYear(year) ? 29 : 28) : THIRTY_DAY_MONTHS.has(month) ? 30 : 31;

/**
 * Check the date exists. Fields are checked year, month, day so the error
 * names the first one out of range.
 */
export const validateCalendarDate = <D extends CalendarDate>(
  date: D
): Either.Either<D, CalendarValidationError> => {
  if (date.year > MAX_YEAR) {
    return Either.left(calendarError("year", date));
  }
  if (date.month < 1 || date.month > 12) {
    return Either.left(calendarError("month", date));
  }
  if (date.day < 1 || date.day > daysInMonth(date.year, date.month)) {
    return Either.left(calendarError("day", date));
  }
  return Either.right(date);
};

export const CalendarDateOrder: Order.Order<CalendarDate> = Order.combineAll([
  Order.mapInput(Order.number, (d: CalendarDate) => d.year),
  Order.mapInput(Order.number, (d: CalendarDate) => d.month),
  Order.mapInput(Order.number, (d: CalendarDate) => d.day),
]);

/** Calendar date of a JS `Date`, read in local or UTC time. */
export const calendarDateOf = (date: Date, timeZone: "local" | "utc"): CalendarDate =>
  timeZone === "utc"
    ? { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() }
    : { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
