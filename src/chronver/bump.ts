// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Moving a version forward in time.
 *
 * `bump` is pure and takes "today" as an argument. The Effect variants read
 * the date from `Clock` and the time zone from Config, which keeps them
 * testable with `TestClock` and a test ConfigProvider.
 */

import { Clock, type ConfigError, Effect, Either } from "effect";
import { BreakLabelConfig, TimeZoneConfig } from "../config/env";
import type { TimeZone } from "../config/field-values";
import type { ParseError } from "../lib/errors";
import { logBumped, logStamped } from "../lib/log";
import { CalendarDateOrder, calendarDateOf } from "./calendar";
import { isBreaking, make } from "./construct";
import { format } from "./format";
import type { CalendarDate, Version } from "./types";

/**
 * Next version on `today`, with the label dropped:
 * - same day: changeset + 1
 * - later day: `today` with changeset 0
 * - earlier day (clock behind the version): changeset + 1 on the version's
 *   own date, so the result is still greater than `v`
 *
 * @example
 * bump(chronVer("2024.1.9.3-rc.1"), { year: 2024, month: 1, day: 9 })  // Right(2024.1.9.4)
 * bump(chronVer("2024.1.9.3"), { year: 2024, month: 1, day: 10 })      // Right(2024.1.10.0)
 */
export const bump = (v: Version, today: CalendarDate): Either.Either<Version, ParseError> =>
  CalendarDateOrder(today, v) > 0
    ? make({ year: today.year, month: today.month, day: today.day, changeset: 0 })
    : make({ year: v.year, month: v.month, day: v.day, changeset: v.changeset + 1 });

interface ClockDate {
  readonly today: CalendarDate;
  readonly timeZone: TimeZone;
}

/** The clock's calendar date in the configured time zone. */
const currentDate: Effect.Effect<ClockDate, ConfigError.ConfigError> = Effect.gen(
  function* () {
    const timeZone = yield* TimeZoneConfig;
    const millis = yield* Clock.currentTimeMillis;
    return { today: calendarDateOf(new Date(millis), timeZone), timeZone };
  }
);

/** Version for the current clock date (changeset 0, no label). */
export const todayVersion: Effect.Effect<Version, ParseError | ConfigError.ConfigError> =
  Effect.gen(function* () {
    const { today, timeZone } = yield* currentDate;
    const version = yield* make(today);
    yield* logStamped(format(version), timeZone);
    return version;
  });

/** `bump` against the current clock date. */
export const bumpNow = (
  v: Version
): Effect.Effect<Version, ParseError | ConfigError.ConfigError> =>
  Effect.gen(function* () {
    const { today } = yield* currentDate;
    const next = yield* bump(v, today);
    yield* logBumped(format(v), format(next));
    return next;
  });

/** `isBreaking` with the configured break label. */
export const checkBreaking = (v: Version): Effect.Effect<boolean, ConfigError.ConfigError> =>
  Effect.map(BreakLabelConfig, (breakLabel) => isBreaking(v, breakLabel));
