// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Canonical string form. The year keeps the grammar's four-digit minimum so
 * that `parse(format(v))` holds for years below 1000; every other number is
 * written in minimal digits.
 */

import { Option, pipe } from "effect";
import { zeroPad } from "../lib/str";
import type { VersionFields } from "./types";

const YEAR_WIDTH = 4;

/** Render fields to `year.month.day.changeset[-label]`. */
export const formatFields = (v: VersionFields): string => {
  const year = zeroPad(YEAR_WIDTH)(v.year.toString());
  const base = `${year}.${v.month.toString()}.${v.day.toString()}.${v.changeset.toString()}`;
  return pipe(
    v.label,
    Option.match({
      onNone: (): string => base,
      onSome: (label): string => `${base}-${label}`,
    })
  );
};

/**
 * Format a version back to text.
 *
 * @example
 * format(chronVer("2024.01.09.00")) // "2024.1.9.0"
 */
export const format: (v: VersionFields) => string = formatFields;
