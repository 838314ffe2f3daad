// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Chronologic versions: `YYYY.MM.DD.CHANGESET[-LABEL]`.
 *
 * KEY TYPES:
 * - Version: validated, immutable version value
 * - Label: validated pre-release label
 * - ParseError: union of the four failure kinds
 *
 * KEY FUNCTIONS:
 * - parse("2024.1.9.0-rc.1"): text to Either<Version, ParseError>
 * - make({ year, month, day }): components to Either<Version, ParseError>
 * - chronVer("2024.1.9.0"): literal constructor
 * - compare / format / bump
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types (Opaque - only constructors can create these)
// ─────────────────────────────────────────────────────────────────────────────

export type { CalendarDate, Label, Version, VersionFields } from "./types";
export { isVersion } from "./types";
export type { LabelSegment } from "./label";
export type { ChronVerLiteral, VersionInput } from "./construct";

// ─────────────────────────────────────────────────────────────────────────────
// Parsing (Boundary: string -> Either<Version, ParseError>)
// ─────────────────────────────────────────────────────────────────────────────

export { isValid, parse, parseNumericComponent, parseOption } from "./parse";

// ─────────────────────────────────────────────────────────────────────────────
// Smart Constructors
// ─────────────────────────────────────────────────────────────────────────────

export { chronVer, fromDate, make } from "./construct";

// ─────────────────────────────────────────────────────────────────────────────
// Pure Functions (Operations on validated types)
// ─────────────────────────────────────────────────────────────────────────────

export { format } from "./format";
export {
  compare,
  equals,
  greaterThan,
  greaterThanOrEqualTo,
  latest,
  lessThan,
  lessThanOrEqualTo,
  max,
  min,
  sortVersions,
  sortVersionsDesc,
  VersionOrder,
} from "./order";
export { isBreaking, labelOf, withChangeset, withLabel, withoutLabel } from "./construct";
export { classifySegment, LabelOrder, labelSegments, validateLabel } from "./label";
export { daysInMonth, isLeapYear, MAX_YEAR } from "./calendar";
export { bump } from "./bump";

// ─────────────────────────────────────────────────────────────────────────────
// Effects (Clock and Config)
// ─────────────────────────────────────────────────────────────────────────────

export { bumpNow, checkBreaking, todayVersion } from "./bump";

// ─────────────────────────────────────────────────────────────────────────────
// Effect Schemas (Boundary Validation)
// ─────────────────────────────────────────────────────────────────────────────

export type { ChronVerString } from "./schema";
export {
  ChronVerStringSchema,
  decodeVersion,
  encodeVersion,
  VersionFromString,
  VersionSelf,
} from "./schema";
