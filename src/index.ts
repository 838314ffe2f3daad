// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * chronver - calendar-based version strings.
 *
 * Pure functions return `Either`; the few that read the clock or
 * configuration return `Effect` and are run by the host.
 */

export * from "./chronver/index";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CalendarField,
  LabelReason,
  NumericComponent,
  NumericReason,
  ParseError,
  ParseErrorTag,
  StructuralReason,
} from "./lib/errors";
export {
  CalendarValidationError,
  describeParseError,
  isParseError,
  LabelValidationError,
  NumericConversionError,
  StructuralError,
} from "./lib/errors";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export type { ChronVerConfig, ConfigOverrides, LoggingConfig } from "./config/env";
export {
  BreakLabelConfig,
  ChronVerConfigSpec,
  configProviderFrom,
  DebugModeConfig,
  LogFormatConfig,
  LoggingConfigSpec,
  LogLevelConfig,
  TimeZoneConfig,
} from "./config/env";
export type { LogFormat, LogLevel, TimeZone } from "./config/field-values";
export { BREAK_LABEL_DEFAULT } from "./config/field-values";

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export type { ChronVerLoggerOptions, LogSink, LogStream } from "./lib/effect-logger";
export { ChronVerLoggerFromConfig, ChronVerLoggerLive } from "./lib/effect-logger";
export type { VersionEvent } from "./lib/log";
