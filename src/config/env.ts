// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions.
 *
 * All exports are pure Config<A> values; nothing is read until a Config is
 * yielded inside an Effect. Values resolve through whatever ConfigProvider
 * the host installs (Effect's default reads `CHRONVER_*` environment keys).
 */

import { Array as Arr, Config, ConfigProvider, Either, Option } from "effect";
import { validateLabel } from "../chronver/label";
import {
  BREAK_LABEL_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  TIME_ZONE_DEFAULT,
  TIME_ZONE_VALUES,
  type TimeZone,
} from "./field-values";

const NAMESPACE = "CHRONVER";

// ============================================================================
// Type Definitions (Pure Data)
// ============================================================================

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface ChronVerConfig {
  readonly breakLabel: string;
  readonly timeZone: TimeZone;
  readonly logging: LoggingConfig;
}

// ============================================================================
// Primitive Configs (Building Blocks)
// ============================================================================

/**
 * Label that marks a breaking release. Must itself be a valid label,
 * otherwise no version could ever carry it.
 */
export const BreakLabelConfig: Config.Config<string> = Config.nested(
  Config.string("BREAK_LABEL").pipe(
    Config.withDefault(BREAK_LABEL_DEFAULT),
    Config.validate({
      message: "Must be a valid label: dot-separated segments of [A-Za-z0-9-]",
      validation: (s: string) => Either.isRight(validateLabel(s)),
    })
  ),
  NAMESPACE
);

export const TimeZoneConfig: Config.Config<TimeZone> = Config.nested(
  Config.literal(...TIME_ZONE_VALUES)("TIME_ZONE").pipe(Config.withDefault(TIME_ZONE_DEFAULT)),
  NAMESPACE
);

export const LogLevelConfig: Config.Config<LogLevel> = Config.nested(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.withDefault(LOG_LEVEL_DEFAULT)),
  NAMESPACE
);

export const LogFormatConfig: Config.Config<LogFormat> = Config.nested(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.withDefault(LOG_FORMAT_DEFAULT)),
  NAMESPACE
);

/** When true, forces the log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  NAMESPACE
);

// ============================================================================
// Composite Config (Pure Transformation)
// ============================================================================

export const LoggingConfigSpec: Config.Config<LoggingConfig> = Config.all([
  LogLevelConfig,
  LogFormatConfig,
  DebugModeConfig,
]).pipe(
  Config.map(([level, format, debug]) => ({
    level: debug ? ("debug" as const) : level,
    format,
  }))
);

export const ChronVerConfigSpec: Config.Config<ChronVerConfig> = Config.all([
  BreakLabelConfig,
  TimeZoneConfig,
  LoggingConfigSpec,
]).pipe(
  Config.map(([breakLabel, timeZone, logging]) => ({
    breakLabel,
    timeZone,
    logging,
  }))
);

// ============================================================================
// Providers
// ============================================================================

/**
 * Overrides keyed by camelCase name, for hosts that hold settings in memory
 * rather than in the environment.
 */
export interface ConfigOverrides {
  readonly breakLabel?: string;
  readonly timeZone?: string;
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly debug?: string;
}

const OVERRIDE_FIELDS = ["breakLabel", "timeZone", "logLevel", "logFormat", "debug"] as const;

const overrideKeys: Readonly<Record<(typeof OVERRIDE_FIELDS)[number], string>> = {
  breakLabel: `${NAMESPACE}_BREAK_LABEL`,
  timeZone: `${NAMESPACE}_TIME_ZONE`,
  logLevel: `${NAMESPACE}_LOG_LEVEL`,
  logFormat: `${NAMESPACE}_LOG_FORMAT`,
  debug: `${NAMESPACE}_DEBUG`,
};

/**
 * Build a ConfigProvider from overrides. Unset keys fall back to the Config
 * defaults.
 *
 * @example
 * Effect.withConfigProvider(todayVersion, configProviderFrom({ timeZone: "utc" }))
 */
export const configProviderFrom = (overrides: ConfigOverrides): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(
      Arr.filterMap(OVERRIDE_FIELDS, (field) =>
        Option.map(
          Option.fromNullable(overrides[field]),
          (value): readonly [string, string] => [overrideKeys[field], value]
        )
      )
    ),
    { pathDelim: "_" }
  );
