// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Logger layer for hosts that want the library's debug events rendered as
 * pretty terminal lines or JSON lines. Errors go to stderr, the rest to stdout.
 */

import {
  Cause,
  type ConfigError,
  Effect,
  HashMap,
  Layer,
  LogLevel,
  Logger,
  Match,
  Option,
  pipe,
} from "effect";
import type { LogFormat, LogLevel as ChronVerLogLevel } from "../config/field-values";
import { LoggingConfigSpec } from "../config/env";

type ColorName = "red" | "yellow" | "blue" | "cyan" | "gray" | "white";

export type LogStream = "stdout" | "stderr";

/** Destination for one rendered line (without trailing newline). */
export type LogSink = (line: string, stream: LogStream) => void;

const ANSI_CODES: Readonly<Record<ColorName, number>> = {
  red: 31,
  yellow: 33,
  blue: 34,
  cyan: 36,
  gray: 90,
  white: 37,
};

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const toEffectLogLevel = (level: ChronVerLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `\x1b[${ANSI_CODES[color]}m${text}\x1b[0m` : text;

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

/** Formats error cause chain, returning empty string for non-errors to avoid noise. */
const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

const annotationEntries = (
  annotations: HashMap.HashMap<string, unknown>
): ReadonlyArray<readonly [string, unknown]> => Array.from(HashMap.toEntries(annotations));

const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string => {
  const levelColor = pipe(
    Option.fromNullable(LEVEL_COLORS[logLevel.label]),
    Option.getOrElse((): ColorName => "white")
  );
  const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
  const eventStr = pipe(
    HashMap.get(annotations, "event"),
    Option.filter((v): v is string => typeof v === "string"),
    Option.match({
      onNone: (): string => "",
      onSome: (e): string => `${colorize("cyan", `[${e}]`, useColor)} `,
    })
  );
  const details = annotationEntries(annotations)
    .filter(([k]) => k !== "event")
    .map(([k, v]) => ` ${colorize("gray", `${k}=${String(v)}`, useColor)}`)
    .join("");
  return `${levelStr} ${eventStr}${message}${details}${formatCause(cause)}`;
};

const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    message,
    ...Object.fromEntries(annotationEntries(annotations)),
  });

const defaultSink: LogSink = (line, stream) => {
  (stream === "stderr" ? process.stderr : process.stdout).write(`${line}\n`);
};

const ChronVerLogger = (
  format: LogFormat,
  useColor: boolean,
  write: LogSink
): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = renderMessage(message);
    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );
    write(output, logLevel.label === "ERROR" || logLevel.label === "FATAL" ? "stderr" : "stdout");
  });

export interface ChronVerLoggerOptions {
  readonly level: ChronVerLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
  readonly write?: LogSink;
}

export const ChronVerLoggerLive = (options: ChronVerLoggerOptions): Layer.Layer<never> => {
  const useColor =
    options.color ?? (process.stdout.isTTY === true && process.env["NO_COLOR"] === undefined);
  return Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      ChronVerLogger(options.format, useColor, options.write ?? defaultSink)
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
};

/** Logger layer configured from `CHRONVER_LOG_LEVEL` / `CHRONVER_LOG_FORMAT`. */
export const ChronVerLoggerFromConfig: Layer.Layer<never, ConfigError.ConfigError> =
  Layer.unwrapEffect(Effect.map(LoggingConfigSpec, (logging) => ChronVerLoggerLive(logging)));
