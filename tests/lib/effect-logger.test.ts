// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, type Layer } from "effect";
import { describe, expect, test } from "vitest";
import type { LogFormat, LogLevel } from "../../src/config/field-values";
import { ChronVerLoggerLive, type LogSink, type LogStream } from "../../src/lib/effect-logger";
import { logBumped, logDecoded } from "../../src/lib/log";

interface Captured {
  readonly lines: Array<{ readonly line: string; readonly stream: LogStream }>;
  readonly write: LogSink;
}

const capture = (): Captured => {
  const lines: Array<{ readonly line: string; readonly stream: LogStream }> = [];
  return { lines, write: (line, stream) => lines.push({ line, stream }) };
};

const loggerFor = (
  sink: Captured,
  level: LogLevel,
  format: LogFormat,
  color = false
): Layer.Layer<never> => ChronVerLoggerLive({ level, format, color, write: sink.write });

describe("ChronVerLoggerLive", () => {
  // ==========================================================================
  // Pretty
  // ==========================================================================

  describe("pretty format", () => {
    test("renders level, event tag, message and annotations", () => {
      const sink = capture();
      Effect.runSync(
        Effect.logInfo("hello").pipe(
          Effect.annotateLogs({ event: "stamped", timeZone: "utc" }),
          Effect.provide(loggerFor(sink, "info", "pretty"))
        )
      );
      expect(sink.lines).toEqual([
        { line: "INFO  [stamped] hello timeZone=utc", stream: "stdout" },
      ]);
    });

    test("errors go to stderr", () => {
      const sink = capture();
      Effect.runSync(
        Effect.logError("bad").pipe(
          Effect.provide(loggerFor(sink, "info", "pretty"))
        )
      );
      expect(sink.lines).toEqual([{ line: "ERROR bad", stream: "stderr" }]);
    });

    test("color wraps the level in ANSI codes", () => {
      const sink = capture();
      Effect.runSync(
        Effect.logWarning("careful").pipe(
          Effect.provide(loggerFor(sink, "info", "pretty", true))
        )
      );
      expect(sink.lines.map((l) => l.line)).toEqual(["\x1b[33mWARN \x1b[0m careful"]);
    });
  });

  // ==========================================================================
  // Level filtering
  // ==========================================================================

  describe("minimum level", () => {
    test("debug events are dropped at info", () => {
      const sink = capture();
      Effect.runSync(
        logBumped("2024.1.9.0", "2024.1.9.1").pipe(
          Effect.provide(loggerFor(sink, "info", "pretty"))
        )
      );
      expect(sink.lines).toEqual([]);
    });

    test("debug events are written at debug", () => {
      const sink = capture();
      Effect.runSync(
        logBumped("2024.1.9.0", "2024.1.9.1").pipe(
          Effect.provide(loggerFor(sink, "debug", "pretty"))
        )
      );
      expect(sink.lines).toHaveLength(1);
      const [entry] = sink.lines;
      expect(entry?.stream).toBe("stdout");
      expect(entry?.line.startsWith("DEBUG [bumped] bumped 2024.1.9.0 -> 2024.1.9.1 ")).toBe(true);
      expect(entry?.line).toContain(" from=2024.1.9.0");
      expect(entry?.line).toContain(" to=2024.1.9.1");
    });

    test("warn level drops info", () => {
      const sink = capture();
      Effect.runSync(
        Effect.logInfo("quiet").pipe(
          Effect.provide(loggerFor(sink, "warn", "pretty"))
        )
      );
      expect(sink.lines).toEqual([]);
    });
  });

  // ==========================================================================
  // JSON
  // ==========================================================================

  describe("json format", () => {
    test("writes one object per line with annotations", () => {
      const sink = capture();
      Effect.runSync(
        logDecoded("2024.01.09.0", "2024.1.9.0").pipe(
          Effect.provide(loggerFor(sink, "debug", "json"))
        )
      );
      expect(sink.lines).toHaveLength(1);
      const parsed: unknown = JSON.parse(sink.lines[0]?.line ?? "");
      expect(parsed).toMatchObject({
        level: "debug",
        message: "decoded 2024.1.9.0",
        event: "decoded",
        input: "2024.01.09.0",
        version: "2024.1.9.0",
      });
      expect(parsed).toHaveProperty("timestamp");
    });
  });
});
