// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema integration.
 *
 * Schemas are used at BOUNDARIES (JSON payloads, config files). A Version
 * travels as its canonical string, never as an object with named fields, and
 * decoding goes through the same `parse` as everything else.
 */

import { type Brand, Effect, Either, ParseResult, Schema } from "effect";
import { type ParseError, describeParseError } from "../lib/errors";
import { logDecoded } from "../lib/log";
import { format } from "./format";
import { isValid, parse } from "./parse";
import { type Version, isVersion } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Effect Schemas (Boundary Validation)
// ─────────────────────────────────────────────────────────────────────────────

/** A Version instance, for use as the decoded side of a transformation. */
export const VersionSelf: Schema.Schema<Version> = Schema.declare(isVersion, {
  identifier: "Version",
});

/**
 * `string <-> Version`. A failed decode reports the parse error's kind and
 * message, e.g. `calendar: day 30 does not exist in 2024.2`.
 */
export const VersionFromString: Schema.Schema<Version, string> = Schema.transformOrFail(
  Schema.String,
  VersionSelf,
  {
    strict: true,
    decode: (input, _options, ast) =>
      Either.match(parse(input), {
        onLeft: (error) =>
          ParseResult.fail(new ParseResult.Type(ast, input, describeParseError(error))),
        onRight: (version) => ParseResult.succeed(version),
      }),
    encode: (version) => ParseResult.succeed(format(version)),
  }
).annotations({ identifier: "VersionFromString" });

/**
 * Validated version text that stays a string.
 *
 * INVARIANT: `parse` always succeeds on a ChronVerString.
 */
export type ChronVerString = string & Brand.Brand<"ChronVerString">;

const chronVerErrorMsg = (): string =>
  "Must be a chronologic version: YYYY.MM.DD.CHANGESET[-LABEL]";

export const ChronVerStringSchema: Schema.Schema<ChronVerString, string> = Schema.String.pipe(
  Schema.filter(isValid, { message: chronVerErrorMsg }),
  Schema.brand("ChronVerString")
);

// ─────────────────────────────────────────────────────────────────────────────
// Effect Decoders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decode untrusted text inside an Effect pipeline, keeping the typed
 * ParseError in the error channel.
 */
export const decodeVersion = (input: string): Effect.Effect<Version, ParseError> =>
  parse(input).pipe(Effect.tap((version) => logDecoded(input, format(version))));

export const encodeVersion: (version: Version) => string = format;
