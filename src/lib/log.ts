// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Debug tracing for the Effect-facing entry points.
 *
 * Events are a closed ADT encoded into log annotations, so effect-logger.ts
 * can render them without knowing each call site. Failures are returned to
 * the caller and never logged here.
 */

import { Data, Effect, Match, pipe } from "effect";

// ============================================================================
// VersionEvent ADT
// ============================================================================

export type VersionEvent = Data.TaggedEnum<{
  decoded: { readonly input: string; readonly version: string };
  bumped: { readonly from: string; readonly to: string };
  stamped: { readonly version: string; readonly timeZone: string };
}>;

const { decoded, bumped, stamped } = Data.taggedEnum<VersionEvent>();

/** Annotation record for an event; `event` carries the tag. */
export const encodeEvent = (event: VersionEvent): Record<string, string> =>
  pipe(
    Match.value(event),
    Match.tag("decoded", ({ input, version }) => ({ event: "decoded", input, version })),
    Match.tag("bumped", ({ from, to }) => ({ event: "bumped", from, to })),
    Match.tag("stamped", ({ version, timeZone }) => ({ event: "stamped", version, timeZone })),
    Match.exhaustive
  );

const logEvent = (event: VersionEvent, message: string): Effect.Effect<void> =>
  Effect.logDebug(message).pipe(Effect.annotateLogs(encodeEvent(event)));

// ============================================================================
// Public Logging Functions
// ============================================================================

export const logDecoded = (input: string, version: string): Effect.Effect<void> =>
  logEvent(decoded({ input, version }), `decoded ${version}`);

export const logBumped = (from: string, to: string): Effect.Effect<void> =>
  logEvent(bumped({ from, to }), `bumped ${from} -> ${to}`);

export const logStamped = (version: string, timeZone: string): Effect.Effect<void> =>
  logEvent(stamped({ version, timeZone }), `stamped ${version}`);
