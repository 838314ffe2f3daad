// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Core value types for chronologic versions.
 * Following the "parse, don't validate" pattern: a `Version` only ever comes
 * out of a validating path, so every consumer can rely on its invariants.
 */

import { type Brand, Data, type Option } from "effect";
import { formatFields } from "./format";

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validated label: dot-separated segments of `[A-Za-z0-9-]+`.
 *
 * INVARIANT: non-empty, no empty segment. Only `validateLabel` brands strings.
 */
export type Label = string & Brand.Brand<"Label">;

// ─────────────────────────────────────────────────────────────────────────────
// Core Data Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface VersionFields extends CalendarDate {
  readonly changeset: number;
  readonly label: Option.Option<Label>;
}

/**
 * One chronologic version `YYYY.MM.DD.CHANGESET[-LABEL]`.
 *
 * Immutable, with structural `Equal`/`Hash` from `Data.Class`. Serializes as
 * its canonical string rather than as an object.
 */
export class Version extends Data.Class<VersionFields> {
  override toString(): string {
    return formatFields(this);
  }

  toJSON(): string {
    return formatFields(this);
  }
}

export const isVersion = (u: unknown): u is Version => u instanceof Version;

/**
 * Wrap fields that already passed validation. Not re-exported from the
 * package entry point; public construction goes through `make` or `parse`.
 */
export const fromValidated = (fields: VersionFields): Version => new Version(fields);
