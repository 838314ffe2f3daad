// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Total order over versions: year, month, day, changeset, then label
 * precedence. An unlabeled version sorts after every labeled one with the same
 * numbers, since a label marks a pre-release of it.
 *
 * `compare(a, b) === 0` exactly when `Equal.equals(a, b)`.
 */

import { Array as Arr, Option, Order, type Ordering, pipe } from "effect";
import { CalendarDateOrder } from "./calendar";
import { LabelOrder } from "./label";
import type { Label, Version } from "./types";

/** `None` (release) is greater than any `Some` (pre-release). */
const LabelPresenceOrder: Order.Order<Option.Option<Label>> = Order.make((a, b) =>
  pipe(
    a,
    Option.match({
      onNone: (): Ordering.Ordering => (Option.isNone(b) ? 0 : 1),
      onSome: (la): Ordering.Ordering =>
        pipe(
          b,
          Option.match({
            onNone: (): Ordering.Ordering => -1,
            onSome: (lb): Ordering.Ordering => LabelOrder(la, lb),
          })
        ),
    })
  )
);

export const VersionOrder: Order.Order<Version> = Order.combineAll<Version>([
  CalendarDateOrder,
  Order.mapInput(Order.number, (v: Version) => v.changeset),
  Order.mapInput(LabelPresenceOrder, (v: Version) => v.label),
]);

/**
 * Compare two versions.
 * Returns: -1 if a < b, 0 if a === b, 1 if a > b.
 *
 * @example
 * compare(chronVer("2024.1.9.0-alpha"), chronVer("2024.1.9.0")) // -1
 */
export const compare = (a: Version, b: Version): Ordering.Ordering => VersionOrder(a, b);

export const equals = (a: Version, b: Version): boolean => VersionOrder(a, b) === 0;

export const lessThan: {
  (that: Version): (self: Version) => boolean;
  (self: Version, that: Version): boolean;
} = Order.lessThan(VersionOrder);

export const lessThanOrEqualTo: {
  (that: Version): (self: Version) => boolean;
  (self: Version, that: Version): boolean;
} = Order.lessThanOrEqualTo(VersionOrder);

export const greaterThan: {
  (that: Version): (self: Version) => boolean;
  (self: Version, that: Version): boolean;
} = Order.greaterThan(VersionOrder);

export const greaterThanOrEqualTo: {
  (that: Version): (self: Version) => boolean;
  (self: Version, that: Version): boolean;
} = Order.greaterThanOrEqualTo(VersionOrder);

export const max: {
  (that: Version): (self: Version) => Version;
  (self: Version, that: Version): Version;
} = Order.max(VersionOrder);

export const min: {
  (that: Version): (self: Version) => Version;
  (self: Version, that: Version): Version;
} = Order.min(VersionOrder);

/**
 * Sort ascending without mutating the input.
 *
 * @example
 * sortVersions([v("2024.4.5.0"), v("2024.4.3.1"), v("2024.4.3.0")])
 * // [2024.4.3.0, 2024.4.3.1, 2024.4.5.0]
 */
export const sortVersions = (versions: Iterable<Version>): Version[] =>
  Arr.sort(versions, VersionOrder);

/** Sort descending (newest first). */
export const sortVersionsDesc = (versions: Iterable<Version>): Version[] =>
  Arr.sort(versions, Order.reverse(VersionOrder));

/** Greatest version, or `None` for an empty collection. */
export const latest = (versions: Iterable<Version>): Option.Option<Version> => {
  const collected = Arr.fromIterable(versions);
  return Arr.isNonEmptyReadonlyArray(collected)
    ? Option.some(Arr.max(collected, VersionOrder))
    : Option.none();
};
