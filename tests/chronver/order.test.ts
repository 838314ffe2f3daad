// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Equal, Option } from "effect";
import { describe, expect, test } from "vitest";
import { format } from "../../src/chronver/format";
import {
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
} from "../../src/chronver/order";
import { parse } from "../../src/chronver/parse";
import type { Version } from "../../src/chronver/types";

const v = (input: string): Version => Either.getOrThrow(parse(input));

describe("compare", () => {
  // ==========================================================================
  // Numeric cascade
  // ==========================================================================

  test("year, month and day outrank the changeset", () => {
    expect(compare(v("2023.12.31.9"), v("2024.1.1.0"))).toBe(-1);
    expect(compare(v("2024.2.1.0"), v("2024.1.31.99"))).toBe(1);
    expect(compare(v("2024.1.10.0"), v("2024.1.9.5"))).toBe(1);
  });

  test("changeset compares numerically", () => {
    expect(compare(v("2024.1.9.2"), v("2024.1.9.10"))).toBe(-1);
  });

  test("leading zeros in numeric fields do not matter", () => {
    expect(compare(v("2024.01.09.00"), v("2024.1.9.0"))).toBe(0);
  });

  // ==========================================================================
  // Labels
  // ==========================================================================

  test("unlabelled beats labelled", () => {
    expect(compare(v("2024.1.9.0"), v("2024.1.9.0-alpha"))).toBe(1);
    expect(compare(v("2024.1.9.0-alpha"), v("2024.1.9.0"))).toBe(-1);
  });

  test("a label does not outrank a higher changeset", () => {
    expect(compare(v("2024.1.9.1-alpha"), v("2024.1.9.0"))).toBe(1);
  });

  test("numeric segments compare by value", () => {
    expect(compare(v("2024.1.9.0-alpha.1"), v("2024.1.9.0-alpha.2"))).toBe(-1);
    expect(compare(v("2024.1.9.0-alpha.2"), v("2024.1.9.0-alpha.10"))).toBe(-1);
  });

  test("numeric segments longer than a safe integer", () => {
    expect(
      compare(v("2024.1.9.0-rc.99999999999999999999"), v("2024.1.9.0-rc.9999999999999999999"))
    ).toBe(1);
  });

  test("numeric segments sort before text segments", () => {
    expect(compare(v("2024.1.9.0-1"), v("2024.1.9.0-alpha"))).toBe(-1);
    expect(compare(v("2024.1.9.0-rc.beta"), v("2024.1.9.0-rc.2"))).toBe(1);
  });

  test("text segments compare by code unit", () => {
    expect(compare(v("2024.1.9.0-Alpha"), v("2024.1.9.0-alpha"))).toBe(-1);
    expect(compare(v("2024.1.9.0-alpha"), v("2024.1.9.0-beta"))).toBe(-1);
  });

  test("a label that is a prefix of another is smaller", () => {
    expect(compare(v("2024.1.9.0-alpha"), v("2024.1.9.0-alpha.1"))).toBe(-1);
  });

  test("equal numeric values with different zeros stay distinct", () => {
    const padded = v("2024.1.9.0-rc.01");
    const plain = v("2024.1.9.0-rc.1");
    expect(compare(padded, plain)).toBe(-1);
    expect(Equal.equals(padded, plain)).toBe(false);
  });
});

describe("order helpers", () => {
  const older = v("2024.1.9.0");
  const newer = v("2024.1.9.1");

  test("equals", () => {
    expect(equals(older, v("2024.01.09.0"))).toBe(true);
    expect(equals(older, newer)).toBe(false);
  });

  test("comparisons, data-first and data-last", () => {
    expect(lessThan(older, newer)).toBe(true);
    expect(lessThan(newer)(older)).toBe(true);
    expect(lessThanOrEqualTo(older, older)).toBe(true);
    expect(greaterThan(older, newer)).toBe(false);
    expect(greaterThanOrEqualTo(newer, older)).toBe(true);
  });

  test("max and min", () => {
    expect(format(max(older, newer))).toBe("2024.1.9.1");
    expect(format(min(older, newer))).toBe("2024.1.9.0");
  });

  test("sortVersions returns a new ascending array", () => {
    const input = [v("2024.4.5.0"), v("2024.4.3.1"), v("2024.4.3.0"), v("2024.4.3.1-rc.1")];
    const sorted = sortVersions(input);
    expect(sorted.map(format)).toEqual([
      "2024.4.3.0",
      "2024.4.3.1-rc.1",
      "2024.4.3.1",
      "2024.4.5.0",
    ]);
    expect(input.map(format)[0]).toBe("2024.4.5.0");
  });

  test("sortVersionsDesc puts newest first", () => {
    const sorted = sortVersionsDesc([v("2024.4.3.0"), v("2025.1.1.0"), v("2024.12.1.0")]);
    expect(sorted.map(format)).toEqual(["2025.1.1.0", "2024.12.1.0", "2024.4.3.0"]);
  });

  test("latest", () => {
    const versions = [v("2024.4.3.0-break"), v("2024.4.3.0"), v("2024.4.2.7")];
    expect(Option.map(latest(versions), format)).toEqual(Option.some("2024.4.3.0"));
    expect(Option.isNone(latest([]))).toBe(true);
  });
});

describe("order laws", () => {
  const sample = [
    "2024.1.9.0",
    "2024.1.9.0-alpha",
    "2024.1.9.0-alpha.1",
    "2024.1.9.0-alpha.01",
    "2024.1.9.0-alpha.beta",
    "2024.1.9.0-1",
    "2024.1.9.1",
    "2024.01.09.01",
    "2023.12.31.40",
    "2024.2.29.0-rc.2",
    "0999.1.1.0",
  ].map(v);

  test("exactly one of less, equal, greater holds", () => {
    for (const a of sample) {
      for (const b of sample) {
        const outcomes = [lessThan(a, b), equals(a, b), greaterThan(a, b)].filter(Boolean);
        expect(outcomes).toHaveLength(1);
        expect(compare(a, b) + compare(b, a)).toBe(0);
      }
    }
  });

  test("compare is zero exactly when the versions are structurally equal", () => {
    for (const a of sample) {
      for (const b of sample) {
        expect(compare(a, b) === 0).toBe(Equal.equals(a, b));
      }
    }
  });

  test("transitivity", () => {
    for (const a of sample) {
      for (const b of sample) {
        for (const c of sample) {
          if (lessThanOrEqualTo(a, b) && lessThanOrEqualTo(b, c)) {
            expect(lessThanOrEqualTo(a, c)).toBe(true);
          }
        }
      }
    }
  });
});
