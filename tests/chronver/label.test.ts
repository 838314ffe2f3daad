// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import {
  LabelOrder,
  LabelSegmentOrder,
  Numeric,
  Text,
  classifySegment,
  isAllDigits,
  labelSegments,
  validateLabel,
} from "../../src/chronver/label";
import type { Label } from "../../src/chronver/types";

const label = (raw: string): Label => Either.getOrThrow(validateLabel(raw));

describe("label module", () => {
  // ==========================================================================
  // Validation
  // ==========================================================================

  describe("validateLabel", () => {
    test("accepts dotted identifiers", () => {
      expect(Either.getOrThrow(validateLabel("rc.1"))).toBe("rc.1");
      expect(Either.isRight(validateLabel("x-y.Z9.-"))).toBe(true);
    });

    test("rejects the empty label", () => {
      const error = Either.flip(validateLabel(""));
      expect(Either.getOrThrow(error).reason).toBe("empty");
    });

    test("reports the first bad segment", () => {
      const error = Either.getOrThrow(Either.flip(validateLabel("ok.b@d..")));
      expect(error.reason).toBe("invalidCharacter");
      expect(error.index).toBe(1);
      expect(error.segment).toBe("b@d");
    });

    test("leading dot is an empty first segment", () => {
      const error = Either.getOrThrow(Either.flip(validateLabel(".rc")));
      expect(error.reason).toBe("emptySegment");
      expect(error.index).toBe(0);
    });

    test("rejects non-ASCII letters", () => {
      expect(Either.isLeft(validateLabel("βeta"))).toBe(true);
    });
  });

  // ==========================================================================
  // Segments
  // ==========================================================================

  describe("segments", () => {
    test("labelSegments splits on dots", () => {
      expect(labelSegments(label("beta.2.x-y"))).toEqual(["beta", "2", "x-y"]);
    });

    test("classifySegment keeps digit text", () => {
      expect(classifySegment("007")).toEqual(Numeric({ digits: "007" }));
      expect(classifySegment("7a")).toEqual(Text({ text: "7a" }));
      expect(classifySegment("-1")._tag).toBe("Text");
    });

    test("isAllDigits", () => {
      expect(isAllDigits("0123")).toBe(true);
      expect(isAllDigits("")).toBe(false);
      expect(isAllDigits("1-")).toBe(false);
    });
  });

  // ==========================================================================
  // Precedence
  // ==========================================================================

  describe("LabelSegmentOrder", () => {
    test("numeric by value, then by text", () => {
      expect(LabelSegmentOrder(Numeric({ digits: "9" }), Numeric({ digits: "10" }))).toBe(-1);
      expect(LabelSegmentOrder(Numeric({ digits: "010" }), Numeric({ digits: "9" }))).toBe(1);
      expect(LabelSegmentOrder(Numeric({ digits: "00" }), Numeric({ digits: "0" }))).toBe(1);
      expect(LabelSegmentOrder(Numeric({ digits: "42" }), Numeric({ digits: "42" }))).toBe(0);
    });

    test("numeric before text", () => {
      expect(LabelSegmentOrder(Numeric({ digits: "999" }), Text({ text: "a" }))).toBe(-1);
      expect(LabelSegmentOrder(Text({ text: "a" }), Numeric({ digits: "1" }))).toBe(1);
    });
  });

  describe("LabelOrder", () => {
    test("segment-wise with shorter prefix first", () => {
      expect(LabelOrder(label("alpha"), label("alpha.1"))).toBe(-1);
      expect(LabelOrder(label("alpha.beta"), label("alpha.1"))).toBe(1);
      expect(LabelOrder(label("rc.2"), label("rc.11"))).toBe(-1);
      expect(LabelOrder(label("rc.2"), label("rc.2"))).toBe(0);
    });
  });
});
