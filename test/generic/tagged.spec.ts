// test/generic/tagged.spec.ts

import { describe, it, expect } from "vitest";
import {
  attachTag,
  isTagged,
  getTypeTag,
  getContents,
  setTypeTag,
  unclass,
  inherits,
} from "../../src/core/generic";

describe("tagged values", () => {
  it("attaches a class to a payload", () => {
    const v = attachTag("MyDNASeq", { sequence: "ACGT" });
    expect(isTagged(v)).toBe(true);
    expect(getTypeTag(v)).toBe("MyDNASeq");
    expect(getContents(v)).toEqual({ sequence: "ACGT" });
  });

  it("does not mistake plain objects for tagged ones", () => {
    expect(isTagged({ tag: "Tagged", typeTag: 1, payload: null })).toBe(false);
    expect(isTagged({ tag: "Other", typeTag: "x", payload: null })).toBe(false);
    expect(isTagged(null)).toBe(false);
    expect(isTagged("Tagged")).toBe(false);
  });

  it("derives implicit classes for untagged values", () => {
    expect(getTypeTag(1.5)).toBe("numeric");
    expect(getTypeTag("a")).toBe("character");
    expect(getTypeTag(false)).toBe("logical");
    expect(getTypeTag([1, 2])).toBe("list");
    expect(getTypeTag(null)).toBe("NULL");
    expect(getTypeTag(undefined)).toBe("NULL");
    expect(getTypeTag(() => 1)).toBe("function");
    expect(getTypeTag({ a: 1 })).toBe("object");
  });

  it("reassigns the class in place without checking the payload", () => {
    const v = attachTag("numeric", 42);
    const same = setTypeTag(v, "lm");

    expect(same).toBe(v);
    expect(getTypeTag(v)).toBe("lm");
    expect(getContents(v)).toBe(42);
    expect(inherits(v, "lm")).toBe(true);
    expect(inherits(v, "numeric")).toBe(false);
  });

  it("unclass returns the bare payload", () => {
    expect(unclass(attachTag("factor", [1, 2]))).toEqual([1, 2]);
    expect(unclass("plain")).toBe("plain");
  });
});
