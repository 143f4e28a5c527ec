// test/demo/dnaSeq.spec.ts

import { describe, it, expect } from "vitest";
import { bufferDisplay } from "../../src/ports/display";
import { baseCounts, runDnaSeqDemo } from "../../demo/dnaSeq";

describe("DNA sequence walkthrough", () => {
  it("prints, measures and summarizes the sequence, then reports both failures", () => {
    const display = bufferDisplay();
    const result = runDnaSeqDemo(display);

    expect(result.length).toBe(13);
    expect(result.summary).toEqual({
      name: "seq1",
      length: 13,
      bases: { A: 3, T: 4, G: 4, C: 2 },
    });
    expect(result.errors).toEqual([
      `no applicable method for 'plot' applied to an object of class "MyDNASeq"`,
      "object has no character 'sequence' field",
    ]);
    expect(display.lines).toEqual([
      "DNA sequence: seq1",
      "ATGCGTACGTTAG",
      `Error: no applicable method for 'plot' applied to an object of class "MyDNASeq"`,
      "Error: object has no character 'sequence' field",
    ]);
  });

  it("counts bases", () => {
    expect(baseCounts("AACG")).toEqual({ A: 2, C: 1, G: 1 });
  });
});
