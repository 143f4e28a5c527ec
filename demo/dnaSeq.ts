// demo/dnaSeq.ts
// Walkthrough: a DNA sequence class built on a plain record, its methods for
// the built-in generics, and what happens when a class tag lies.

import type { DisplayPort } from "../src/ports/display";
import { TagDispatchRuntime } from "../src/runtime";
import { DEFAULT_CONFIG } from "../src/core/config/config";
import { type TaggedValue, attachTag, getContents, setTypeTag } from "../src/core/generic";

export const DNA_SEQ_CLASS = "MyDNASeq";

export type DnaSeq = {
  name: string;
  sequence: string;
};

export function myDnaSeq(name: string, sequence: string): TaggedValue<DnaSeq> {
  return attachTag(DNA_SEQ_CLASS, { name, sequence });
}

function isDnaSeq(v: unknown): v is DnaSeq {
  return typeof v === "object" && v !== null && "sequence" in v && typeof v.sequence === "string"
    && "name" in v && typeof v.name === "string";
}

/**
 * Methods assume the payload is a DnaSeq and fail otherwise.
 */
function requireDnaSeq(obj: unknown): DnaSeq {
  const seq = getContents(obj);
  if (!isDnaSeq(seq)) {
    throw new TypeError("object has no character 'sequence' field");
  }
  return seq;
}

export function baseCounts(sequence: string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const base of sequence) {
    counts[base] = (counts[base] ?? 0) + 1;
  }
  return counts;
}

/**
 * Register print, length and summary methods for MyDNASeq.
 */
export function installDnaSeqMethods(rt: TagDispatchRuntime): void {
  rt.builtins.print.method(DNA_SEQ_CLASS, obj => {
    const seq = requireDnaSeq(obj);
    rt.display.write(`DNA sequence: ${seq.name}`);
    rt.display.write(seq.sequence);
    return obj;
  });

  rt.builtins.length.method(DNA_SEQ_CLASS, obj => requireDnaSeq(obj).sequence.length);

  rt.builtins.summary.method(DNA_SEQ_CLASS, obj => {
    const seq = requireDnaSeq(obj);
    return { name: seq.name, length: seq.sequence.length, bases: baseCounts(seq.sequence) };
  });
}

export type DnaSeqDemoResult = {
  length: unknown;
  summary: unknown;
  errors: string[];
};

/**
 * Run the walkthrough, writing every step to `display`.
 * Failures are reported on the display as "Error: <message>" lines.
 */
export function runDnaSeqDemo(display: DisplayPort): DnaSeqDemoResult {
  const rt = new TagDispatchRuntime({ name: "dna-seq-demo", config: DEFAULT_CONFIG, display });
  installDnaSeqMethods(rt);
  rt.declareGeneric("plot");

  const errors: string[] = [];
  const attempt = (step: () => unknown): void => {
    try {
      step();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      errors.push(message);
      display.write(`Error: ${message}`);
    }
  };

  const seq = myDnaSeq("seq1", "ATGCGTACGTTAG");
  rt.builtins.print(seq);
  const length = rt.builtins.length(seq);
  const summary = rt.builtins.summary(seq);

  // No plot method and no default.
  attempt(() => rt.call("plot", seq));

  // Any value can be reclassed; the length method then trips over it.
  const notASeq = setTypeTag(attachTag("numeric", [1, 2, 3]), DNA_SEQ_CLASS);
  attempt(() => rt.builtins.length(notASeq));

  return { length, summary, errors };
}
