import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../../core/errors.js";
import { fingerprint, sha256Hex, stableJson } from "../fingerprint.js";

describe("stableJson", () => {
  it("orders keys and drops undefined members at every depth", () => {
    expect(stableJson({ b: 1, a: [1, { d: undefined, c: "x" }] })).toBe(
      '{"a":[1,{"c":"x"}],"b":1}'
    );
  });

  it("rejects non-finite numbers with their location", () => {
    expect(() => stableJson({ runs: [{ energy_j: Number.NaN }] })).toThrow(
      new ConfigurationError("Cannot fingerprint non-finite number at $.runs[0].energy_j")
    );
  });
});

describe("fingerprint", () => {
  it("ignores key order", () => {
    expect(fingerprint({ gc: "G1", workload: "Light" })).toBe(
      fingerprint({ workload: "Light", gc: "G1" })
    );
  });

  it("hashes the stable serialization", () => {
    expect(fingerprint([{ z: 0, a: null }])).toBe(sha256Hex('[{"a":null,"z":0}]'));
  });
});
