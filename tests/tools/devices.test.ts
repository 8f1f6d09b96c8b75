/**
 * Tests for the list_devices tool handler.
 */

import { describe, it, expect } from "vitest";
import { listDevices } from "../../src/devices/index.js";
import { executeListDevices } from "../../src/tools/devices.js";

describe("executeListDevices", () => {
  const [, nf1, as1] = executeListDevices(listDevices()).split("## ");

  it("lists the NF-1 with its hints", () => {
    const lines = nf1.split("\n");
    expect(lines[0]).toBe("Modor NF-1(m)");
    expect(lines).toContain("id: modor-nf1");
    expect(lines).toContain("aliases: nf1, nf-1, nf1m, nf-1m");
    expect(lines).toContain("capabilities: editBuffer, programDump, fingerprint");
    expect(lines).toContain("banks: 14 banks of 32: A, B, C, D, E, F, G, H, I, J, K, L, M, N");
    expect(lines).toContain("detect wait: 200 ms");
    expect(lines).toContain("message delay: 10 ms");
    expect(lines).toContain("bank select: CC#32");
    expect(lines).toContain("Modor NF-1(m) setup:");
  });

  it("lists the AS-1 with read-only factory banks", () => {
    const lines = as1.split("\n");
    expect(lines[0]).toBe("Pioneer Toraiz AS-1");
    expect(lines).toContain(
      "banks: 10 banks of 99: U.1, U.2, U.3, U.4, U.5, F.1 (read-only), F.2 (read-only), " +
        "F.3 (read-only), F.4 (read-only), F.5 (read-only)",
    );
    expect(lines.some((line) => line.startsWith("detect wait"))).toBe(false);
  });
});
