import { describe, expect, it } from "vitest";

import { detectHardware, type OsProbe, UNKNOWN_HARDWARE } from "../detector.js";

function cpu(model: string) {
  return { model, speed: 2400, times: { user: 0, nice: 0, sys: 0, idle: 0, irq: 0 } };
}

describe("detectHardware", () => {
  it("should summarize the probed machine", () => {
    const probe: OsProbe = {
      platform: () => "linux",
      arch: () => "x64",
      cpus: () => [cpu(" Test CPU @ 2.40GHz "), cpu("Test CPU @ 2.40GHz")],
      totalmem: () => 16 * 1024 * 1024 * 1024,
    };

    expect(detectHardware(probe)).toEqual({
      platform: "linux",
      arch: "x64",
      cpuModel: "Test CPU @ 2.40GHz",
      cpuCores: 2,
      totalMemoryMb: 16384,
    });
  });

  it("should fall back to unknown when probing throws", () => {
    const probe: OsProbe = {
      platform: () => "linux",
      arch: () => "x64",
      cpus: () => {
        throw new Error("no /proc");
      },
      totalmem: () => 0,
    };

    expect(detectHardware(probe)).toEqual(UNKNOWN_HARDWARE);
  });

  it("should describe the real machine without throwing", () => {
    expect(detectHardware().cpuCores).toBeGreaterThanOrEqual(0);
  });
});
