/**
 * Hardware snapshot
 *
 * Best-effort description of the machine, recorded in the setup config so
 * later runs can pick sensible local-model defaults.
 *
 * @module hardware/detector
 */

import * as os from "node:os";

import { z } from "zod";

export const HardwareInfoSchema = z.object({
  platform: z.string(),
  arch: z.string(),
  cpuModel: z.string(),
  cpuCores: z.number().int().nonnegative(),
  totalMemoryMb: z.number().int().nonnegative(),
});

export type HardwareInfo = z.infer<typeof HardwareInfoSchema>;

export const UNKNOWN_HARDWARE: HardwareInfo = {
  platform: "unknown",
  arch: "unknown",
  cpuModel: "unknown",
  cpuCores: 0,
  totalMemoryMb: 0,
};

/**
 * Subset of node:os used for detection; injectable for tests
 */
export type OsProbe = Pick<typeof os, "platform" | "arch" | "cpus" | "totalmem">;

/**
 * Describe the current machine; any failure yields {@link UNKNOWN_HARDWARE}.
 */
export function detectHardware(probe: OsProbe = os): HardwareInfo {
  try {
    const cpus = probe.cpus();
    return {
      platform: probe.platform(),
      arch: probe.arch(),
      cpuModel: cpus[0]?.model.trim() || "unknown",
      cpuCores: cpus.length,
      totalMemoryMb: Math.round(probe.totalmem() / (1024 * 1024)),
    };
  } catch {
    return UNKNOWN_HARDWARE;
  }
}
