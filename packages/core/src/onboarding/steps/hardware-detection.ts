/**
 * Hardware Detection Step
 *
 * @module onboarding/steps/hardware-detection
 */

import { detectHardware, type HardwareInfo } from "../../hardware/detector.js";
import type { StepHandler } from "../types.js";

export interface HardwareDetectionStepOptions {
  detect?: () => HardwareInfo;
}

export function createHardwareDetectionStep(options: HardwareDetectionStepOptions = {}): StepHandler {
  const detect = options.detect ?? (() => detectHardware());

  return {
    id: "hardware-detection",
    touchesConfig: true,
    async execute({ output }) {
      const hardware = detect();
      const summary = `${hardware.cpuModel}, ${hardware.cpuCores} cores, ${hardware.totalMemoryMb} MB RAM (${hardware.platform}/${hardware.arch})`;
      output.info(`Detected ${summary}`);
      return { status: "completed", message: summary, data: { hardware } };
    },
  };
}
