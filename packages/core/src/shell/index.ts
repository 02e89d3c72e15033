/**
 * Shell integration: detection and profile exports
 *
 * @module shell
 */

export { detectShell, getPrimaryRcFile, getShellConfig, parseShellName } from "./detector.js";
export {
  type AppendExportOptions,
  appendExportToProfile,
  formatExportLine,
  type ProfileExport,
} from "./profile.js";
export type { ShellConfig, ShellDetectionResult, ShellType } from "./types.js";
export { ShellTypeSchema } from "./types.js";
