export { detectHardware, type HardwareInfo, HardwareInfoSchema, type OsProbe, UNKNOWN_HARDWARE } from "./detector.js";
