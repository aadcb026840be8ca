export type { DiagnosticResult, DoctorOptions, DoctorResult } from "./types.js";
export { checkPackDirs, checkConfigFile, checkLint } from "./pack-check.js";
export { checkHostInstall, checkHostBrokenSymlinks } from "./install-check.js";
export { checkMcpEnv } from "./env-check.js";
export { runAllChecks } from "./runner.js";
export { formatDoctorOutput, formatDoctorJson } from "./formatter.js";
