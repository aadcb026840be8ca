import type { PackConfig } from "@agentpack/core";
import type { TraceLogger } from "../../core/tracer.js";

export interface DiagnosticResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  fix?: string;
}

export interface DoctorResult {
  success: boolean;
  checks: DiagnosticResult[];
  summary: {
    passed: number;
    failed: number;
    warnings: number;
  };
}

export interface DoctorOptions {
  root: string;
  /** Skips loading agentpack.yaml when given */
  config?: PackConfig;
  /** Hosts to check; defaults to the pack config's hosts */
  hosts?: string[];
  env?: NodeJS.ProcessEnv;
  home?: string;
  log?: TraceLogger;
}
