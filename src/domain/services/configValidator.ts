/**
 * Configuration Validator
 *
 * Validates docsync configuration and reports issues with
 * suggested fixes.
 */

import type { Config } from "../entities/config";
import { DEFAULT_EXTENSIONS } from "../entities/config";

const SUPPORTED_EXTENSIONS = DEFAULT_EXTENSIONS;

/**
 * Validation result for a single field or section.
 */
export interface ValidationIssue {
  /** The path to the invalid field (e.g., "llm.model") */
  path: string;

  /** The type of issue: error (invalid), warning (suboptimal), info (suggestion) */
  severity: "error" | "warning" | "info";

  /** Human-readable description of the issue */
  message: string;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Overall validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;

  /** List of all issues found */
  issues: ValidationIssue[];

  /** Helper method to get issues by severity */
  getErrors(): ValidationIssue[];
  getWarnings(): ValidationIssue[];
  getInfos(): ValidationIssue[];
}

const NODE_KINDS = ["module", "class", "function"];

/**
 * Validate a docsync configuration.
 *
 * @param config - The configuration to validate
 * @returns Validation result with any issues found
 */
export function validateConfig(config: Config): ValidationResult {
  const issues: ValidationIssue[] = [];

  // Validate version
  if (!config.version) {
    issues.push({
      path: "version",
      severity: "error",
      message: "Configuration version is required",
      suggestion: "Add a version field (e.g., '0.1.0')",
    });
  } else if (!/^\d+\.\d+\.\d+$/.test(config.version)) {
    issues.push({
      path: "version",
      severity: "warning",
      message: `Version '${config.version}' is not in semver format`,
      suggestion: "Use semantic versioning (e.g., '0.1.0')",
    });
  }

  // Validate indexDir
  if (!config.indexDir) {
    issues.push({
      path: "indexDir",
      severity: "error",
      message: "Index directory is required",
      suggestion: "Set indexDir to '.docsync' (default)",
    });
  } else if (config.indexDir.startsWith("/")) {
    issues.push({
      path: "indexDir",
      severity: "warning",
      message: "Index directory should be relative to project root",
      suggestion: "Use a relative path like '.docsync'",
    });
  }

  // Validate extensions
  if (!config.extensions || config.extensions.length === 0) {
    issues.push({
      path: "extensions",
      severity: "warning",
      message: "No file extensions configured",
      suggestion: "Add extensions to document (e.g., ['.py'])",
    });
  } else {
    for (let i = 0; i < config.extensions.length; i++) {
      const ext = config.extensions[i];
      if (!ext.startsWith(".")) {
        issues.push({
          path: `extensions[${i}]`,
          severity: "error",
          message: `Extension '${ext}' must start with a dot`,
          suggestion: `Use '.${ext}' instead`,
        });
      } else if (!SUPPORTED_EXTENSIONS.includes(ext.toLowerCase())) {
        issues.push({
          path: `extensions[${i}]`,
          severity: "warning",
          message: `No parser handles '${ext}' files; they will be skipped`,
          suggestion: `Supported extensions: ${SUPPORTED_EXTENSIONS.join(", ")}`,
        });
      }
    }
  }

  // Validate ignorePaths
  if (config.ignorePaths) {
    for (let i = 0; i < config.ignorePaths.length; i++) {
      const ignorePath = config.ignorePaths[i];
      if (ignorePath.includes("..")) {
        issues.push({
          path: `ignorePaths[${i}]`,
          severity: "warning",
          message: `Ignore path '${ignorePath}' contains '..' which may behave unexpectedly`,
        });
      }
    }
  }

  // Validate output files
  for (const field of ["summaryFile", "cacheFile"] as const) {
    const value = config[field];
    if (!value) {
      issues.push({
        path: field,
        severity: "error",
        message: `${field} is required`,
      });
    } else if (value.startsWith("/") || value.includes("..")) {
      issues.push({
        path: field,
        severity: "error",
        message: `${field} must stay inside the project`,
        suggestion: "Use a plain file name like 'docs.md'",
      });
    }
  }

  // Validate limits
  validatePositiveInteger(config.concurrency, "concurrency", 1, issues);
  validatePositiveInteger(config.maxRetries, "maxRetries", 0, issues);
  validatePositiveInteger(config.maxChunkChars, "maxChunkChars", 1, issues);

  if (config.concurrency > 32) {
    issues.push({
      path: "concurrency",
      severity: "info",
      message: `Concurrency ${config.concurrency} may exceed the provider's rate limits`,
    });
  }
  if (config.maxRetries > 5) {
    issues.push({
      path: "maxRetries",
      severity: "warning",
      message: `maxRetries ${config.maxRetries} is unusually high`,
      suggestion: "Use a value between 0 and 3",
    });
  }

  // Validate docstring targets
  for (let i = 0; i < (config.docstringTargets ?? []).length; i++) {
    const target = config.docstringTargets[i];
    if (!NODE_KINDS.includes(target)) {
      issues.push({
        path: `docstringTargets[${i}]`,
        severity: "error",
        message: `Unknown docstring target: '${target}'`,
        suggestion: `Valid targets: ${NODE_KINDS.join(", ")}`,
      });
    }
  }

  validateLlm(config, issues);

  return createValidationResult(issues);
}

/**
 * Validate an integer setting with a lower bound.
 */
function validatePositiveInteger(
  value: number,
  path: string,
  minimum: number,
  issues: ValidationIssue[]
): void {
  if (!Number.isInteger(value) || value < minimum) {
    issues.push({
      path,
      severity: "error",
      message: `${path} must be an integer of at least ${minimum}, got ${value}`,
    });
  }
}

/**
 * Validate language-model settings.
 */
function validateLlm(config: Config, issues: ValidationIssue[]): void {
  const llm = config.llm;
  if (!llm || !llm.model) {
    issues.push({
      path: "llm.model",
      severity: "error",
      message: "A chat model is required",
      suggestion: "Set llm.model (e.g., 'gpt-4o-mini')",
    });
    return;
  }

  if (!Number.isFinite(llm.timeoutMs) || llm.timeoutMs <= 0) {
    issues.push({
      path: "llm.timeoutMs",
      severity: "error",
      message: `Timeout must be a positive number of milliseconds, got ${llm.timeoutMs}`,
    });
  }

  if (!Number.isFinite(llm.temperature) || llm.temperature < 0 || llm.temperature > 2) {
    issues.push({
      path: "llm.temperature",
      severity: "error",
      message: `Temperature must be between 0 and 2, got ${llm.temperature}`,
    });
  } else if (llm.temperature > 1) {
    issues.push({
      path: "llm.temperature",
      severity: "info",
      message: "High temperatures make summaries vary between runs",
    });
  }

  if (llm.baseURL !== undefined && !/^https?:\/\//.test(llm.baseURL)) {
    issues.push({
      path: "llm.baseURL",
      severity: "error",
      message: `Base URL '${llm.baseURL}' must start with http:// or https://`,
    });
  }
}

/**
 * Create a validation result object with helper methods.
 */
function createValidationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");
  const infos = issues.filter((i) => i.severity === "info");

  return {
    valid: errors.length === 0,
    issues,
    getErrors: () => errors,
    getWarnings: () => warnings,
    getInfos: () => infos,
  };
}

/**
 * Format validation issues for display.
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return "Configuration is valid.";
  }

  const lines: string[] = [];

  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");
  const infos = issues.filter((i) => i.severity === "info");

  if (errors.length > 0) {
    lines.push("ERRORS:");
    for (const issue of errors) {
      lines.push(`  ✗ ${issue.path}: ${issue.message}`);
      if (issue.suggestion) {
        lines.push(`    → ${issue.suggestion}`);
      }
    }
  }

  if (warnings.length > 0) {
    if (lines.length > 0) lines.push("");
    lines.push("WARNINGS:");
    for (const issue of warnings) {
      lines.push(`  ⚠ ${issue.path}: ${issue.message}`);
      if (issue.suggestion) {
        lines.push(`    → ${issue.suggestion}`);
      }
    }
  }

  if (infos.length > 0) {
    if (lines.length > 0) lines.push("");
    lines.push("INFO:");
    for (const issue of infos) {
      lines.push(`  ℹ ${issue.path}: ${issue.message}`);
      if (issue.suggestion) {
        lines.push(`    → ${issue.suggestion}`);
      }
    }
  }

  return lines.join("\n");
}

