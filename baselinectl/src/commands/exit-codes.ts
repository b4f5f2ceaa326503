import type { ErrorCode } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  COMPLIANCE_FAILED: 2,
  INVALID_ARGS: 3,
  NOT_FOUND: 4,
  INVALID_INPUT: 5,
  EXTRACTION_FAILED: 6,
  BUDGET_EXCEEDED: 7,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const BY_ERROR_CODE: Record<ErrorCode, ExitCode> = {
  NOT_FOUND: EXIT.NOT_FOUND,
  INVALID_BASELINE: EXIT.INVALID_INPUT,
  COMPONENT_NOT_FOUND: EXIT.INVALID_INPUT,
  EXTRACTION_FAILED: EXIT.EXTRACTION_FAILED,
  RESOURCE_BUDGET_EXCEEDED: EXIT.BUDGET_EXCEEDED,
  CONFIG_INVALID: EXIT.INVALID_ARGS,
};

export function exitCodeFor(code: ErrorCode): ExitCode {
  return BY_ERROR_CODE[code];
}
