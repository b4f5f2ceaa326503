/** Compliance report over a single baseline. */
export type CheckStatus = "pass" | "warning" | "fail";

export type ComplianceCheck = {
  name: "metadata" | "schema" | "hierarchy" | "naming" | "geometry" | "duplicates";
  status: CheckStatus;
  message: string;
};

export type ComplianceReport = {
  overall_status: CheckStatus;
  overall_message: string;
  checks: ComplianceCheck[];
  statistics: {
    total_checks: number;
    passed: number;
    warnings: number;
    failures: number;
  };
};
