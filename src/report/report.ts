/**
 * Check Results
 *
 * Collects the outcome of each validation check so the commands can print a
 * summary, emit JSON, and decide the exit code.
 */

// =============================================================================
// Types
// =============================================================================

export type CheckStatus = "pass" | "warn" | "fail" | "info";

export type CheckResult = {
  /** Stable identifier, e.g. "gateway-existence" or "target:TGT1". */
  id: string;
  title: string;
  status: CheckStatus;
  message: string;
  details?: Record<string, unknown>;
};

export type ReportCounts = Record<CheckStatus, number>;

export type ReportJson = {
  subject: string;
  passed: boolean;
  counts: ReportCounts;
  checks: CheckResult[];
};

// =============================================================================
// Report
// =============================================================================

export class ValidationReport {
  readonly subject: string;
  private checks: CheckResult[] = [];

  constructor(subject: string) {
    this.subject = subject;
  }

  add(check: CheckResult): CheckResult {
    this.checks.push(check);
    return check;
  }

  pass(id: string, title: string, message: string, details?: Record<string, unknown>): CheckResult {
    return this.add({ id, title, status: "pass", message, details });
  }

  warn(id: string, title: string, message: string, details?: Record<string, unknown>): CheckResult {
    return this.add({ id, title, status: "warn", message, details });
  }

  fail(id: string, title: string, message: string, details?: Record<string, unknown>): CheckResult {
    return this.add({ id, title, status: "fail", message, details });
  }

  info(id: string, title: string, message: string, details?: Record<string, unknown>): CheckResult {
    return this.add({ id, title, status: "info", message, details });
  }

  list(): CheckResult[] {
    return [...this.checks];
  }

  counts(): ReportCounts {
    const counts: ReportCounts = { pass: 0, warn: 0, fail: 0, info: 0 };
    for (const check of this.checks) {
      counts[check.status] += 1;
    }
    return counts;
  }

  hasFailures(): boolean {
    return this.checks.some((check) => check.status === "fail");
  }

  /** One-line tally, e.g. "4 passed, 1 warning(s), 0 failed". */
  summaryLine(): string {
    const counts = this.counts();
    return `${counts.pass} passed, ${counts.warn} warning(s), ${counts.fail} failed`;
  }

  toJSON(): ReportJson {
    return {
      subject: this.subject,
      passed: !this.hasFailures(),
      counts: this.counts(),
      checks: this.list(),
    };
  }
}
