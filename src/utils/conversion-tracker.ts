/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { ZodError } from "zod";
import { errorReason } from "./errors";

// ============================================================================
// Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface JobIssue {
  type: "job";
  input: string;
  output: string;
  // ErrorCode, or the collaborator's error class name
  reason: string;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = JobIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalJobs: number;
  successfulJobs: number;
  failedJobs: number;
  writtenFiles: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapResourceError(error: unknown): {
  reason: ResourceIssueReason;
  details: string;
} {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalJobs = 0;
  private successfulJobs = 0;
  private failedJobs = 0;
  private writtenFiles: string[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalJobs(count: number): void {
    this.totalJobs = count;
  }

  incrementSuccessful(): void {
    this.successfulJobs++;
  }

  incrementFailed(): void {
    this.failedJobs++;
  }

  trackWrittenFiles(paths: readonly string[]): void {
    this.writtenFiles.push(...paths);
  }

  getWrittenFiles(): readonly string[] {
    return this.writtenFiles;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackJobError(input: string, output: string, error: unknown): void {
    this.issues.push({
      type: "job",
      input,
      output,
      reason: errorReason(error),
      details: error instanceof Error ? error.message : String(error),
    });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalJobs: this.totalJobs,
      successfulJobs: this.successfulJobs,
      failedJobs: this.failedJobs,
      writtenFiles: this.writtenFiles.length,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(reportPath: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalJobs: stats.totalJobs,
        successfulJobs: stats.successfulJobs,
        failedJobs: stats.failedJobs,
        writtenFiles: stats.writtenFiles,
        duration: stats.duration,
      },
      files: this.writtenFiles,
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(dirname(reportPath), { recursive: true });
    await writeFile(reportPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): {
    job: Record<string, JobIssue[]>;
    resource: Record<string, ResourceIssue[]>;
  } {
    const grouped: {
      job: Record<string, JobIssue[]>;
      resource: Record<string, ResourceIssue[]>;
    } = {
      job: {},
      resource: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "job": {
          (grouped.job[issue.reason] ??= []).push(issue);
          break;
        }
        case "resource": {
          (grouped.resource[issue.reason] ??= []).push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
