/**
 * Spinner-backed progress reporting for the CLI
 */

import ora, { type Ora } from "ora";
import type { BatchResult, ProgressSink } from "../types";

export class SpinnerProgress implements ProgressSink {
  private readonly spinner: Ora = ora({ text: "Initializing...", indent: 2 });

  start(): void {
    this.spinner.start("Reading jobs...");
  }

  progress(current: number, total: number, label: string): void {
    this.spinner.text = `Converting ${current}/${total}: ${label}`;
  }

  finish(result: BatchResult): void {
    if (result.ok) {
      this.spinner.succeed("Conversion finished");
      return;
    }
    this.spinner.fail(
      result.failures.length > 0
        ? `${result.failures.length} job(s) failed`
        : "Conversion failed",
    );
  }
}
