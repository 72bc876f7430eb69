/**
 * Progress Reporter for the dataset pipelines
 * Provides formatted console output for tracking run, phase and step boundaries
 */

export class ProgressReporter {
  private startTime: Date | null = null;

  constructor(private readonly write: (line: string) => void = console.log) {}

  /**
   * Log the start of a dataset run
   */
  logRunStart(dataset: string, totalSteps: number): void {
    this.startTime = new Date();
    this.write('\n╔════════════════════════════════════════════════════════════════╗');
    this.write(`║  ${dataset} Pipeline Run Started`);
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Entities:    ${totalSteps}`);
    this.write(`  Started:     ${this.startTime.toISOString()}`);
    this.write('');
  }

  /**
   * Log a state machine transition
   */
  logPhase(phase: string, detail?: string): void {
    this.write('');
    this.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    this.write(`📦 ${phase}${detail ? `: ${detail}` : ''}`);
    this.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  }

  logStep(step: string, currentStep: number, totalSteps: number): void {
    const percent = ((currentStep / totalSteps) * 100).toFixed(1);
    this.write(`  [${currentStep}/${totalSteps}] ${step} (${percent}%)`);
  }

  logStepComplete(stepName: string, duration: number, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName} completed`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }

    message += ` in ${this.formatDuration(duration)}`;
    this.write(message);
  }

  logRunComplete(dataset: string, totalRows: number, warnings: number): void {
    this.write('\n╔════════════════════════════════════════════════════════════════╗');
    this.write(`║  ${dataset} Pipeline Run Completed`);
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Rows Loaded:     ${this.formatNumber(totalRows)}`);
    this.write(`  Warnings:        ${warnings}`);
    if (this.startTime) {
      this.write(`  Total Duration:  ${this.formatDuration((Date.now() - this.startTime.getTime()) / 1000)}`);
    }
    this.write('');
  }

  logRunFailure(dataset: string, error: Error, failedDuring: string): void {
    this.write('\n╔════════════════════════════════════════════════════════════════╗');
    this.write(`║  ${dataset} Pipeline Run FAILED`);
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Error: ${error.message}`);
    this.write(`  Failed During: ${failedDuring}`);
    this.write('');
  }

  /**
   * Format a number with thousand separators
   */
  private formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  private formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}
