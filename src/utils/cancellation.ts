/**
 * Cooperative cancellation marker shared between the registry and a running
 * orchestrator. The orchestrator only reads it at keyword boundaries.
 */
export class CancellationToken {
  private requested = false;
  private requestReason?: string;

  cancel(reason = 'Cancelled by user'): boolean {
    if (this.requested) return false;
    this.requested = true;
    this.requestReason = reason;
    return true;
  }

  get isCancellationRequested(): boolean {
    return this.requested;
  }

  get reason(): string | undefined {
    return this.requestReason;
  }
}
