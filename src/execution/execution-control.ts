import { Injectable } from '@nestjs/common';
import { ControlRequest } from '../store/interfaces/campaign-state.interface';

/**
 * Control state of one in-process drive loop. A pause lets items already in
 * flight finish their stages; a cancel also aborts the run signal so the next
 * acquire of every in-flight item is refused.
 */
export class RunHandle {
  private readonly controller = new AbortController();
  private pending: ControlRequest | null = null;

  constructor(readonly campaignId: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get requested(): ControlRequest | null {
    return this.pending;
  }

  /** Cancel outranks pause; neither can be withdrawn. */
  request(request: ControlRequest): void {
    if (this.pending === ControlRequest.CANCEL) return;
    this.pending = request;
    if (request === ControlRequest.CANCEL) this.controller.abort();
  }
}

/** Registry of the drive loops running in this process. */
@Injectable()
export class ExecutionControl {
  private readonly runs = new Map<string, RunHandle>();

  register(campaignId: string): RunHandle {
    const handle = new RunHandle(campaignId);
    this.runs.set(campaignId, handle);
    return handle;
  }

  unregister(handle: RunHandle): void {
    if (this.runs.get(handle.campaignId) === handle) {
      this.runs.delete(handle.campaignId);
    }
  }

  isRunning(campaignId: string): boolean {
    return this.runs.has(campaignId);
  }

  /** Signals a local run. Returns false when the campaign runs elsewhere or not at all. */
  request(campaignId: string, request: ControlRequest): boolean {
    const handle = this.runs.get(campaignId);
    if (!handle) return false;
    handle.request(request);
    return true;
  }
}
