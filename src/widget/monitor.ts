/**
 * Owns the widget state, the poll timer and request sequencing.
 * The React layer only subscribes.
 */
import { fetchSnapshot } from '../api/client';
import { REFRESH_INTERVAL_MS } from '../domain/computations';
import { INITIAL_STATE, refreshFailed, refreshSucceeded, toggleOpen } from '../domain/widgetState';
import type { Snapshot, UIState } from '../domain/types';

export interface CostMonitorOptions {
  apiBase: string;
  load?: (apiBase: string) => Promise<Snapshot>;
  intervalMs?: number;
  now?: () => number;
}

export function diagnosticMessage(apiBase: string): string {
  return `서버 연결 실패: ${apiBase}`;
}

export class CostMonitor {
  readonly apiBase: string;
  private readonly load: (apiBase: string) => Promise<Snapshot>;
  private readonly intervalMs: number;
  private readonly now: () => number;

  private state: UIState = INITIAL_STATE;
  private readonly listeners = new Set<() => void>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastRequestId = 0;

  constructor(options: CostMonitorOptions) {
    this.apiBase = options.apiBase;
    this.load = options.load ?? ((base) => fetchSnapshot(base));
    this.intervalMs = options.intervalMs ?? REFRESH_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  getState = (): UIState => this.state;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /** Starts the poll timer and warms the first render with one fetch */
  start(): Promise<void> {
    if (this.timer === null) {
      this.timer = setInterval(() => {
        void this.refresh();
      }, this.intervalMs);
    }
    return this.refresh({ force: true });
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  toggleOpen(): Promise<void> {
    this.setState(toggleOpen(this.state));
    return this.state.isOpen ? this.refresh() : Promise.resolve();
  }

  /** No-op while closed unless forced; never rejects */
  async refresh(options: { force?: boolean } = {}): Promise<void> {
    if (!options.force && !this.state.isOpen) return;

    const requestId = ++this.lastRequestId;
    try {
      const snapshot = await this.load(this.apiBase);
      this.setState(refreshSucceeded(this.state, requestId, snapshot, this.now()));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Widget] Refresh #${requestId} failed: ${message}`);
      this.setState(refreshFailed(this.state, requestId, diagnosticMessage(this.apiBase)));
    }
  }

  private setState(next: UIState): void {
    if (next === this.state) return;
    this.state = next;
    for (const listener of this.listeners) listener();
  }
}
