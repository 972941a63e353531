/**
 * Progress tracking for the song matching pass.
 * Emits 'progress' events the CLI renders as a status line.
 */

import { EventEmitter } from 'events';

export interface ProgressUpdate {
  current: number;
  total: number;
  message: string;
  percent: number;
  eta: number | null; // seconds remaining
}

interface ProgressState {
  current: number;
  total: number;
  message: string;
  startTime: number;
}

export class ProgressTracker extends EventEmitter {
  private state: ProgressState | null = null;

  constructor(private readonly now: () => number = () => Date.now()) {
    super();
  }

  start(total: number, message: string): void {
    this.state = { current: 0, total, message, startTime: this.now() };
    this.emitUpdate();
  }

  update(current: number, message?: string): void {
    if (!this.state) {
      return;
    }
    this.state.current = Math.min(current, this.state.total);
    if (message) {
      this.state.message = message;
    }
    this.emitUpdate();
  }

  getProgress(): ProgressUpdate | null {
    if (!this.state) {
      return null;
    }

    const { current, total, message } = this.state;
    return {
      current,
      total,
      message,
      percent: total > 0 ? Math.floor((current / total) * 100) : 100,
      eta: this.calculateETA(this.state)
    };
  }

  stop(): void {
    this.state = null;
    this.emit('done');
  }

  /**
   * Calculate ETA in seconds based on current progress rate
   */
  private calculateETA(state: ProgressState): number | null {
    if (state.current === 0) {
      return null;
    }

    const elapsed = (this.now() - state.startTime) / 1000; // seconds
    if (elapsed <= 0) {
      return null;
    }

    const rate = state.current / elapsed; // items per second
    return Math.ceil((state.total - state.current) / rate);
  }

  private emitUpdate(): void {
    const update = this.getProgress();
    if (update) {
      this.emit('progress', update);
    }
  }
}

/**
 * Helper to format ETA as human-readable string
 */
export function formatETA(seconds: number | null): string {
  if (seconds === null) {
    return 'calculating...';
  }

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes < 60) {
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}
