import type { Toast } from '../toast/Toast';

/**
 * Shows toasts one at a time, oldest first.
 */
export class ToastQueue {
  private toasts: Toast[] = [];

  enqueue(toast: Toast): void {
    this.toasts.push(toast);
  }

  /** The toast on screen, if any. */
  get current(): Toast | null {
    return this.toasts[0] ?? null;
  }

  get size(): number {
    return this.toasts.length;
  }

  /**
   * Advances and draws the head toast, dropping it once it expires.
   * Call once per frame.
   *
   * @returns whether a toast is still queued after this frame
   */
  update(delta: number): boolean {
    const head = this.toasts[0];
    if (!head) return false;

    if (!head.update(delta)) {
      this.toasts.shift();
    }
    return this.toasts.length > 0;
  }

  clear(): void {
    this.toasts = [];
  }
}
