export type RunSignalState = { paused: boolean; cancelled: boolean };

type Listener = (state: RunSignalState) => void;

/**
 * 執行端只讀的控制訊號：每處理完一個檔案才檢查一次。
 */
export interface RunSignal {
  readonly paused: boolean;
  readonly cancelled: boolean;
  /** 暫停中時等待，直到恢復或取消 */
  waitIfPaused(): Promise<void>;
  onChange(listener: Listener): () => void;
}

export class RunControl implements RunSignal {
  private _paused = false;
  private _cancelled = false;
  private waiters: Array<() => void> = [];
  private listeners = new Set<Listener>();

  get paused(): boolean {
    return this._paused;
  }

  get cancelled(): boolean {
    return this._cancelled;
  }

  pause(): void {
    if (this._paused || this._cancelled) {
      return;
    }
    this._paused = true;
    this.emit();
  }

  resume(): void {
    if (!this._paused) {
      return;
    }
    this._paused = false;
    this.release();
    this.emit();
  }

  /** 取消後不可恢復；暫停中的等待會立即結束 */
  cancel(): void {
    if (this._cancelled) {
      return;
    }
    this._cancelled = true;
    this._paused = false;
    this.release();
    this.emit();
  }

  async waitIfPaused(): Promise<void> {
    if (!this._paused) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private release(): void {
    const waiters = [...this.waiters];
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private emit(): void {
    for (const listener of this.listeners) {
      listener({ paused: this._paused, cancelled: this._cancelled });
    }
  }
}
