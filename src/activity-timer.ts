import { createChildLogger } from "./logger.js";

const log = createChildLogger("activity-timer");

/**
 * 一定時間発言がなければ開いているトピックを閉じる。
 * timeoutMs が 0 なら無効（常に予約済み扱いにして、一度も予約しない）。
 */
export class ActivityTimer {
  private readonly timeoutMs: number;
  private readonly isTopicOpen: () => boolean;
  private readonly onExpire: () => void;
  private lastActivity: number = Date.now();
  private pending: boolean;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    timeoutMs: number,
    isTopicOpen: () => boolean,
    onExpire: () => void
  ) {
    this.timeoutMs = timeoutMs;
    this.isTopicOpen = isTopicOpen;
    this.onExpire = onExpire;
    this.pending = timeoutMs <= 0;
  }

  get isPending(): boolean {
    return this.pending;
  }

  /** チャンネルで発言があるたびに呼ぶ */
  touch(): void {
    this.lastActivity = Date.now();
    if (this.isTopicOpen() && !this.pending) {
      this.schedule();
    }
  }

  private schedule(): void {
    this.pending = true;
    const delay = Math.max(0, this.lastActivity + this.timeoutMs - Date.now());
    this.timer = setTimeout(() => this.wake(), delay);
  }

  private wake(): void {
    this.timer = null;
    this.pending = false;
    if (!this.isTopicOpen()) {
      return;
    }
    if (Date.now() >= this.lastActivity + this.timeoutMs) {
      log.info({ timeoutMs: this.timeoutMs }, "無発言が続いたためトピックを終了");
      this.onExpire();
      return;
    }
    // 予約後に発言があったので、最後の発言から数え直す
    this.schedule();
  }

  /** 以後は予約しない */
  dispose(): void {
    this.pending = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
