import { createChildLogger } from "./logger.js";
import type { TaskKind, TaskStatus, TrackedTask } from "./types.js";

const log = createChildLogger("task-registry");

/**
 * 切り離して走らせる非同期処理（コメント投稿・タイトル取得）の台帳。
 * キャンセルはできない。シャットダウン時に完了を待つためだけに記録する。
 */
export class TaskRegistry {
  private tasks: Map<string, TrackedTask> = new Map();
  private sequence = 0;

  /** 現在実行中のタスク数 */
  get activeCount(): number {
    return this.active().length;
  }

  /** タスクを登録して実行する（awaitしない） */
  spawn(kind: TaskKind, channel: string, handler: () => Promise<void>): string {
    const id = `${kind}-${++this.sequence}`;

    const done = handler()
      .then(() => {
        this.updateStatus(id, "completed");
      })
      .catch((err: unknown) => {
        log.error({ err, taskId: id, channel }, "タスクの実行に失敗");
        this.updateStatus(id, "failed");
      });

    this.tasks.set(id, { id, kind, channel, status: "in-progress", done });
    log.debug({ taskId: id, channel, activeCount: this.activeCount }, "タスクを開始");
    return id;
  }

  /** 終わったタスクは持ち続けない */
  private updateStatus(id: string, status: TaskStatus): void {
    const task = this.tasks.get(id);
    if (task) {
      task.status = status;
      log.debug({ taskId: id, kind: task.kind, status }, "タスクのステータスを更新");
      this.tasks.delete(id);
    }
  }

  private active(): TrackedTask[] {
    return [...this.tasks.values()].filter((t) => t.status === "in-progress");
  }

  /**
   * 全タスクの完了を待つ（graceful shutdown用）。
   * 待っている間に新しく登録されたタスクも待つ。
   */
  async waitForAll(timeoutMs: number = 30_000): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    while (this.activeCount > 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        log.warn({ activeCount: this.activeCount }, "タイムアウト: 未完了のタスクを残して終了");
        return false;
      }
      log.info({ activeCount: this.activeCount }, "アクティブなタスクの完了を待機中");

      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, remaining);
      });
      await Promise.race([
        Promise.all(this.active().map((t) => t.done)),
        timeout,
      ]);
      clearTimeout(timer);
    }
    return true;
  }
}
