import { createChildLogger } from "./logger.js";
import type { TaskRegistry } from "./task-registry.js";
import type { IrcTransport } from "./types.js";

const log = createChildLogger("shutdown");

export interface ShutdownOptions {
  /** 新しいトピックの受付やタイマーを止める */
  dispose: () => void;
  tasks: TaskRegistry;
  transport: IrcTransport;
  exit: (code: number) => void;
  drainTimeoutMs?: number;
  /** QUIT の応答を待つ上限。切断済みの接続では応答が来ない */
  quitTimeoutMs?: number;
}

/**
 * Graceful shutdown。2回目以降の呼び出しは無視する。
 * タスクの完了を待ち、QUIT を送ってから必ず exit(0) する。
 */
export function createShutdown(
  options: ShutdownOptions
): (reason: string, quitMessage: string) => Promise<void> {
  const { dispose, tasks, transport, exit } = options;
  const drainTimeoutMs = options.drainTimeoutMs ?? 30_000;
  const quitTimeoutMs = options.quitTimeoutMs ?? 500;
  let shuttingDown = false;

  return async (reason, quitMessage) => {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info({ reason }, "シャットダウンを開始");
    dispose();

    // 投稿中のコメントの完了を待つ
    await tasks.waitForAll(drainTimeoutMs);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        log.warn({ quitTimeoutMs }, "QUIT の応答がないまま終了");
        resolve();
      }, quitTimeoutMs);
    });
    try {
      await Promise.race([transport.quit(quitMessage), timeout]);
    } catch (err) {
      log.error({ err }, "QUIT の送信に失敗");
    } finally {
      clearTimeout(timer);
    }

    log.info("シャットダウン完了");
    exit(0);
  };
}
