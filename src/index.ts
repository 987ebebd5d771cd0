import { loadConfig } from "./config.js";
import { logger, createChildLogger } from "./logger.js";
import { GitHubClient } from "./github.js";
import { IrcConnection } from "./irc.js";
import { MinutesBot } from "./bot.js";
import { TaskRegistry } from "./task-registry.js";
import { createShutdown } from "./shutdown.js";

const log = createChildLogger("main");

async function main(): Promise<void> {
  log.info("議事録ボットを起動中...");

  // 設定を読み込み
  const config = loadConfig();
  const channels = Object.keys(config.channels);
  log.info(
    {
      server: config.irc.server,
      nick: config.irc.nick,
      channels,
      mock: config.github.mock,
      activityTimeoutMinutes: config.activityTimeoutMinutes,
    },
    "設定を読み込み完了"
  );

  // コンポーネントを初期化
  const transport = new IrcConnection(config.irc, channels);
  const tracker =
    config.github.token === null
      ? null
      : new GitHubClient(config.github.token, config.github.userAgent);
  const tasks = new TaskRegistry();

  // Graceful shutdown のセットアップ
  const shutdown = createShutdown({
    dispose: () => bot.dispose(),
    tasks,
    transport,
    exit: (code) => process.exit(code),
  });

  const bot = new MinutesBot(config, { transport, tracker, tasks }, (quitMessage) => {
    void shutdown("reboot", quitMessage);
  });

  transport.onMessage((message) => bot.handleMessage(message));

  process.on("SIGTERM", () => void shutdown("SIGTERM", "Shutting down."));
  process.on("SIGINT", () => void shutdown("SIGINT", "Shutting down."));

  transport.connect();
  log.info("議事録ボットが稼働中です");
}

main().catch((err) => {
  logger.fatal({ err }, "議事録ボットの起動に失敗");
  process.exit(1);
});
