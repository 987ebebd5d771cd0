import { createChildLogger } from "./logger.js";
import { ChannelState } from "./channel-state.js";
import { checkCommandInChannel, handleBotCommand } from "./commands.js";
import { formatChatLine } from "./comment-renderer.js";
import { isPresentPlus, parseChatLine } from "./line-classifier.js";
import type { BotServices } from "./channel-state.js";
import type { Config, IncomingMessage } from "./types.js";

const log = createChildLogger("bot");

/** IRC から届いたメッセージをチャンネルごとの状態とコマンドに振り分ける */
export class MinutesBot {
  readonly config: Config;
  readonly services: BotServices;
  private channels: Map<string, ChannelState> = new Map();
  private onReboot: (quitMessage: string) => void;

  constructor(
    config: Config,
    services: BotServices,
    onReboot: (quitMessage: string) => void
  ) {
    this.config = config;
    this.services = services;
    this.onReboot = onReboot;
  }

  /** チャンネルの状態。最初に参照されたときに作る */
  channel(name: string): ChannelState {
    let state = this.channels.get(name);
    if (!state) {
      state = new ChannelState(
        name,
        this.config.channels[name],
        this.config.activityTimeoutMinutes * 60_000,
        this.services
      );
      this.channels.set(name, state);
    }
    return state;
  }

  channelNames(): string[] {
    return [...this.channels.keys()].sort();
  }

  channelsWithTopics(): string[] {
    return this.channelNames().filter(
      (name) => (this.channels.get(name)?.currentTopic ?? null) !== null
    );
  }

  requestReboot(quitMessage: string): void {
    this.onReboot(quitMessage);
  }

  handleMessage(message: IncomingMessage): void {
    if (message.command === "PRIVMSG") {
      this.handlePrivmsg(message);
    } else if (message.command === "INVITE") {
      this.handleInvite(message);
    }
  }

  dispose(): void {
    for (const state of this.channels.values()) {
      state.dispose();
    }
  }

  private handlePrivmsg(message: IncomingMessage): void {
    const [target, text] = message.args;
    const source = message.nick;
    if (source === undefined || target === undefined || text === undefined) {
      log.warn({ args: message.args }, "送信元または宛先のない PRIVMSG");
      return;
    }

    const line = parseChatLine(source, text);
    const mynick = this.services.transport.nick;

    if (target === mynick) {
      // 個人宛てのメッセージ
      log.info(`[${source}] ${formatChatLine(line)}`);
      handleBotCommand(this, line.message, {
        target: source,
        isAction: false,
        username: null,
      });
      return;
    }

    if (!target.startsWith("#")) {
      log.warn({ target, source }, "想定外の宛先");
      return;
    }

    log.info(`[${target}] ${formatChatLine(line)}`);
    const command = checkCommandInChannel(mynick, line.message);
    if (command !== null) {
      handleBotCommand(this, command, {
        target,
        isAction: line.isAction,
        username: source,
      });
    } else if (!isPresentPlus(line.message)) {
      this.channel(target).addLine(line);
    }

    this.channel(target).noteActivity();
  }

  private handleInvite(message: IncomingMessage): void {
    const [invited, channel] = message.args;
    if (invited === undefined || channel === undefined) return;
    if (invited === this.services.transport.nick && this.config.channels[channel]) {
      log.info({ channel, from: message.nick }, "招待されたチャンネルに参加");
      this.services.transport.join(channel);
    }
  }
}
