import { Client } from "matrix-org-irc";
import { createChildLogger } from "./logger.js";
import type { IncomingMessage, IrcSettings, IrcTransport } from "./types.js";

const log = createChildLogger("irc");

/**
 * IRC クライアントの薄いラッパー。
 * 行の分割は chunker 側で済ませるので、送信は生の PRIVMSG で行う。
 */
export class IrcConnection implements IrcTransport {
  private client: Client;

  constructor(settings: IrcSettings, channels: string[]) {
    this.client = new Client(settings.server, settings.nick, {
      port: settings.port,
      secure: settings.tls,
      userName: settings.userName,
      realName: settings.realName,
      channels,
      autoConnect: false,
      autoRejoin: true,
      floodProtection: true,
      floodProtectionDelay: 500,
    });

    this.client.on("registered", () => {
      log.info({ server: settings.server, nick: this.nick }, "IRC サーバに接続");
    });
    this.client.on("error", (message) => {
      log.error({ args: message.args, command: message.command }, "IRC サーバからエラー");
    });
  }

  get nick(): string {
    return this.client.nick;
  }

  /** PRIVMSG / INVITE を含む全メッセージを受け取る */
  onMessage(handler: (message: IncomingMessage) => void): void {
    this.client.on("raw", (message) => {
      if (message.command === undefined) return;
      handler({ command: message.command, nick: message.nick, args: message.args });
    });
  }

  connect(): void {
    this.client.connect();
  }

  privmsg(target: string, payload: string): void {
    this.sendRaw("PRIVMSG", target, payload);
  }

  join(channel: string): void {
    this.sendRaw("JOIN", channel);
  }

  part(channel: string, message: string): void {
    this.sendRaw("PART", channel, message);
  }

  quit(message: string): Promise<void> {
    // 未接続だと disconnect は例外を投げるので reject にする
    return new Promise((resolve, reject) => {
      try {
        this.client.disconnect(message, () => resolve());
      } catch (err) {
        reject(err);
      }
    });
  }

  private sendRaw(...command: string[]): void {
    Promise.resolve(this.client.send(...command)).catch((err: unknown) => {
      log.error({ err, command: command[0] }, "IRC への送信に失敗");
    });
  }
}
