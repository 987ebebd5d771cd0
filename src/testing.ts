import type { IssueTracker } from "./github.js";
import type { ChannelConfig, Config, GithubUrlParts, IrcTransport } from "./types.js";

export interface SentLine {
  target: string;
  payload: string;
}

/** 送信内容を記録するだけの IRC 接続 */
export class RecordingTransport implements IrcTransport {
  readonly nick: string;
  sent: SentLine[] = [];
  joined: string[] = [];
  parted: Array<{ channel: string; message: string }> = [];
  quitMessages: string[] = [];

  constructor(nick: string = "gh-bot") {
    this.nick = nick;
  }

  privmsg(target: string, payload: string): void {
    this.sent.push({ target, payload });
  }

  join(channel: string): void {
    this.joined.push(channel);
  }

  part(channel: string, message: string): void {
    this.parted.push({ channel, message });
  }

  async quit(message: string): Promise<void> {
    this.quitMessages.push(message);
  }

  /** 宛先ごとのペイロード */
  to(target: string): string[] {
    return this.sent.filter((s) => s.target === target).map((s) => s.payload);
  }
}

/** GitHub API の代わり。失敗させたい操作はエラーを設定する */
export class FakeTracker implements IssueTracker {
  titles: Map<string, string> = new Map();
  labels: string[] = [];
  comments: Array<{ url: string; body: string }> = [];
  removed: string[] = [];
  commentError: Error | null = null;
  listLabelsError: Error | null = null;
  removeErrors: Map<string, Error> = new Map();

  async fetchTitle(issue: GithubUrlParts): Promise<string> {
    const title = this.titles.get(issue.url);
    if (title === undefined) throw new Error("Not Found");
    return title;
  }

  async createComment(issue: GithubUrlParts, body: string): Promise<void> {
    if (this.commentError) throw this.commentError;
    this.comments.push({ url: issue.url, body });
  }

  async listLabels(): Promise<string[]> {
    if (this.listLabelsError) throw this.listLabelsError;
    return [...this.labels];
  }

  async removeLabel(_issue: GithubUrlParts, label: string): Promise<void> {
    const error = this.removeErrors.get(label);
    if (error) throw error;
    this.removed.push(label);
  }
}

export const WG_CHANNEL: ChannelConfig = {
  group: "Widget Working Group",
  githubReposAllowed: ["acme/widgets", "gadgets/*"],
  publishResolutionsOnly: false,
};

export function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    source: "https://example.org/minutes-bot",
    owners: ["alice"],
    activityTimeoutMinutes: 0,
    github: { token: null, userAgent: "minutes-bot/test", mock: true },
    irc: {
      server: "irc.example.org",
      port: 6697,
      tls: true,
      nick: "gh-bot",
      userName: "ghbot",
      realName: "test bot",
    },
    channels: {
      "#wg": WG_CHANNEL,
      "#resolutions": {
        group: "Quiet Working Group",
        githubReposAllowed: ["acme/widgets"],
        publishResolutionsOnly: true,
      },
    },
    ...overrides,
  };
}
