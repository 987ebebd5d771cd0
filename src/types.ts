export interface ChannelConfig {
  /** 議事録を取っているグループ名（コメントの見出しに使う） */
  group: string;
  /** "owner/repo" または "owner/*" 形式 */
  githubReposAllowed: string[];
  publishResolutionsOnly: boolean;
}

export interface IrcSettings {
  server: string;
  port: number;
  tls: boolean;
  nick: string;
  userName: string;
  realName: string;
}

export interface Config {
  source: string;
  owners: string[];
  activityTimeoutMinutes: number;
  github: {
    /** モックモードでは null */
    token: string | null;
    userAgent: string;
    mock: boolean;
  };
  irc: IrcSettings;
  channels: Record<string, ChannelConfig>;
}

export interface ChatLine {
  source: string;
  isAction: boolean;
  message: string;
}

export interface TopicRecord {
  /** 空文字は「this issue」扱い */
  topic: string;
  group: string;
  githubUrl: string | null;
  lines: ChatLine[];
  resolutions: string[];
  removeFromAgenda: boolean;
  publishResolutionsOnly: boolean;
}

export interface GithubUrlParts {
  url: string;
  owner: string;
  repo: string;
  kind: "issues" | "pull";
  number: number;
}

/** IRC への送信口。PRIVMSG のペイロードは分割済みのものだけを渡す */
export interface IrcTransport {
  readonly nick: string;
  privmsg(target: string, payload: string): void;
  join(channel: string): void;
  part(channel: string, message: string): void;
  quit(message: string): Promise<void>;
}

/** IRC から受け取った1メッセージ（PRIVMSG / INVITE 以外は無視） */
export interface IncomingMessage {
  command: string;
  nick?: string;
  args: string[];
}

export type TaskKind = "comment" | "title";

export type TaskStatus = "in-progress" | "completed" | "failed";

export interface TrackedTask {
  id: string;
  kind: TaskKind;
  channel: string;
  status: TaskStatus;
  done: Promise<void>;
}
