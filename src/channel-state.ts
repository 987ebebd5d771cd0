import { createChildLogger } from "./logger.js";
import { ActivityTimer } from "./activity-timer.js";
import { sendIrcLine } from "./chunker.js";
import { CommentTask } from "./comment-task.js";
import { shouldComment } from "./comment-renderer.js";
import { fetchTitleForChat } from "./github.js";
import { parseGithubUrl, resolveDirective, scanBareMention } from "./github-url.js";
import { classifyLine } from "./line-classifier.js";
import type { IssueTracker } from "./github.js";
import type { DirectiveResult } from "./github-url.js";
import type { TaskRegistry } from "./task-registry.js";
import type { ChannelConfig, ChatLine, IrcTransport, TopicRecord } from "./types.js";

const log = createChildLogger("channel-state");

export const NO_TOPIC_MESSAGE =
  "I can't set a github URL because you haven't started a topic.";

export interface BotServices {
  transport: IrcTransport;
  /** null ならモックモード */
  tracker: IssueTracker | null;
  tasks: TaskRegistry;
}

/**
 * 1チャンネル分の状態。開いているトピックは常に高々1つ。
 * 最初の発言を見た時点で作られ、プロセスが終わるまで残る。
 */
export class ChannelState {
  readonly name: string;
  readonly config: ChannelConfig | undefined;
  private services: BotServices;
  private current: TopicRecord | null = null;
  private timer: ActivityTimer;

  constructor(
    name: string,
    config: ChannelConfig | undefined,
    activityTimeoutMs: number,
    services: BotServices
  ) {
    this.name = name;
    this.config = config;
    this.services = services;
    this.timer = new ActivityTimer(
      activityTimeoutMs,
      () => this.current !== null,
      () => this.endTopic()
    );
  }

  get currentTopic(): Readonly<TopicRecord> | null {
    return this.current;
  }

  /** 発言1行を分類して状態に反映する */
  addLine(line: ChatLine): void {
    const lineClass = classifyLine(line);
    if (lineClass.kind === "ignored") return;

    if (lineClass.kind === "topic-start") {
      this.startTopic(lineClass.title);
    } else if (lineClass.kind === "meeting-end") {
      this.endTopic();
    }

    const topic = this.current;
    if (!topic) {
      if (lineClass.kind === "github-directive") {
        const result = resolveDirective(lineClass.value, this.config);
        this.respond(
          result.kind === "error"
            ? `${NO_TOPIC_MESSAGE}  Also, ${result.error}`
            : NO_TOPIC_MESSAGE
        );
      }
      return;
    }

    if (lineClass.kind === "github-directive") {
      this.applyDirective(topic, resolveDirective(lineClass.value, this.config));
    } else {
      const warning = scanBareMention(line.message, topic.githubUrl, true);
      if (warning) this.respond(warning);
    }

    if (!line.isAction) {
      if (lineClass.kind === "resolution") {
        topic.resolutions.push(line.message);
        if (lineClass.removeFromAgenda) {
          topic.removeFromAgenda = true;
        }
      }
      topic.lines.push(line);
    }
  }

  /** 開いているトピックがあれば先に終わらせてから新しいトピックを開く */
  startTopic(title: string): void {
    this.endTopic();
    this.current = {
      topic: title,
      group: this.config?.group ?? this.name,
      githubUrl: null,
      lines: [],
      resolutions: [],
      removeFromAgenda: false,
      publishResolutionsOnly: this.config?.publishResolutionsOnly ?? false,
    };
    log.info({ channel: this.name, topic: title }, "トピックを開始");
  }

  /** "take up" コマンド用。URL 付きでトピックを開く */
  startTopicWithUrl(title: string, url: string): void {
    this.startTopic(title);
    if (this.current) {
      this.current.githubUrl = url;
    }
  }

  endTopic(): void {
    const topic = this.current;
    if (!topic) return;
    this.current = null;

    if (!shouldComment(topic)) {
      log.info(
        { channel: this.name, topic: topic.topic, lines: topic.lines.length },
        "コメント対象外のためトピックを破棄"
      );
      return;
    }

    log.info({ channel: this.name, url: topic.githubUrl }, "トピックを終了、コメントを投稿");
    const { transport, tracker, tasks } = this.services;
    const task = new CommentTask(transport, tracker, this.name, topic);
    tasks.spawn("comment", this.name, () => task.run());
  }

  /** チャンネルで発言があった（コマンドや present+ も含む） */
  noteActivity(): void {
    this.timer.touch();
  }

  dispose(): void {
    this.timer.dispose();
  }

  private applyDirective(topic: TopicRecord, result: DirectiveResult): void {
    switch (result.kind) {
      case "error":
        this.respond(result.error);
        return;
      case "clear":
        if (topic.githubUrl !== null) {
          topic.githubUrl = null;
          this.respond("OK, I won't post this discussion to GitHub.");
        }
        return;
      case "set": {
        const oldUrl = topic.githubUrl;
        if (oldUrl === result.url) return;
        topic.githubUrl = result.url;
        this.confirmUrl(result.url, oldUrl);
        return;
      }
    }
  }

  /** タイトルを取得してから関連付けを報告する */
  private confirmUrl(newUrl: string, oldUrl: string | null): void {
    const issue = parseGithubUrl(newUrl);
    if (!issue) {
      log.warn({ url: newUrl }, "許可チェックを通ったURLが分解できない");
      return;
    }
    const tracker = this.services.tracker;
    this.services.tasks.spawn("title", this.name, async () => {
      const title = await fetchTitleForChat(tracker, issue);
      this.respond(
        oldUrl === null
          ? `OK, I'll post this discussion to ${newUrl} (${title}).`
          : `OK, I'll post this discussion to ${newUrl} (${title}) instead of ${oldUrl} like you said before.`
      );
    });
  }

  private respond(text: string): void {
    sendIrcLine(this.services.transport, this.name, true, text);
  }
}
