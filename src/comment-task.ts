import { createChildLogger } from "./logger.js";
import { sendIrcLine } from "./chunker.js";
import { renderComment } from "./comment-renderer.js";
import { describeError } from "./github.js";
import { parseGithubUrl } from "./github-url.js";
import type { IssueTracker } from "./github.js";
import type { GithubUrlParts, IrcTransport, TopicRecord } from "./types.js";

const log = createChildLogger("comment-task");

/** モックモードでコメント本文を流す宛先 */
export const MOCK_COMMENT_TARGET = "github-comments";

const AGENDA_LABEL_PREFIX = "Agenda+";

/**
 * 終了したトピック1件分のコメント投稿。
 * tracker が null ならモックモードで、コメントを IRC に流すだけ。
 */
export class CommentTask {
  private transport: IrcTransport;
  private tracker: IssueTracker | null;
  private channel: string;
  private topic: TopicRecord;

  constructor(
    transport: IrcTransport,
    tracker: IssueTracker | null,
    channel: string,
    topic: TopicRecord
  ) {
    this.transport = transport;
    this.tracker = tracker;
    this.channel = channel;
    this.topic = topic;
  }

  async run(): Promise<void> {
    const url = this.topic.githubUrl;
    if (url === null) return;

    const issue = parseGithubUrl(url);
    if (!issue) {
      log.warn({ url }, "許可チェックを通ったURLが分解できない");
      return;
    }

    const body = renderComment(this.topic);

    if (!this.tracker) {
      this.replayOverIrc(issue, body);
      this.respond(`Successfully commented on ${issue.url}`);
      return;
    }

    const [commentMessage, labelMessages] = await Promise.all([
      this.postComment(this.tracker, issue, body),
      this.topic.removeFromAgenda
        ? this.removeAgendaLabels(this.tracker, issue)
        : Promise.resolve([]),
    ]);

    this.respond(commentMessage + labelMessages.join(""));
  }

  private respond(text: string): void {
    sendIrcLine(this.transport, this.channel, true, text);
  }

  private replayOverIrc(issue: GithubUrlParts, body: string): void {
    const send = (line: string) =>
      sendIrcLine(this.transport, MOCK_COMMENT_TARGET, false, line);

    send(`!BEGIN GITHUB COMMENT IN ${issue.url}`);
    for (const line of body.split("\n")) {
      send(line);
    }
    send(`!END GITHUB COMMENT IN ${issue.url}`);
  }

  private async postComment(
    tracker: IssueTracker,
    issue: GithubUrlParts,
    body: string
  ): Promise<string> {
    try {
      await tracker.createComment(issue, body);
      log.info({ url: issue.url, channel: this.channel }, "コメントを投稿");
      return `Successfully commented on ${issue.url}`;
    } catch (err) {
      log.error({ err, url: issue.url }, "コメントの投稿に失敗");
      return `UNABLE TO COMMENT on ${issue.url} due to error: ${describeError(err)}`;
    }
  }

  /** 決議があったので "Agenda+" で始まるラベル（"Agenda+ F2F" なども）を外す */
  private async removeAgendaLabels(
    tracker: IssueTracker,
    issue: GithubUrlParts
  ): Promise<string[]> {
    let labels: string[];
    try {
      labels = await tracker.listLabels(issue);
    } catch (err) {
      log.error({ err, url: issue.url }, "ラベルの取得に失敗");
      return [` and UNABLE TO RETRIEVE LABELS due to error: ${describeError(err)}`];
    }

    const agendaLabels = labels.filter((l) => l.startsWith(AGENDA_LABEL_PREFIX));
    return Promise.all(
      agendaLabels.map(async (label) => {
        try {
          await tracker.removeLabel(issue, label);
          return ` and removed the "${label}" label`;
        } catch (err) {
          log.error({ err, url: issue.url, label }, "ラベルの削除に失敗");
          return ` and UNABLE TO REMOVE LABEL "${label}" due to error: ${describeError(err)}`;
        }
      })
    );
  }
}
