import { Octokit } from "@octokit/rest";
import { retry } from "@octokit/plugin-retry";
import { createChildLogger } from "./logger.js";
import type { GithubUrlParts } from "./types.js";

const log = createChildLogger("github");

const RetryOctokit = Octokit.plugin(retry);

/** コメントタスクとタイトル取得が使う GitHub 側の操作 */
export interface IssueTracker {
  fetchTitle(issue: GithubUrlParts): Promise<string>;
  createComment(issue: GithubUrlParts, body: string): Promise<void>;
  listLabels(issue: GithubUrlParts): Promise<string[]>;
  removeLabel(issue: GithubUrlParts, label: string): Promise<void>;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class GitHubClient implements IssueTracker {
  private octokit: Octokit;

  constructor(token: string, userAgent: string) {
    this.octokit = new RetryOctokit({ auth: token, userAgent });
  }

  /** Issue / PR のタイトルを取得（PR も issues API で取れる） */
  async fetchTitle(issue: GithubUrlParts): Promise<string> {
    log.debug({ url: issue.url }, "タイトルを取得中");
    const { data } = await this.octokit.issues.get({
      owner: issue.owner,
      repo: issue.repo,
      issue_number: issue.number,
    });
    return data.title;
  }

  /** Issue または PR にコメントを投稿 */
  async createComment(issue: GithubUrlParts, body: string): Promise<void> {
    log.debug({ url: issue.url }, "コメントを投稿中");
    await this.octokit.issues.createComment({
      owner: issue.owner,
      repo: issue.repo,
      issue_number: issue.number,
      body,
    });
  }

  async listLabels(issue: GithubUrlParts): Promise<string[]> {
    log.debug({ url: issue.url }, "ラベルを取得中");
    const { data } = await this.octokit.issues.listLabelsOnIssue({
      owner: issue.owner,
      repo: issue.repo,
      issue_number: issue.number,
      per_page: 100,
    });
    return data.map((label) => label.name);
  }

  /** ラベルを削除 */
  async removeLabel(issue: GithubUrlParts, label: string): Promise<void> {
    log.debug({ url: issue.url, label }, "ラベルを削除中");
    await this.octokit.issues.removeLabel({
      owner: issue.owner,
      repo: issue.repo,
      issue_number: issue.number,
      name: label,
    });
  }
}

/**
 * チャットに出すタイトル。モックモード（tracker なし）では "TITLE"、
 * 取得に失敗したらエラー内容を埋め込んだ文字列を返す。
 */
export async function fetchTitleForChat(
  tracker: IssueTracker | null,
  issue: GithubUrlParts
): Promise<string> {
  if (!tracker) return "TITLE";
  try {
    return await tracker.fetchTitle(issue);
  } catch (err) {
    log.warn({ err, url: issue.url }, "タイトルの取得に失敗");
    return `COULDN'T GET TITLE due to error ${describeError(err)}`;
  }
}
