import { stripOneCiPrefix } from "./text.js";
import type { ChannelConfig, GithubUrlParts } from "./types.js";

export const DIRECTIVE_PREFIXES = [
  "github:",
  "github topic:",
  "github issue:",
] as const;

/** ディレクティブの値として受け付けるURL（フラグメントは関連付けから外す） */
const DIRECTIVE_URL_RE =
  /^(?<issueUrl>https:\/\/github\.com\/(?<owner>[^/]*)\/(?<repo>[^/]*)\/(?:issues|pull)\/[0-9]+)(?:#[^ ]*)?$/;

/** 発言中に紛れ込んだURLの検出用。アンカーなし */
const MENTION_RE =
  /https:\/\/github\.com\/[^/]*\/[^/]*\/(?:issues|pull)\/[0-9]+/;

const STRICT_URL_RE =
  /^https:\/\/github\.com\/(?<owner>[^/]*)\/(?<repo>[^/]*)\/(?<kind>issues|pull)\/(?<number>[0-9]+)$/;

export const NOT_AN_ISSUE_MESSAGE =
  "I can't comment on that because it doesn't look like a github issue to me.";

export const NO_ALLOWED_REPOS_MESSAGE =
  "I can't comment on that github issue because I don't have a configuration of allowed repositories for this channel.";

export const BARE_MENTION_MESSAGE =
  "Because I don't want to spam github issues unnecessarily, I won't comment in that github issue unless you write \"Github: <issue-url> | none\" (or \"Github issue: ...\"/\"Github topic: ...\").";

export type UrlCheck =
  | { ok: true; url: string }
  | { ok: false; error: string };

export type DirectiveResult =
  | { kind: "clear" }
  | { kind: "set"; url: string }
  | { kind: "error"; error: string };

/** "github:" 系の prefix があれば、その後ろの値を返す */
export function parseDirectivePrefix(message: string): string | null {
  return stripOneCiPrefix(message, DIRECTIVE_PREFIXES);
}

/** 許可リストの1エントリ（owner/repo または owner/*）に一致するか */
export function isRepoAllowed(
  allowed: readonly string[],
  owner: string,
  repo: string
): boolean {
  return allowed.some((entry) => {
    const slash = entry.indexOf("/");
    if (slash < 0) return false;
    const allowedOwner = entry.slice(0, slash);
    const allowedRepo = entry.slice(slash + 1);
    return allowedOwner === owner && (allowedRepo === repo || allowedRepo === "*");
  });
}

/** URL単体を検証する。ディレクティブと "take up" コマンドの両方で使う */
export function checkGithubUrl(
  candidate: string,
  channelConfig: ChannelConfig | undefined
): UrlCheck {
  const groups = DIRECTIVE_URL_RE.exec(candidate)?.groups;
  const issueUrl = groups?.["issueUrl"];
  const owner = groups?.["owner"];
  const repo = groups?.["repo"];
  if (issueUrl === undefined || owner === undefined || repo === undefined) {
    return { ok: false, error: NOT_AN_ISSUE_MESSAGE };
  }

  if (!channelConfig) {
    return { ok: false, error: NO_ALLOWED_REPOS_MESSAGE };
  }

  const allowed = channelConfig.githubReposAllowed;
  if (!isRepoAllowed(allowed, owner, repo)) {
    return {
      ok: false,
      error: `I can't comment on that github issue because it's not in a repository I'm allowed to comment on, which are: ${allowed.join(" ")}.`,
    };
  }

  return { ok: true, url: issueUrl };
}

/** ディレクティブの値（prefix 除去後）を解釈する */
export function resolveDirective(
  value: string,
  channelConfig: ChannelConfig | undefined
): DirectiveResult {
  if (value.toLowerCase() === "none") {
    return { kind: "clear" };
  }
  const check = checkGithubUrl(value, channelConfig);
  return check.ok
    ? { kind: "set", url: check.url }
    : { kind: "error", error: check.error };
}

/** 発言がディレクティブでなければ null */
export function extractDirective(
  message: string,
  channelConfig: ChannelConfig | undefined
): DirectiveResult | null {
  const value = parseDirectivePrefix(message);
  return value === null ? null : resolveDirective(value, channelConfig);
}

export function findBareMention(message: string): string | null {
  return MENTION_RE.exec(message)?.[0] ?? null;
}

/**
 * ディレクティブ以外の発言に含まれるURLへの警告。
 * トピック外では何も言わない。関連付けは変更しない。
 */
export function scanBareMention(
  message: string,
  currentUrl: string | null,
  inTopic: boolean
): string | null {
  const mention = findBareMention(message);
  if (mention === null || mention === currentUrl || !inTopic) {
    return null;
  }
  return BARE_MENTION_MESSAGE;
}

/** 関連付け済みのURLを owner / repo / 番号に分解する */
export function parseGithubUrl(url: string): GithubUrlParts | null {
  const groups = STRICT_URL_RE.exec(url)?.groups;
  const owner = groups?.["owner"];
  const repo = groups?.["repo"];
  const kind = groups?.["kind"];
  const number = groups?.["number"];
  if (
    owner === undefined ||
    repo === undefined ||
    number === undefined ||
    (kind !== "issues" && kind !== "pull")
  ) {
    return null;
  }
  return { url, owner, repo, kind, number: parseInt(number, 10) };
}
