import type { ChatLine, TopicRecord } from "./types.js";

const ISSUE_REF_RE = /([ \t\n\v\f\r])#([0-9])/g;

/**
 * テキストを最小のバッククォート数でコードスパンにする。
 * 中の最長連続バッククォートより1つ多い区切りを使い、
 * 先頭・末尾がバッククォートなら区切りとの間に空白を入れる。
 * https://github.github.com/gfm/#code-spans
 */
export function escapeAsCodeSpan(s: string): string {
  let current = 0;
  let longest = 0;
  for (const ch of s) {
    if (ch === "`") {
      current++;
      longest = Math.max(longest, current);
    } else {
      current = 0;
    }
  }
  const ticks = "`".repeat(longest + 1);
  const spaceFirst = s.startsWith("`") ? " " : "";
  const spaceLast = s.endsWith("`") ? " " : "";
  return `${ticks}${spaceFirst}${s}${spaceLast}${ticks}`;
}

/**
 * <details> 内に置く行のエスケープ。
 * "#123" が Issue へのリンクにならないよう、空白直後の # と数字の間に
 * U+FEFF を挟む。数値文字参照を後で導入しても壊れないよう先にやる。
 */
export function escapeForHtmlBlock(s: string): string {
  return s
    .replace(ISSUE_REF_RE, "$1#\u{feff}$2")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;");
}

export function formatChatLine(line: ChatLine): string {
  return line.isAction
    ? `* ${line.source} ${line.message}`
    : `<${line.source}> ${line.message}`;
}

export function shouldComment(topic: TopicRecord): boolean {
  return (
    topic.githubUrl !== null &&
    (topic.resolutions.length > 0 || !topic.publishResolutionsOnly)
  );
}

/** 終了したトピックを GitHub コメント用の Markdown にする */
export function renderComment(topic: TopicRecord): string {
  const subject =
    topic.topic === "" ? "this issue" : escapeAsCodeSpan(topic.topic);
  let text = `The ${topic.group} just discussed ${subject}`;

  if (topic.resolutions.length === 0) {
    text += ".\n";
  } else {
    text += ", and agreed to the following:\n\n";
    for (const resolution of topic.resolutions) {
      text += `* ${escapeAsCodeSpan(resolution)}\n`;
    }
  }

  if (!topic.publishResolutionsOnly) {
    text +=
      "\n<details><summary>The full IRC log of that discussion</summary>\n";
    for (const line of topic.lines) {
      text += `${escapeForHtmlBlock(formatChatLine(line))}<br>\n`;
    }
    text += "</details>\n";
  }

  return text;
}
