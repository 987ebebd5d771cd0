import { parseDirectivePrefix } from "./github-url.js";
import { stripCiPrefix } from "./text.js";
import type { ChatLine } from "./types.js";

const ACTION_PREFIX = "\x01ACTION ";
const ACTION_SUFFIX = "\x01";
const HIDDEN_MARKER = "[off]";

export type LineClass =
  | { kind: "ignored" }
  | { kind: "topic-start"; title: string; subtopic: boolean }
  | { kind: "meeting-end" }
  | { kind: "github-directive"; value: string }
  | { kind: "resolution"; removeFromAgenda: boolean }
  | { kind: "text" };

/** [off] 以降を記録から外す（他の W3C 系ボットと同じ慣習） */
export function filterBotHidden(text: string): string {
  const index = text.indexOf(HIDDEN_MARKER);
  return index < 0 ? text : text.slice(0, index) + "[hidden]";
}

/** "present+" そのもの、または "present+ " で始まる行か */
export function isPresentPlus(text: string): boolean {
  const lower = text.slice(0, "present+ ".length).toLowerCase();
  if (text.length === "present+".length) return lower === "present+";
  return lower === "present+ ";
}

/** CTCP ACTION の枠を外して ChatLine を作る */
export function parseChatLine(source: string, text: string): ChatLine {
  const isAction =
    text.length >= ACTION_PREFIX.length + ACTION_SUFFIX.length &&
    text.startsWith(ACTION_PREFIX) &&
    text.endsWith(ACTION_SUFFIX);
  const body = isAction
    ? text.slice(ACTION_PREFIX.length, text.length - ACTION_SUFFIX.length)
    : text;
  return { source, isAction, message: filterBotHidden(body) };
}

function isMeetingEnd(line: ChatLine): boolean {
  if (line.isAction) {
    return (
      line.source === "trackbot" &&
      line.message === "is ending a teleconference."
    );
  }
  return (
    line.source === "Zakim" &&
    line.message.startsWith("As of this point the attendees have been")
  );
}

export function classifyLine(line: ChatLine): LineClass {
  if (isPresentPlus(line.message)) {
    return { kind: "ignored" };
  }

  if (!line.isAction) {
    const topic = stripCiPrefix(line.message, "topic:");
    if (topic !== null) {
      return { kind: "topic-start", title: topic, subtopic: false };
    }
    const subtopic = stripCiPrefix(line.message, "subtopic:");
    if (subtopic !== null) {
      return { kind: "topic-start", title: subtopic, subtopic: true };
    }
  }

  if (isMeetingEnd(line)) {
    return { kind: "meeting-end" };
  }

  // ディレクティブは emote でも有効
  const directive = parseDirectivePrefix(line.message);
  if (directive !== null) {
    return { kind: "github-directive", value: directive };
  }

  if (!line.isAction) {
    const { message } = line;
    if (message.startsWith("RESOLUTION") || message.startsWith("RESOLVED")) {
      return { kind: "resolution", removeFromAgenda: true };
    }
    if (message.startsWith("SUMMARY") || message.startsWith("ACTION")) {
      return { kind: "resolution", removeFromAgenda: false };
    }
  }

  return { kind: "text" };
}
