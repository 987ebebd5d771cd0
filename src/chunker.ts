import { createChildLogger } from "./logger.js";
import type { IrcTransport } from "./types.js";

const log = createChildLogger("chunker");

/**
 * IRC の1行は 512 バイトまで。"PRIVMSG" やプレフィックス分を見込んだ上限。
 * 超えるとサーバに切断されたり、末尾を切り捨てられたりする。
 */
export function maxSegmentLength(target: string, isAction: boolean): number {
  return 463 - 8 - Buffer.byteLength(target, "utf8") - (isAction ? 9 : 0);
}

/**
 * 1行をバイト上限以下のセグメントに分ける。UTF-8 の途中では切らない。
 * 空文字でも空のセグメントを1つ返す。上限を超える1文字はそのまま1セグメントにする。
 */
export function chunkLine(
  target: string,
  isAction: boolean,
  line: string
): string[] {
  const maxLength = maxSegmentLength(target, isAction);
  const bytes = Buffer.from(line, "utf8");
  const segments: string[] = [];

  let start = 0;
  do {
    let end: number;
    if (bytes.length - start <= maxLength) {
      end = bytes.length;
    } else {
      end = start + maxLength;
      // 継続バイト (10xxxxxx) の上なら文字の先頭まで戻る
      while (end > start && (bytes[end] ?? 0) >> 6 === 0b10) {
        end--;
      }
      // 上限が1文字にも満たないときは1文字ずつ進める
      if (end === start) {
        end = start + 1;
        while (end < bytes.length && (bytes[end] ?? 0) >> 6 === 0b10) {
          end++;
        }
      }
    }
    segments.push(bytes.subarray(start, end).toString("utf8"));
    start = end;
  } while (start < bytes.length);

  return segments;
}

export function wrapAction(text: string): string {
  return `\x01ACTION ${text}\x01`;
}

/** 分割しつつ送信する。チャットへの出力はすべてここを通す */
export function sendIrcLine(
  transport: IrcTransport,
  target: string,
  isAction: boolean,
  line: string
): void {
  for (const segment of chunkLine(target, isAction, line)) {
    if (isAction) {
      log.info(`[${target}] > * ${segment}`);
      transport.privmsg(target, wrapAction(segment));
    } else {
      log.info(`[${target}] > ${segment}`);
      transport.privmsg(target, segment);
    }
  }
}
