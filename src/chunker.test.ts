import { describe, it, expect } from "vitest";
import { chunkLine, maxSegmentLength, sendIrcLine } from "./chunker.js";
import { RecordingTransport } from "./testing.js";

describe("maxSegmentLength", () => {
  it("宛先の長さと emote の枠を差し引く", () => {
    expect(maxSegmentLength("#wg", false)).toBe(452);
    expect(maxSegmentLength("#wg", true)).toBe(443);
    expect(maxSegmentLength("github-comments", false)).toBe(440);
  });
});

describe("chunkLine", () => {
  it("空文字でも空のセグメントを1つ返す", () => {
    expect(chunkLine("#wg", false, "")).toEqual([""]);
  });

  it("上限ちょうどなら分割しない", () => {
    const line = "a".repeat(452);
    expect(chunkLine("#wg", false, line)).toEqual([line]);
  });

  it("上限を超えたらバイト数で分割する", () => {
    const line = "a".repeat(452) + "bc";
    expect(chunkLine("#wg", false, line)).toEqual(["a".repeat(452), "bc"]);
  });

  it("マルチバイト文字の途中では切らない", () => {
    // "é" は2バイト。451 バイトの後に置くと 452 バイト目が継続バイトになる
    const line = "a".repeat(451) + "é" + "z";
    const chunks = chunkLine("#wg", false, line);
    expect(chunks).toEqual(["a".repeat(451), "éz"]);
    expect(chunks.join("")).toBe(line);
  });

  it("上限が0でも1文字ずつ進む", () => {
    const target = "#" + "x".repeat(454);
    expect(maxSegmentLength(target, false)).toBe(0);
    expect(chunkLine(target, false, "ab")).toEqual(["a", "b"]);
  });

  it("上限が1文字に満たなければその文字だけのセグメントにする", () => {
    const target = "#" + "x".repeat(453);
    expect(maxSegmentLength(target, false)).toBe(1);
    expect(chunkLine(target, false, "éa")).toEqual(["é", "a"]);
  });

  it("4バイト文字の連続でも元の文字列に戻る", () => {
    const line = "🎉".repeat(300);
    const chunks = chunkLine("#wg", true, line);
    expect(chunks.join("")).toBe(line);
    for (const chunk of chunks) {
      expect(Buffer.byteLength(chunk, "utf8")).toBeLessThanOrEqual(443);
      expect(chunk).not.toContain("\u{fffd}");
    }
    // 443 バイトに 4バイト文字は 110 個まで
    expect(chunks[0]).toBe("🎉".repeat(110));
  });
});

describe("sendIrcLine", () => {
  it("emote なら各セグメントを CTCP ACTION で包む", () => {
    const transport = new RecordingTransport();
    sendIrcLine(transport, "#wg", true, "x".repeat(443) + "yz");
    expect(transport.sent).toEqual([
      { target: "#wg", payload: `\x01ACTION ${"x".repeat(443)}\x01` },
      { target: "#wg", payload: "\x01ACTION yz\x01" },
    ]);
  });

  it("空行も送る", () => {
    const transport = new RecordingTransport();
    sendIrcLine(transport, "github-comments", false, "");
    expect(transport.sent).toEqual([{ target: "github-comments", payload: "" }]);
  });
});
