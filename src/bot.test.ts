import { describe, it, expect, vi, beforeEach } from "vitest";
import { MinutesBot } from "./bot.js";
import { checkCommandInChannel, parseTakeUp } from "./commands.js";
import { TaskRegistry } from "./task-registry.js";
import { RecordingTransport, makeConfig } from "./testing.js";
import { codeDescription } from "./version.js";
import type { IncomingMessage } from "./types.js";

const URL = "https://github.com/acme/widgets/issues/42";

function privmsg(nick: string, target: string, text: string): IncomingMessage {
  return { command: "PRIVMSG", nick, args: [target, text] };
}

function action(text: string): string {
  return `\x01ACTION ${text}\x01`;
}

describe("checkCommandInChannel", () => {
  it("nick の直後が : か , ならコマンド", () => {
    expect(checkCommandInChannel("gh-bot", "gh-bot: status")).toBe("status");
    expect(checkCommandInChannel("gh-bot", "gh-bot,   help")).toBe("help");
    expect(checkCommandInChannel("gh-bot", "gh-bot status")).toBeNull();
    expect(checkCommandInChannel("gh-bot", "hey gh-bot: status")).toBeNull();
  });
});

describe("parseTakeUp", () => {
  it("take up / topic / subtopic を見分ける", () => {
    expect(parseTakeUp(`take up ${URL}`)).toEqual({ url: URL, name: "take up", header: "Topic" });
    expect(parseTakeUp(`Take up subtopic ${URL}`)).toEqual({
      url: URL,
      name: "take up subtopic",
      header: "Subtopic",
    });
    expect(parseTakeUp(`topic ${URL}`)).toEqual({ url: URL, name: "topic", header: "Topic" });
    expect(parseTakeUp(`subtopic ${URL}`)).toEqual({
      url: URL,
      name: "subtopic",
      header: "Subtopic",
    });
    expect(parseTakeUp("end topic")).toBeNull();
  });
});

describe("MinutesBot", () => {
  let transport: RecordingTransport;
  let tasks: TaskRegistry;
  let onReboot: ReturnType<typeof vi.fn>;
  let bot: MinutesBot;

  beforeEach(() => {
    transport = new RecordingTransport("gh-bot");
    tasks = new TaskRegistry();
    onReboot = vi.fn();
    bot = new MinutesBot(makeConfig(), { transport, tracker: null, tasks }, (message) =>
      onReboot(message)
    );
  });

  it("チャンネルの発言を状態に反映する", () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: Widget design"));
    bot.handleMessage(privmsg("alice", "#wg", "present+ alice"));
    bot.handleMessage(privmsg("bob", "#wg", "\x01ACTION waves\x01"));

    const topic = bot.channel("#wg").currentTopic;
    expect(topic?.topic).toBe("Widget design");
    expect(topic?.lines).toEqual([
      { source: "alice", isAction: false, message: "Topic: Widget design" },
    ]);
  });

  it("[off] 以降は記録しない", () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: colors"));
    bot.handleMessage(privmsg("bob", "#wg", "I think [off] this is secret"));
    expect(bot.channel("#wg").currentTopic?.lines[1]?.message).toBe("I think [hidden]");
  });

  it("送信元のない PRIVMSG は無視する", () => {
    bot.handleMessage({ command: "PRIVMSG", args: ["#wg", "Topic: colors"] });
    expect(bot.channelNames()).toEqual([]);
  });

  it("設定済みチャンネルへの招待だけ受ける", () => {
    bot.handleMessage({ command: "INVITE", nick: "alice", args: ["gh-bot", "#wg"] });
    bot.handleMessage({ command: "INVITE", nick: "alice", args: ["gh-bot", "#random"] });
    bot.handleMessage({ command: "INVITE", nick: "alice", args: ["other-bot", "#wg"] });
    expect(transport.joined).toEqual(["#wg"]);
  });

  it("help はチャンネルでは送信者に呼びかける", () => {
    bot.handleMessage(privmsg("alice", "#wg", "gh-bot: help?"));
    const lines = transport.to("#wg");
    expect(lines[0]).toBe("alice, The commands I understand are:");
    expect(lines[1]).toBe("  help      - Send this message.");
    expect(lines).toHaveLength(11);
  });

  it("emote のコマンドには emote で返す", () => {
    bot.handleMessage(privmsg("alice", "#wg", "\x01ACTION gh-bot, dance\x01"));
    expect(transport.to("#wg")).toEqual([
      action("alice, Sorry, I don't understand that command.  Try 'help'."),
    ]);
  });

  it("個人宛ては送信者に返す", () => {
    bot.handleMessage(privmsg("alice", "gh-bot", "bye"));
    expect(transport.to("alice")).toEqual(["'bye' only works in a channel"]);
  });

  it("status でチャンネルごとの状態を示す", () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: colors"));
    bot.handleMessage(privmsg("alice", "#wg", `github: ${URL}`));
    bot.handleMessage(privmsg("alice", "#resolutions", "hello"));
    transport.sent = [];

    bot.handleMessage(privmsg("alice", "gh-bot", "status"));
    expect(transport.to("alice")).toEqual([
      `This is ${codeDescription()}, which is probably in the repository at https://example.org/minutes-bot`,
      "I currently have data for the following channels:",
      "  #resolutions (no topic data buffered)",
      '  #wg (2 lines buffered on "colors")',
      `    will comment on ${URL}`,
    ]);
  });

  it("intro でチャンネルの許可リストを示す", () => {
    bot.handleMessage(privmsg("alice", "#wg", "gh-bot: intro"));
    const lines = transport.to("#wg");
    expect(lines[3]).toBe(
      "In this channel, I'm only allowed to comment on issues in the repositories: acme/widgets gadgets/*."
    );
    expect(lines[4]).toBe(
      "My source code is at https://example.org/minutes-bot and I'm run by alice."
    );
  });

  it("end topic でトピックを閉じてコメントする", async () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: colors"));
    bot.handleMessage(privmsg("alice", "#wg", `github: ${URL}`));
    bot.handleMessage(privmsg("alice", "#wg", "gh-bot: end topic"));
    await tasks.waitForAll();

    expect(bot.channel("#wg").currentTopic).toBeNull();
    expect(transport.to("github-comments")[0]).toBe(`!BEGIN GITHUB COMMENT IN ${URL}`);
  });

  it("bye でトピックを閉じて退出する", () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: colors"));
    bot.handleMessage(privmsg("alice", "#wg", "gh-bot: bye"));

    expect(bot.channel("#wg").currentTopic).toBeNull();
    expect(transport.parted).toEqual([
      { channel: "#wg", message: "Leaving at request of alice.  Feel free to /invite me back." },
    ]);
  });

  it("トピックが残っている間は reboot を断る", () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: colors"));
    bot.handleMessage(privmsg("alice", "#resolutions", "Topic: other"));
    bot.handleMessage(privmsg("alice", "gh-bot", "reboot"));

    expect(transport.to("alice")).toEqual([
      "Sorry, I can't reboot right now because I have buffered topics in #resolutions #wg.",
    ]);
    expect(onReboot).not.toHaveBeenCalled();
  });

  it("トピックがなければ reboot する", () => {
    bot.handleMessage(privmsg("alice", "#wg", "gh-bot: reboot"));

    expect(transport.to("#wg")).toEqual(["alice, OK, I'll reboot now."]);
    expect(onReboot).toHaveBeenCalledWith(
      `${codeDescription()}, rebooting at request of alice.`
    );
  });

  it("take up でタイトルから Topic: 行を出してトピックを開く", async () => {
    bot.handleMessage(privmsg("alice", "#wg", "Topic: earlier"));
    bot.handleMessage(privmsg("alice", "#wg", `gh-bot: take up ${URL}`));
    expect(bot.channel("#wg").currentTopic).toBeNull();

    await tasks.waitForAll();
    expect(transport.to("#wg")).toEqual([
      "Topic: TITLE",
      `OK, I'll post this discussion to ${URL}.`,
    ]);
    const topic = bot.channel("#wg").currentTopic;
    expect(topic?.topic).toBe("TITLE");
    expect(topic?.githubUrl).toBe(URL);

    bot.handleMessage(privmsg("alice", "#wg", `gh-bot: subtopic ${URL}#top`));
    expect(transport.to("#wg")).toContain(
      `alice, ignoring request to take up ${URL} which is already the current github URL`
    );
  });

  it("take up は許可リスト外の URL を断り、個人宛てでは使えない", () => {
    bot.handleMessage(
      privmsg("alice", "#wg", "gh-bot: take up https://github.com/other/repo/issues/1")
    );
    expect(transport.to("#wg")).toEqual([
      "alice, I can't comment on that github issue because it's not in a repository I'm allowed to comment on, which are: acme/widgets gadgets/*.",
    ]);

    bot.handleMessage(privmsg("alice", "gh-bot", `take up subtopic ${URL}`));
    expect(transport.to("alice")).toEqual(["'take up subtopic' only works in a channel"]);
  });
});
