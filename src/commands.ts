import { createChildLogger } from "./logger.js";
import { sendIrcLine } from "./chunker.js";
import { fetchTitleForChat } from "./github.js";
import { checkGithubUrl, parseGithubUrl } from "./github-url.js";
import { stripCiPrefix } from "./text.js";
import { codeDescription } from "./version.js";
import type { MinutesBot } from "./bot.js";

const log = createChildLogger("commands");

/** コマンドへの返信先 */
export interface CommandReply {
  /** チャンネル名、または個人宛てなら送信者の nick */
  target: string;
  isAction: boolean;
  /** チャンネルでの呼びかけなら送信者。1行目の先頭に付ける */
  username: string | null;
}

interface TakeUpCommand {
  url: string;
  name: string;
  header: "Topic" | "Subtopic";
}

const HELP_LINES = [
  "  help      - Send this message.",
  "  intro     - Send a message describing what I do.",
  "  status    - Send a message with current bot status.",
  "  bye       - Leave the channel.  (You can /invite me back.)",
  "  end topic - End the current topic without starting a new one.",
  "  reboot    - Make me leave the server and exit.  If properly configured, I will then update myself and return.",
  '  take up [URL] - Start a new topic and print a "Topic:" line based on the title of the github issue/PR at URL',
  '  topic [URL]   - Start a new topic and print a "Topic:" line based on the title of the github issue/PR at URL',
  '  take up subtopic [URL] - Start a new topic and print a "Subtopic:" line based on the title of the github issue/PR at URL',
  '  subtopic [URL]         - Start a new topic and print a "Subtopic:" line based on the title of the github issue/PR at URL',
];

/** "mynick: ..." / "mynick, ..." ならコマンド部分を返す */
export function checkCommandInChannel(mynick: string, message: string): string | null {
  if (!message.startsWith(mynick)) return null;
  const afterNick = message.slice(mynick.length);
  if (!afterNick.startsWith(":") && !afterNick.startsWith(",")) return null;
  return afterNick.slice(1).trimStart();
}

export function parseTakeUp(command: string): TakeUpCommand | null {
  const takeUpArgument = stripCiPrefix(command, "take up ");
  const inner = takeUpArgument ?? command;

  const subtopic = stripCiPrefix(inner, "subtopic ");
  if (subtopic !== null) {
    return {
      url: subtopic,
      name: takeUpArgument !== null ? "take up subtopic" : "subtopic",
      header: "Subtopic",
    };
  }
  if (takeUpArgument !== null) {
    return { url: takeUpArgument, name: "take up", header: "Topic" };
  }
  const topic = stripCiPrefix(inner, "topic ");
  return topic !== null ? { url: topic, name: "topic", header: "Topic" } : null;
}

export function handleBotCommand(
  bot: MinutesBot,
  command: string,
  reply: CommandReply
): void {
  const { transport } = bot.services;
  const inChannel = reply.target.startsWith("#");
  const requester = reply.username ?? reply.target;

  const sendLine = (addressed: boolean, line: string) => {
    const text =
      addressed && reply.username !== null ? `${reply.username}, ${line}` : line;
    sendIrcLine(transport, reply.target, reply.isAction, text);
  };

  log.info({ target: reply.target, command }, "コマンドを受信");

  const takeUp = parseTakeUp(command);
  if (takeUp) {
    if (!inChannel) {
      sendLine(true, `'${takeUp.name}' only works in a channel`);
      return;
    }
    takeUpIssue(bot, takeUp, reply, sendLine);
    return;
  }

  const bare = command.endsWith("?") ? command.slice(0, -1) : command;

  switch (bare) {
    case "help":
      sendLine(true, "The commands I understand are:");
      for (const line of HELP_LINES) sendLine(false, line);
      return;

    case "intro": {
      sendLine(
        false,
        "My job is to leave comments in github when the group discusses github issues and takes minutes in IRC."
      );
      sendLine(
        false,
        'I separate discussions by the "Topic:" lines, and I know what github issues to use only by lines of the form "GitHub: <url> | none".'
      );
      sendLine(
        false,
        'You can also use the "take up" command if you want me to output the "Topic:" lines myself, based on the title of the github issue.'
      );
      if (inChannel) {
        const channelConfig = bot.config.channels[reply.target];
        sendLine(
          false,
          channelConfig
            ? `In this channel, I'm only allowed to comment on issues in the repositories: ${channelConfig.githubReposAllowed.join(" ")}.`
            : "I don't have a configuration of allowed repositories for this channel."
        );
      }
      sendLine(
        false,
        `My source code is at ${bot.config.source} and I'm run by ${bot.config.owners.join(" ")}.`
      );
      return;
    }

    case "status":
      sendLine(
        true,
        `This is ${codeDescription()}, which is probably in the repository at ${bot.config.source}`
      );
      sendLine(false, "I currently have data for the following channels:");
      for (const name of bot.channelNames()) {
        const topic = bot.channel(name).currentTopic;
        if (!topic) {
          sendLine(false, `  ${name} (no topic data buffered)`);
          continue;
        }
        sendLine(false, `  ${name} (${topic.lines.length} lines buffered on "${topic.topic}")`);
        sendLine(
          false,
          topic.githubUrl === null
            ? "    no GitHub URL to comment on"
            : `    will comment on ${topic.githubUrl}`
        );
      }
      return;

    case "bye":
      if (!inChannel) {
        sendLine(true, "'bye' only works in a channel");
        return;
      }
      bot.channel(reply.target).endTopic();
      transport.part(
        reply.target,
        `Leaving at request of ${requester}.  Feel free to /invite me back.`
      );
      return;

    case "end topic":
      if (!inChannel) {
        sendLine(true, "'end topic' only works in a channel");
        return;
      }
      bot.channel(reply.target).endTopic();
      return;

    case "reboot": {
      const busy = bot.channelsWithTopics();
      if (busy.length > 0) {
        // バッファ中のトピックを捨てないよう拒否する
        sendLine(
          true,
          `Sorry, I can't reboot right now because I have buffered topics in ${busy.join(" ")}.`
        );
        return;
      }
      sendLine(true, "OK, I'll reboot now.");
      bot.requestReboot(`${codeDescription()}, rebooting at request of ${requester}.`);
      return;
    }

    default:
      sendLine(true, "Sorry, I don't understand that command.  Try 'help'.");
  }
}

/** Issue のタイトルを取得して "Topic:" 行を出し、URL 付きのトピックを開く */
function takeUpIssue(
  bot: MinutesBot,
  takeUp: TakeUpCommand,
  reply: CommandReply,
  sendLine: (addressed: boolean, line: string) => void
): void {
  const check = checkGithubUrl(takeUp.url, bot.config.channels[reply.target]);
  if (!check.ok) {
    sendLine(true, check.error);
    return;
  }

  const url = check.url;
  const channel = bot.channel(reply.target);
  if (channel.currentTopic?.githubUrl === url) {
    sendLine(true, `ignoring request to take up ${url} which is already the current github URL`);
    return;
  }
  channel.endTopic();

  const issue = parseGithubUrl(url);
  if (!issue) {
    log.warn({ url }, "許可チェックを通ったURLが分解できない");
    return;
  }

  const { transport, tracker, tasks } = bot.services;
  tasks.spawn("title", reply.target, async () => {
    const title = await fetchTitleForChat(tracker, issue);
    sendIrcLine(transport, reply.target, false, `${takeUp.header}: ${title}`);
    sendIrcLine(
      transport,
      reply.target,
      reply.isAction,
      `OK, I'll post this discussion to ${url}.`
    );
    channel.startTopicWithUrl(title, url);
  });
}
