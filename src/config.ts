import { readFileSync } from "node:fs";
import { z } from "zod";
import { packageInfo } from "./version.js";
import type { Config } from "./types.js";

const ChannelConfigSchema = z.object({
  group: z.string().min(1),
  githubReposAllowed: z.array(z.string().regex(/^[^/\s]+\/[^/\s]+$/)),
  publishResolutionsOnly: z.boolean().default(false),
});

const BotFileSchema = z.object({
  source: z.string(),
  owners: z.array(z.string()).default([]),
  activityTimeoutMinutes: z.number().int().nonnegative().default(0),
  githubUserAgent: z.string().optional(),
  irc: z.object({
    server: z.string().min(1),
    port: z.number().int().positive().default(6697),
    tls: z.boolean().default(true),
    nick: z.string().min(1),
    userName: z.string().min(1),
    realName: z.string().default("Bot to add meeting minutes to github issues."),
  }),
  channels: z.record(
    z.string().regex(/^#/, "チャンネル名は # で始めてください"),
    ChannelConfigSchema
  ),
});

export type BotFile = z.infer<typeof BotFileSchema>;

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`環境変数 ${name} が設定されていません`);
  }
  return value;
}

/** JSON 文字列を検証して設定ファイルの内容にする */
export function parseBotFile(json: string): BotFile {
  const result = BotFileSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`設定ファイルが不正です: ${details}`);
  }
  return result.data;
}

export function buildConfig(file: BotFile, token: string | null, mock: boolean): Config {
  if (!mock && !token) {
    throw new Error("GITHUB_TOKEN が設定されていません（モックモードでは GITHUB_MOCK=1）");
  }
  return {
    source: file.source,
    owners: file.owners,
    activityTimeoutMinutes: file.activityTimeoutMinutes,
    github: {
      token: mock ? null : token,
      userAgent: file.githubUserAgent ?? `${packageInfo.name}/${packageInfo.version}`,
      mock,
    },
    irc: file.irc,
    channels: file.channels,
  };
}

export function loadConfig(): Config {
  const path = requireEnv("BOT_CONFIG");
  const file = parseBotFile(readFileSync(path, "utf-8"));
  const mock = process.env["GITHUB_MOCK"] === "1";
  return buildConfig(file, process.env["GITHUB_TOKEN"] ?? null, mock);
}
