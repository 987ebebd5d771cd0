import { readFileSync } from "node:fs";

interface PackageInfo {
  name: string;
  version: string;
}

function readPackageInfo(): PackageInfo {
  // src/ と dist/ のどちらから読んでも一つ上に package.json がある
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (
    typeof raw === "object" &&
    raw !== null &&
    "name" in raw &&
    "version" in raw &&
    typeof raw.name === "string" &&
    typeof raw.version === "string"
  ) {
    return { name: raw.name, version: raw.version };
  }
  return { name: "minutes-bot", version: "unknown" };
}

export const packageInfo: PackageInfo = readPackageInfo();

/** status コマンドや QUIT メッセージで名乗る文字列 */
export function codeDescription(): string {
  const commit = process.env["GIT_COMMIT"];
  const base = `${packageInfo.name} version ${packageInfo.version}`;
  return commit ? `${base}, compiled from ${commit}` : base;
}
