/** ASCII のみ大文字小文字を無視する starts_with。prefix は小文字で渡すこと */
export function ciStartsWith(s: string, prefix: string): boolean {
  if (s.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (asciiLower(s.charCodeAt(i)) !== prefix.charCodeAt(i)) return false;
  }
  return true;
}

/** 大文字小文字を無視して prefix を取り除き、残りの先頭空白を削って返す */
export function stripCiPrefix(s: string, prefix: string): string | null {
  return ciStartsWith(s, prefix) ? s.slice(prefix.length).trimStart() : null;
}

/** 最初に一致した prefix で stripCiPrefix する */
export function stripOneCiPrefix(
  s: string,
  prefixes: readonly string[]
): string | null {
  for (const prefix of prefixes) {
    const rest = stripCiPrefix(s, prefix);
    if (rest !== null) return rest;
  }
  return null;
}

function asciiLower(code: number): number {
  return code >= 0x41 && code <= 0x5a ? code + 0x20 : code;
}
