/**
 * Returns the text between the first `{` and the last `}` of a model reply,
 * or `null` when there is no such span. Models often wrap JSON in prose.
 */
export function extractJsonObject(content: string): string | null {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) {
    return null;
  }
  return content.slice(start, end + 1);
}

/**
 * First non-empty line of a free-text reply, without wrapping quotes.
 */
export function firstReplyLine(content: string): string {
  const line =
    content
      .split(/\r?\n/)
      .map((l) => l.trim())
      .find((l) => l.length > 0) ?? '';
  return line.replace(/^["'`]+|["'`]+$/g, '').trim();
}
