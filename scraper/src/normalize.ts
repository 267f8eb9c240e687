/**
 * Right-trim every line, collapse runs of blank lines to one, and trim the
 * document at both ends. Indentation is kept on every line but the first.
 */
export function clean(text: string): string {
  const out: string[] = [];
  let prevBlank = false;

  for (const line of text.split("\n")) {
    const stripped = line.trimEnd();
    const blank = stripped.length === 0;
    if (blank && prevBlank) {
      continue;
    }
    out.push(stripped);
    prevBlank = blank;
  }

  let start = 0;
  let end = out.length;
  while (start < end && out[start] === "") start++;
  while (end > start && out[end - 1] === "") end--;

  return out.slice(start, end).join("\n").trimStart();
}
