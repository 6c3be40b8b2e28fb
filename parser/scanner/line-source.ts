/**
 * Splits in-memory text into physical lines.
 *
 * `"a\n"` is a single line and `""` is no lines at all; a `\r` before the
 * `\n` is dropped.
 */
export function splitLines(text: string): string[] {
  if (!text) return [];

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.endsWith('\r')) lines[i] = line.slice(0, -1);
  }

  return lines;
}
