/**
 * packages/core/src/settings/kvFile.ts — Flat KEY="value" file codec.
 *
 * Format:
 *   - one `KEY="value"` pair per line; quotes are optional on read
 *   - blank lines and lines starting with `#` are ignored on read
 *   - inside double quotes, `\"` and `\\` are escapes
 *   - on rewrite, only the updated keys are re-quoted; new keys are appended
 *     sorted alphabetically
 *
 * The same file doubles as a systemd EnvironmentFile, which is why the
 * quoting rules follow its double-quote semantics.
 */

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function unquote(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  if (raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'")) {
    return raw.slice(1, -1);
  }
  return raw;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

export function parseKeyValue(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const key = lineKey(rawLine);
    if (key === null || !isValidKey(key)) continue;
    const line = rawLine.trim();
    entries.set(key, unquote(line.slice(line.indexOf("=") + 1).trim()));
  }
  return entries;
}

/** Text before the first `=`, or null for blank, comment and `=`-less lines. */
function lineKey(rawLine: string): string | null {
  const line = rawLine.trim();
  if (line.length === 0 || line.startsWith("#")) return null;
  const eq = line.indexOf("=");
  if (eq <= 0) return null;
  return line.slice(0, eq).trim();
}

/**
 * Rewrite `text` with `updates` applied. A line whose key `updates` names is
 * replaced in place (later duplicates of it are dropped); every other line,
 * comments and keys this codec would not parse included, is kept verbatim.
 * Keys missing from `text` are appended in sorted order.
 */
export function rewriteKeyValue(
  text: string,
  updates: Readonly<Record<string, string>>,
): string {
  const values = new Map(Object.entries(updates));
  const written = new Set<string>();
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();

  const out: string[] = [];
  for (const line of lines) {
    const key = lineKey(line);
    const value = key === null ? undefined : values.get(key);
    if (key === null || value === undefined) {
      out.push(line);
      continue;
    }
    if (written.has(key)) continue;
    written.add(key);
    out.push(`${key}=${quote(value)}`);
  }
  for (const key of [...values.keys()].sort()) {
    if (!written.has(key)) out.push(`${key}=${quote(values.get(key) ?? "")}`);
  }
  return out.length === 0 ? "" : `${out.join("\n")}\n`;
}
