export type KeyCommand = "next-screen" | "previous-screen" | "quit";

const COMMAND_BY_KEY: Readonly<Record<string, KeyCommand>> = Object.freeze({
  right: "next-screen",
  l: "next-screen",
  left: "previous-screen",
  h: "previous-screen",
  escape: "quit",
  q: "quit",
});

export function resolveKeyCommand(key: string): KeyCommand | undefined {
  const norm = key.toLowerCase();
  return Object.hasOwn(COMMAND_BY_KEY, norm) ? COMMAND_BY_KEY[norm] : undefined;
}
