export interface ParsedCommand {
  name: string;
  args: string[];
}

/**
 * Parses `<prefix><name>[@bot] [args...]`. Commands addressed to another bot
 * through the `@username` suffix return null.
 */
export function parseCommand(text: string, prefix: string, botUsername: string | null = null): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith(prefix)) {
    return null;
  }

  const [head, ...args] = trimmed.slice(prefix.length).split(/\s+/);
  if (!head) {
    return null;
  }

  const match = head.match(/^([a-z][a-z0-9_]*)(?:@(\w+))?$/i);
  if (!match) {
    return null;
  }

  const name = (match[1] ?? "").toLowerCase();
  const mention = match[2];
  if (mention && botUsername && mention.toLowerCase() !== botUsername.toLowerCase()) {
    return null;
  }

  return { name, args: args.filter((arg) => arg.length > 0) };
}
