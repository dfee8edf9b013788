export const MIN_TOPIC_LENGTH = 5;

export type ChatCommand =
  | { kind: "start" }
  | { kind: "help" }
  | { kind: "research"; topic: string }
  | { kind: "status" }
  | { kind: "cancel" }
  | { kind: "sources" }
  | { kind: "settings"; args: string[] }
  | { kind: "ignored" };

const SIMPLE_COMMANDS: Record<string, ChatCommand> = {
  start: { kind: "start" },
  help: { kind: "help" },
  status: { kind: "status" },
  cancel: { kind: "cancel" },
  sources: { kind: "sources" },
};

/**
 * Maps an incoming chat text to a command. Plain text is an implicit
 * `/research`; unknown slash commands are ignored.
 */
export function parseCommand(text: string): ChatCommand {
  const trimmed = text.trim();
  if (!trimmed) {
    return { kind: "ignored" };
  }
  if (!trimmed.startsWith("/")) {
    return { kind: "research", topic: trimmed };
  }

  const [head, ...args] = trimmed.split(/\s+/);
  // "/status@my_bot" in group chats
  const name = head.slice(1).split("@")[0].toLowerCase();
  if (name === "research") {
    return { kind: "research", topic: args.join(" ") };
  }
  if (name === "settings") {
    return { kind: "settings", args };
  }
  return SIMPLE_COMMANDS[name] ?? { kind: "ignored" };
}
