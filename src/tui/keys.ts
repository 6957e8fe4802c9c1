export type DashboardAction =
  | "refresh"
  | "next_workspace"
  | "prev_workspace"
  | "all_workspaces"
  | "settings"
  | "clear_token"
  | "quit";

/** Subset of node:readline's keypress key object. */
export type Keypress = {
  readonly name?: string;
  readonly ctrl?: boolean;
  readonly shift?: boolean;
  readonly sequence?: string;
};

const BY_CHAR: Readonly<Record<string, DashboardAction>> = {
  r: "refresh",
  w: "next_workspace",
  W: "prev_workspace",
  a: "all_workspaces",
  s: "settings",
  c: "clear_token",
  q: "quit",
};

export function keyToAction(char: string | undefined, key: Keypress | undefined): DashboardAction | undefined {
  if (key?.ctrl && key.name === "c") return "quit";
  if (key?.name === "escape") return "quit";
  if (key?.name === "tab") return key.shift ? "prev_workspace" : "next_workspace";
  if (key?.name === "right") return "next_workspace";
  if (key?.name === "left") return "prev_workspace";
  if (key?.name === "f5") return "refresh";
  if (char !== undefined && Object.hasOwn(BY_CHAR, char)) return BY_CHAR[char];
  return undefined;
}

export const KEY_HELP = "[r] refresh  [w/W] workspace  [a] all  [s] settings  [c] clear key  [q] quit";
