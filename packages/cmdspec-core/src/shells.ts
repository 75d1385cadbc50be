export const SHELL_KINDS = ["bash", "zsh", "fish", "fig"] as const;

export type ShellKind = (typeof SHELL_KINDS)[number];

export function isShellKind(value: string): value is ShellKind {
  return SHELL_KINDS.some(kind => kind === value);
}
