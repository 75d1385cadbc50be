import type { Candidate } from "./resolver.js";
import type { ShellKind } from "./shells.js";

function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Renders candidates as the lines each shell's completion function reads back. */
export function formatCandidates(shell: ShellKind, candidates: readonly Candidate[]): string[] {
  switch (shell) {
    case "bash":
      return candidates.map(candidate => candidate.value);
    case "fish":
    case "fig":
      return candidates.map(candidate =>
        candidate.description ? `${candidate.value}\t${oneLine(candidate.description)}` : candidate.value
      );
    case "zsh":
      // `_describe` splits every line on its first unescaped colon and unescapes only `\:`.
      return candidates.map(candidate => {
        const value = candidate.value.replace(/:/g, "\\:");
        return candidate.description ? `${value}:${oneLine(candidate.description)}` : value;
      });
  }
}
