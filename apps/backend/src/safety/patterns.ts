/**
 * Command fragments that are never allowed in a playbook. Matched as
 * case-insensitive substrings of the raw script text, so benign text that
 * happens to contain one is blocked too.
 */
export const DANGEROUS_PATTERNS: readonly string[] = [
  // filesystem and disk
  "rm -rf",
  "dd if=",
  "mkfs",
  "fdisk",
  "parted",
  // power state
  "shutdown",
  "reboot",
  "halt",
  "poweroff",
  "init 0",
  "init 6",
  // firewall resets
  "iptables -f",
  "iptables --flush",
  "ufw reset",
  "ufw --force reset",
  // accounts
  "userdel",
  "deluser",
];

/**
 * Modules that run arbitrary commands on the target, by short name. A task
 * key matches on its last dotted segment, so `ansible.builtin.shell`,
 * `ansible.legacy.shell` and `ansible.windows.win_shell` are all caught.
 */
export const SHELL_MODULES: readonly string[] = [
  "shell",
  "command",
  "raw",
  "script",
  "expect",
  "win_shell",
  "win_command",
  "psexec",
  "win_psexec",
];

/** Short module name of a task key: `ansible.legacy.shell` → `shell`. */
export function moduleShortName(key: string): string {
  const trimmed = key.trim().toLowerCase();
  return trimmed.slice(trimmed.lastIndexOf(".") + 1);
}

export interface PatternMatch {
  pattern: string;
  /** The matched text with its original casing. */
  segment: string;
  index: number;
}

/** First occurrence of every denylisted pattern present in the text. */
export function findDangerousPatterns(text: string): PatternMatch[] {
  const lower = text.toLowerCase();
  const matches: PatternMatch[] = [];
  for (const pattern of DANGEROUS_PATTERNS) {
    const index = lower.indexOf(pattern);
    if (index === -1) continue;
    matches.push({
      pattern,
      segment: text.slice(index, index + pattern.length),
      index,
    });
  }
  return matches;
}
