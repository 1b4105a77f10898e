/**
 * Guard for README text before it is placed in a model prompt.
 *
 * READMEs are untrusted: they may carry HTML, badge walls, or text aimed at
 * the model. The guard strips markup noise, caps the length, and flags
 * prompt-injection phrases so the caller can log them. Security-tool READMEs
 * routinely mention passwords, tokens and shell commands, so those are not
 * flagged.
 */

export interface GuardResult {
  sanitized: string;
  flags: string[]; // e.g. ["injection.ignore-previous"]
  truncated: boolean;
}

export const DEFAULT_MAX_CHARS = 24_000;

const INJECTION_PATTERNS: Array<{ re: RegExp; flag: string }> = [
  { re: /ignore (?:all|any) (?:previous|above|prior) instructions?/i, flag: 'injection.ignore-previous' },
  { re: /disregard (?:the )?(?:system|developer|safety) (?:instructions|message|prompt)/i, flag: 'injection.ignore-system' },
  { re: /you are now (?:a|an|the) [^.\n]{0,40}(?:assistant|model|ai)\b/i, flag: 'injection.role-change' },
  { re: /BEGIN\s+PROMPT\s+INJECTION/i, flag: 'injection.explicit' },
];

function stripMarkup(input: string): string {
  let out = input
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<script[\s\S]*?<\/script>/gi, '')
    .replace(/<style[\s\S]*?<\/style>/gi, '');
  // Images and badges carry no summarizable text
  out = out.replace(/!\[[^\]]*\]\([^)]*\)/g, '');
  out = out.replace(/<[^>]+>/g, ' ');
  // Keep line structure for markdown; squeeze runs of spaces and blank lines
  out = out
    .split('\n')
    .map((line) => line.replace(/[\t ]+/g, ' ').trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
  return out;
}

export function guardUntrustedContent(raw: string, maxChars = DEFAULT_MAX_CHARS): GuardResult {
  const stripped = stripMarkup(raw.replace(/\r\n?/g, '\n'));
  const truncated = stripped.length > maxChars;
  const sanitized = truncated ? stripped.slice(0, maxChars) : stripped;
  const flags: string[] = [];
  for (const { re, flag } of INJECTION_PATTERNS) {
    if (re.test(sanitized)) flags.push(flag);
  }
  return { sanitized, flags, truncated };
}
