/**
 * Custom instructions are pasted by users and end up verbatim in the rewrite
 * prompt. Lines that look like chat role markers are dropped and the result is
 * capped at MAX_INSTRUCTION_LENGTH code points.
 */

export const MAX_INSTRUCTION_LENGTH = 4000;

const ROLE_LINE_PATTERNS = [
  /^\s*System\s*:/i,
  /^\s*Assistant\s*:/i,
  /^\s*User\s*:/i,
  /^\s*Human\s*:/i,
  /^\s*Model\s*:/i,
  /^\s*\[(System|Assistant|User|INST|\/INST)\]/i,
  /^\s*<\|[^|]+\|>/,
  /^\s*#{2,}\s*(System|Assistant|User|Human)\b/i,
];

function stripRoleLikeLines(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim().length === 0 || !ROLE_LINE_PATTERNS.some((re) => re.test(line)))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function sanitizeInstruction(instruction: unknown): string {
  if (typeof instruction !== "string") return "";
  const chars = Array.from(stripRoleLikeLines(instruction));
  return chars.slice(0, MAX_INSTRUCTION_LENGTH).join("").trim();
}
