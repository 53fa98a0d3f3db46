import * as fs from "node:fs";

// Characters with a meaning in a regular expression; all are valid escapes
// under the `u` flag.
const SYNTAX_CHARACTER = /^[\\^$.+()[\]{}|/]$/;

function translateGlobCharacter(char: string): string {
  if (char === "*") return ".*";
  if (char === "?") return ".";
  return SYNTAX_CHARACTER.test(char) ? `\\${char}` : char;
}

/**
 * Regex for a log-file glob: `*` is any run of characters, `?` exactly one
 * character (a full code point, so an emoji counts once), everything else
 * is literal.
 */
export function createPatternRegex(pattern: string): RegExp {
  const source = Array.from(pattern, translateGlobCharacter).join("");
  return new RegExp(`^${source}$`, "u");
}

/**
 * Code point order. UTF-8 bytes sort the same way, while plain `<` on
 * strings compares UTF-16 units and puts astral characters before U+E000.
 */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

/**
 * Names of the regular files directly inside `directory` matching `pattern`,
 * sorted by code point.
 */
export async function listMatchingFiles(
  directory: string,
  pattern: string,
): Promise<string[]> {
  const regex = createPatternRegex(pattern);
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && regex.test(entry.name))
    .map((entry) => entry.name)
    .sort(compareNames);
}
