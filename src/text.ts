const isUpperChar = (c: string) => c !== c.toLowerCase();
const isLowerChar = (c: string) => c !== c.toUpperCase();

/** At least one cased character and no lowercase ones. */
export function isUpperCase(text: string): boolean {
  let cased = false;
  for (const c of text) {
    if (isLowerChar(c)) return false;
    if (isUpperChar(c)) cased = true;
  }
  return cased;
}

/** Every cased run starts with one uppercase letter followed only by lowercase ones. */
export function isTitleCase(text: string): boolean {
  let cased = false;
  let previousCased = false;
  for (const c of text) {
    if (isUpperChar(c)) {
      if (previousCased) return false;
      previousCased = true;
      cased = true;
    } else if (isLowerChar(c)) {
      if (!previousCased) return false;
      previousCased = true;
      cased = true;
    } else {
      previousCased = false;
    }
  }
  return cased;
}

export function startsLowercase(text: string): boolean {
  const first = text.charAt(0);
  return first !== "" && isLowerChar(first);
}

export function isDigits(text: string): boolean {
  return /^\d+$/.test(text);
}

export function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function startsWithAny(text: string, prefixes: readonly string[]): boolean {
  return prefixes.some((p) => text.startsWith(p));
}

export function endsWithAny(text: string, suffixes: readonly string[]): boolean {
  return suffixes.some((s) => text.endsWith(s));
}

export function includesAny(text: string, needles: readonly string[]): boolean {
  return needles.some((n) => text.includes(n));
}

export function countOf(text: string, needle: string): number {
  return text.split(needle).length - 1;
}
